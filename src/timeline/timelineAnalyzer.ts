import {
  ConversationStrategy,
  EmploymentFragment,
  EmploymentGap,
  EmploymentPeriod,
  GapExplanation,
  GapSeverity,
  SeverityThresholds,
  TimelineAnalysis,
  TimelineAssessment,
} from './types';

export const DEFAULT_SEVERITY_THRESHOLDS: SeverityThresholds = {
  minorMaxYears: 1,
  moderateMaxYears: 3,
  majorMaxYears: 10,
};

const TRADITIONAL_ERA_BEFORE = 1990;
const TRADITIONAL_INDUSTRIES = ['manufacturing', 'construction', 'retail'];
const MODERN_INDUSTRIES = ['retail', 'food service', 'healthcare', 'warehouse'];
const SHORT_GAP_MAX_YEARS = 2;
const MAX_SUGGESTED_INDUSTRIES = 6;
const LOW_CONFIDENCE = 0.5;
const LONG_HISTORY_YEARS = 30;

const SEVERITY_RANK: Record<GapSeverity, number> = {
  minor: 1,
  moderate: 2,
  major: 3,
  critical: 4,
};

export interface AnalyzeOptions {
  thresholds?: SeverityThresholds;
  explanations?: GapExplanation[];
}

interface Candidate {
  period: EmploymentPeriod;
  order: number;
}

function effectiveEnd(period: EmploymentPeriod): number {
  return period.endYear ?? period.startYear;
}

function buildPeriod(
  startYear: number,
  endYear: number,
  fields: Pick<EmploymentPeriod, 'employer' | 'title' | 'industry' | 'confidence' | 'source'>,
): EmploymentPeriod {
  const period: EmploymentPeriod = {
    startYear,
    confidence: fields.confidence,
    source: fields.source,
  };
  if (endYear > startYear) period.endYear = endYear;
  if (fields.employer) period.employer = fields.employer;
  if (fields.title) period.title = fields.title;
  if (fields.industry) period.industry = fields.industry;
  return period;
}

/** 0.4 for years, 0.3 employer, 0.2 title, 0.1 industry. */
export function fragmentConfidence(fragment: EmploymentFragment): number {
  let score = 0;
  if (fragment.years.length > 0) score += 0.4;
  if (fragment.employer) score += 0.3;
  if (fragment.title) score += 0.2;
  if (fragment.industry) score += 0.1;
  return Math.round(Math.min(score, 1) * 100) / 100;
}

function toCandidate(fragment: EmploymentFragment, order: number): Candidate | null {
  const years = fragment.years.filter((year) => Number.isInteger(year));
  if (years.length === 0) {
    return null;
  }

  const period = buildPeriod(Math.min(...years), Math.max(...years), {
    employer: fragment.employer,
    title: fragment.title,
    industry: fragment.industry,
    confidence: fragmentConfidence(fragment),
    source: 'extracted',
  });
  return { period, order };
}

function sameEmployer(a: EmploymentPeriod, b: EmploymentPeriod): boolean {
  if (!a.employer || !b.employer) {
    return false;
  }
  return a.employer.trim().toLowerCase() === b.employer.trim().toLowerCase();
}

export function mergePeriods(fragments: EmploymentFragment[]): EmploymentPeriod[] {
  const candidates = fragments
    .map((fragment, index) => toCandidate(fragment, index))
    .filter((candidate): candidate is Candidate => candidate !== null)
    .sort(
      (a, b) =>
        a.period.startYear - b.period.startYear ||
        effectiveEnd(a.period) - effectiveEnd(b.period) ||
        a.order - b.order,
    );

  const merged: EmploymentPeriod[] = [];

  for (const { period: current } of candidates) {
    const last = merged[merged.length - 1];
    if (!last) {
      merged.push({ ...current });
      continue;
    }

    const lastEnd = effectiveEnd(last);
    if (current.startYear > lastEnd + 1 && !sameEmployer(last, current)) {
      merged.push({ ...current });
      continue;
    }

    const currentEnd = effectiveEnd(current);
    const lastCoversCurrent = currentEnd <= lastEnd;
    const currentCoversLast = current.startYear === last.startYear && currentEnd >= lastEnd;

    merged[merged.length - 1] = buildPeriod(last.startYear, Math.max(lastEnd, currentEnd), {
      employer: last.employer ?? current.employer,
      title: last.title ?? current.title,
      industry: last.industry ?? current.industry,
      confidence: Math.max(last.confidence, current.confidence),
      source: lastCoversCurrent || currentCoversLast ? last.source : 'inferred',
    });
  }

  return merged;
}

export function classifyGapSeverity(
  sizeYears: number,
  thresholds: SeverityThresholds = DEFAULT_SEVERITY_THRESHOLDS,
): GapSeverity {
  if (sizeYears <= thresholds.minorMaxYears) return 'minor';
  if (sizeYears <= thresholds.moderateMaxYears) return 'moderate';
  if (sizeYears <= thresholds.majorMaxYears) return 'major';
  return 'critical';
}

function suggestIndustries(
  startYear: number,
  endYear: number,
  sizeYears: number,
  periods: EmploymentPeriod[],
): string[] {
  const suggestions: string[] = [];

  if (sizeYears <= SHORT_GAP_MAX_YEARS) {
    const before = [...periods].reverse().find((period) => effectiveEnd(period) < startYear);
    const after = periods.find((period) => period.startYear > endYear);
    if (before?.industry) suggestions.push(before.industry);
    if (after?.industry) suggestions.push(after.industry);
  }

  suggestions.push(...(startYear < TRADITIONAL_ERA_BEFORE ? TRADITIONAL_INDUSTRIES : MODERN_INDUSTRIES));

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const industry of suggestions) {
    const key = industry.trim().toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(industry);
    }
  }
  return unique.slice(0, MAX_SUGGESTED_INDUSTRIES);
}

function gapQuestions(
  startYear: number,
  endYear: number,
  sizeYears: number,
  severity: GapSeverity,
  industries: string[],
): string[] {
  const questions: string[] = [];

  if (severity === 'critical') {
    const midpoint = startYear + Math.floor(sizeYears / 2);
    const decade = Math.floor(startYear / 10) * 10;
    questions.push(
      `That's a long stretch from ${startYear} to ${endYear}, so let's take it in pieces. What were you doing around ${midpoint}?`,
    );
    questions.push(`Thinking back to the ${decade}s, did you pick up any work in construction, manufacturing, or retail?`);
  } else if (severity === 'major') {
    questions.push(`What about ${startYear} through ${endYear}? Were you working anywhere during that time?`);
    questions.push(`Any jobs at all between ${startYear} and ${endYear}, even part-time or temporary ones?`);
  } else {
    questions.push(`What were you doing between ${startYear} and ${endYear}?`);
  }

  if (industries.length > 0) {
    questions.push(`Could you have been working in ${industries.slice(0, 3).join(', ')} during that time?`);
  }

  return questions;
}

export function detectGaps(
  periods: EmploymentPeriod[],
  thresholds: SeverityThresholds = DEFAULT_SEVERITY_THRESHOLDS,
  explanations: GapExplanation[] = [],
): EmploymentGap[] {
  const gaps: EmploymentGap[] = [];

  for (let i = 0; i < periods.length - 1; i += 1) {
    const currentEnd = effectiveEnd(periods[i]);
    const next = periods[i + 1];
    if (next.startYear <= currentEnd + 1) {
      continue;
    }

    const startYear = currentEnd + 1;
    const endYear = next.startYear - 1;
    const sizeYears = next.startYear - currentEnd - 1;
    const severity = classifyGapSeverity(sizeYears, thresholds);
    const suggestedIndustries = suggestIndustries(startYear, endYear, sizeYears, periods);

    gaps.push({
      startYear,
      endYear,
      sizeYears,
      severity,
      suggestedIndustries,
      followUpQuestions: gapQuestions(startYear, endYear, sizeYears, severity, suggestedIndustries),
      resolved: explanations.some(
        (explanation) => explanation.startYear <= startYear && explanation.endYear >= endYear,
      ),
    });
  }

  return gaps;
}

export function assessTimeline(periods: EmploymentPeriod[], gaps: EmploymentGap[]): TimelineAssessment {
  let totalTimelineYears = 0;
  let coveredYears = 0;

  if (periods.length > 0) {
    const earliest = Math.min(...periods.map((period) => period.startYear));
    const latest = Math.max(...periods.map(effectiveEnd));
    totalTimelineYears = latest - earliest + 1;
    for (const period of periods) {
      coveredYears += effectiveEnd(period) - period.startYear + 1;
    }
  }

  const criticalGaps = gaps.filter((gap) => gap.severity === 'critical').length;
  const majorGaps = gaps.filter((gap) => gap.severity === 'major').length;

  return {
    totalTimelineYears,
    coveredYears,
    gapYears: gaps.reduce((sum, gap) => sum + gap.sizeYears, 0),
    completenessScore: totalTimelineYears > 0 ? coveredYears / totalTimelineYears : 0,
    totalGaps: gaps.length,
    unresolvedGaps: gaps.filter((gap) => !gap.resolved).length,
    criticalGaps,
    majorGaps,
    needsAttention: criticalGaps > 0 || majorGaps > 2,
  };
}

function recommend(periods: EmploymentPeriod[], gaps: EmploymentGap[]): string[] {
  const recommendations: string[] = [];

  if (gaps.some((gap) => gap.severity === 'critical')) {
    recommendations.push('Break the largest employment gaps into smaller periods and resolve them first');
  }
  if (gaps.filter((gap) => gap.severity === 'major').length > 2) {
    recommendations.push('Several significant gaps remain; start with the most recent');
  }
  if (periods.some((period) => period.confidence < LOW_CONFIDENCE)) {
    recommendations.push('Collect employer and title details for periods known only by year');
  }
  if (periods.length > 0) {
    const span =
      Math.max(...periods.map(effectiveEnd)) - Math.min(...periods.map((period) => period.startYear));
    if (span > LONG_HISTORY_YEARS) {
      recommendations.push('Long work history; concentrate on the most recent 20 to 25 years');
    }
  }

  return recommendations;
}

/**
 * Rebuilds the whole timeline from fragments. Gaps are never patched
 * incrementally, so a gap that new information closes simply disappears.
 */
export function analyzeTimeline(
  fragments: EmploymentFragment[],
  options: AnalyzeOptions = {},
): TimelineAnalysis {
  const thresholds = options.thresholds ?? DEFAULT_SEVERITY_THRESHOLDS;
  const periods = mergePeriods(fragments);
  const gaps = detectGaps(periods, thresholds, options.explanations ?? []);

  return {
    periods,
    gaps,
    assessment: assessTimeline(periods, gaps),
    recommendations: recommend(periods, gaps),
  };
}

/** Highest severity first, then largest, then most recent. */
export function prioritizeGaps(gaps: EmploymentGap[]): EmploymentGap[] {
  return [...gaps].sort(
    (a, b) =>
      SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
      b.sizeYears - a.sizeYears ||
      b.startYear - a.startYear,
  );
}

export function suggestConversationStrategy(analysis: TimelineAnalysis): ConversationStrategy {
  const strategy: ConversationStrategy = {
    approach: 'standard',
    focusAreas: [],
    conversationTips: [],
    expectedDifficulty: 'normal',
  };

  const open = analysis.gaps.filter((gap) => !gap.resolved);

  if (open.some((gap) => gap.severity === 'critical')) {
    strategy.approach = 'gap_focused';
    strategy.focusAreas.push('large_employment_gaps');
    strategy.conversationTips.push('Break large gaps into smaller periods');
    strategy.expectedDifficulty = 'high';
  }

  if (analysis.periods.length > 0 && analysis.assessment.completenessScore < 0.5) {
    strategy.conversationTips.push('Timeline is thin; collect the basic employment history first');
  }

  if (open.length > 5) {
    strategy.conversationTips.push('Many gaps detected; ask about the largest ones first');
    strategy.expectedDifficulty = 'high';
  }

  return strategy;
}
