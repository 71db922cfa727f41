import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import type { EmploymentGap } from '../src/timeline/types';

setTestEnv();

function gap(startYear: number, endYear: number, severity: EmploymentGap['severity']): EmploymentGap {
  return {
    startYear,
    endYear,
    sizeYears: endYear - startYear + 1,
    severity,
    suggestedIndustries: [],
    followUpQuestions: [],
    resolved: false,
  };
}

test('two separated periods produce one major gap', async () => {
  const { analyzeTimeline } = await import('../src/timeline/timelineAnalyzer');

  const analysis = analyzeTimeline([
    { years: [1990, 1995], employer: 'Acme', title: 'welder', industry: 'manufacturing', turn: 1 },
    { years: [2005, 2010], employer: 'Beta', turn: 2 },
  ]);

  assert.deepEqual(analysis.periods, [
    {
      startYear: 1990,
      endYear: 1995,
      employer: 'Acme',
      title: 'welder',
      industry: 'manufacturing',
      confidence: 1,
      source: 'extracted',
    },
    { startYear: 2005, endYear: 2010, employer: 'Beta', confidence: 0.7, source: 'extracted' },
  ]);
  assert.deepEqual(analysis.gaps, [
    {
      startYear: 1996,
      endYear: 2004,
      sizeYears: 9,
      severity: 'major',
      suggestedIndustries: ['retail', 'food service', 'healthcare', 'warehouse'],
      followUpQuestions: [
        'What about 1996 through 2004? Were you working anywhere during that time?',
        'Any jobs at all between 1996 and 2004, even part-time or temporary ones?',
        'Could you have been working in retail, food service, healthcare during that time?',
      ],
      resolved: false,
    },
  ]);
  assert.deepEqual(analysis.assessment, {
    totalTimelineYears: 21,
    coveredYears: 12,
    gapYears: 9,
    completenessScore: 12 / 21,
    totalGaps: 1,
    unresolvedGaps: 1,
    criticalGaps: 0,
    majorGaps: 1,
    needsAttention: false,
  });
  assert.deepEqual(analysis.recommendations, []);
});

test('adjacent and overlapping periods merge without gaps', async () => {
  const { mergePeriods } = await import('../src/timeline/timelineAnalyzer');

  assert.deepEqual(
    mergePeriods([
      { years: [2000, 2003], employer: 'Acme', turn: 1 },
      { years: [2004, 2006], employer: 'Beta', turn: 2 },
    ]),
    [{ startYear: 2000, endYear: 2006, employer: 'Acme', confidence: 0.7, source: 'inferred' }],
  );

  assert.deepEqual(
    mergePeriods([
      { years: [2000, 2005], turn: 1 },
      { years: [2002, 2004], title: 'clerk', turn: 2 },
    ]),
    [{ startYear: 2000, endYear: 2005, title: 'clerk', confidence: 0.6, source: 'extracted' }],
  );
});

test('the same employer on both sides of a gap closes it', async () => {
  const { analyzeTimeline } = await import('../src/timeline/timelineAnalyzer');

  const analysis = analyzeTimeline([
    { years: [2010], employer: 'acme ', turn: 2 },
    { years: [2000, 2002], employer: 'Acme', turn: 1 },
  ]);

  assert.deepEqual(analysis.periods, [
    { startYear: 2000, endYear: 2010, employer: 'Acme', confidence: 0.7, source: 'inferred' },
  ]);
  assert.deepEqual(analysis.gaps, []);
});

test('fragments without years are ignored and an empty timeline has no gaps', async () => {
  const { analyzeTimeline } = await import('../src/timeline/timelineAnalyzer');

  const analysis = analyzeTimeline([{ years: [], employer: 'Acme', turn: 1 }]);

  assert.deepEqual(analysis.periods, []);
  assert.deepEqual(analysis.gaps, []);
  assert.equal(analysis.assessment.totalTimelineYears, 0);
  assert.equal(analysis.assessment.completenessScore, 0);
  assert.deepEqual(analysis.recommendations, []);
});

test('a one-year gap is minor and suggests neighbouring industries first', async () => {
  const { analyzeTimeline } = await import('../src/timeline/timelineAnalyzer');

  const { gaps, periods } = analyzeTimeline([
    { years: [2000], industry: 'retail', turn: 1 },
    { years: [2002], industry: 'healthcare', turn: 2 },
  ]);

  assert.equal(periods[0].endYear, undefined);
  assert.deepEqual(gaps.map((entry) => [entry.startYear, entry.endYear, entry.sizeYears, entry.severity]), [
    [2001, 2001, 1, 'minor'],
  ]);
  assert.deepEqual(gaps[0].suggestedIndustries, ['retail', 'healthcare', 'food service', 'warehouse']);
  assert.deepEqual(gaps[0].followUpQuestions, [
    'What were you doing between 2001 and 2001?',
    'Could you have been working in retail, healthcare, food service during that time?',
  ]);
});

test('gap severity uses inclusive upper bounds', async () => {
  const { classifyGapSeverity } = await import('../src/timeline/timelineAnalyzer');

  assert.deepEqual(
    [1, 2, 3, 4, 10, 11].map((years) => classifyGapSeverity(years)),
    ['minor', 'moderate', 'moderate', 'major', 'major', 'critical'],
  );
  assert.equal(
    classifyGapSeverity(3, { minorMaxYears: 2, moderateMaxYears: 4, majorMaxYears: 6 }),
    'moderate',
  );
});

test('critical gaps are broken into pieces and flagged for attention', async () => {
  const { analyzeTimeline, suggestConversationStrategy } = await import('../src/timeline/timelineAnalyzer');

  const analysis = analyzeTimeline([
    { years: [1970], turn: 1 },
    { years: [1985], turn: 2 },
  ]);

  const [critical] = analysis.gaps;
  assert.equal(critical.severity, 'critical');
  assert.equal(critical.sizeYears, 14);
  assert.deepEqual(critical.suggestedIndustries, ['manufacturing', 'construction', 'retail']);
  assert.equal(
    critical.followUpQuestions[0],
    "That's a long stretch from 1971 to 1984, so let's take it in pieces. What were you doing around 1978?",
  );
  assert.equal(analysis.assessment.needsAttention, true);
  assert.deepEqual(analysis.recommendations, [
    'Break the largest employment gaps into smaller periods and resolve them first',
    'Collect employer and title details for periods known only by year',
  ]);

  assert.deepEqual(suggestConversationStrategy(analysis), {
    approach: 'gap_focused',
    focusAreas: ['large_employment_gaps'],
    conversationTips: [
      'Break large gaps into smaller periods',
      'Timeline is thin; collect the basic employment history first',
    ],
    expectedDifficulty: 'high',
  });
});

test('explanations covering a gap mark it resolved', async () => {
  const { analyzeTimeline, suggestConversationStrategy } = await import('../src/timeline/timelineAnalyzer');

  const analysis = analyzeTimeline(
    [
      { years: [1970], turn: 1 },
      { years: [1985], turn: 2 },
    ],
    { explanations: [{ startYear: 1971, endYear: 1984, reason: 'family', note: 'raising my kids' }] },
  );

  assert.equal(analysis.gaps[0].resolved, true);
  assert.equal(analysis.assessment.unresolvedGaps, 0);
  assert.equal(suggestConversationStrategy(analysis).approach, 'standard');
});

test('fragment confidence weighs years, employer, title and industry', async () => {
  const { fragmentConfidence } = await import('../src/timeline/timelineAnalyzer');

  assert.equal(fragmentConfidence({ years: [], turn: 0 }), 0);
  assert.equal(fragmentConfidence({ years: [2001], employer: 'Acme', turn: 0 }), 0.7);
  assert.equal(
    fragmentConfidence({ years: [2001], employer: 'Acme', title: 'clerk', industry: 'retail', turn: 0 }),
    1,
  );
});

test('gaps are prioritized by severity, then size, then recency', async () => {
  const { prioritizeGaps } = await import('../src/timeline/timelineAnalyzer');

  const ordered = prioritizeGaps([
    gap(2001, 2001, 'minor'),
    gap(1990, 1994, 'major'),
    gap(2010, 2014, 'major'),
    gap(1975, 1990, 'critical'),
    gap(2003, 2009, 'major'),
  ]);

  assert.deepEqual(
    ordered.map((entry) => entry.startYear),
    [1975, 2003, 2010, 1990, 2001],
  );
});
