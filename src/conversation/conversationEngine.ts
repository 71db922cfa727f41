import type { InterviewReply, InterviewReplyResult, InterviewTurn, ReplyGenerator } from '../ai/brainClient';
import type { CallSession } from '../calls/types';
import { log } from '../log';
import { startStageTimer } from '../metrics';
import type { Clock } from '../store/types';
import { systemClock } from '../store/types';
import {
  analyzeTimeline,
  DEFAULT_SEVERITY_THRESHOLDS,
  prioritizeGaps,
  suggestConversationStrategy,
} from '../timeline/timelineAnalyzer';
import type {
  EmploymentFragment,
  GapExplanation,
  SeverityThresholds,
  TimelineAnalysis,
} from '../timeline/types';
import type { Classification, UtteranceClassifier } from './classifier';
import { HeuristicClassifier, isClosingReply } from './classifier';
import type { CompletenessWeights, FieldCandidate } from './fields';
import {
  completenessScore,
  deriveStage,
  isIgnoredField,
  mergeExtractedFields,
  missingFields,
  normalizeFieldName,
  yearsIn,
} from './fields';
import type { InterviewContext } from './prompts';
import { closingPrompt, FALLBACK_PROMPT, renderSystemContext } from './prompts';
import type {
  ConversationStage,
  ConversationState,
  ConversationTurn,
  ExtractedFields,
  ReplySource,
  TerminationReason,
} from './types';

export const MODEL_CONFIDENCE = 0.9;
const REMEMBERED_UTTERANCES = 5;
const MAX_NOTE_LENGTH = 200;
/** Per-turn average adversarial score above which the caller is treated as guarded. */
const GUARDED_TURN_SCORE = 3;

export type NextAction = 'continue' | 'complete';

export interface EngineConfig {
  confidenceThreshold: number;
  completionThreshold: number;
  weights: CompletenessWeights;
  maxTurns: number;
  adversarialTerminateScore: number;
  historyWindow: number;
  thresholds: SeverityThresholds;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  confidenceThreshold: 0.5,
  completionThreshold: 0.8,
  weights: { required: 0.7, optional: 0.3 },
  maxTurns: 40,
  adversarialTerminateScore: 60,
  historyWindow: 6,
  thresholds: DEFAULT_SEVERITY_THRESHOLDS,
};

export interface ConversationEngineOptions {
  generateReply: ReplyGenerator;
  classifier?: UtteranceClassifier;
  clock?: Clock;
  config?: Partial<EngineConfig>;
}

export interface TurnOutcome {
  message: string;
  nextAction: NextAction;
  stage: ConversationStage;
  replySource: ReplySource;
  terminationReason?: TerminationReason;
  classification: Classification;
  analysis: TimelineAnalysis;
  updatedSession: CallSession;
}

export type AdversarialLevel = 'low' | 'medium' | 'high';

/** Buckets the running total by its per-turn average. */
export function adversarialLevel(score: number, turns: number): AdversarialLevel {
  const average = score / Math.max(1, turns);
  if (average > 4) return 'high';
  if (average > 2) return 'medium';
  return 'low';
}

function fieldValues(value: InterviewReply['extractedFields'][string]): string[] {
  if (value === null) return [];
  const values = Array.isArray(value) ? value : [value];
  return values
    .map((item) => String(item).trim())
    .filter((item) => item !== '' && item.toLowerCase() !== 'null' && item.toLowerCase() !== 'unknown');
}

export function modelFieldCandidates(extracted: InterviewReply['extractedFields']): FieldCandidate[] {
  const candidates: FieldCandidate[] = [];
  for (const [name, value] of Object.entries(extracted)) {
    if (isIgnoredField(name)) continue;
    for (const item of fieldValues(value)) {
      candidates.push({ field: normalizeFieldName(name), value: item, confidence: MODEL_CONFIDENCE });
    }
  }
  return candidates;
}

function strongest(candidates: FieldCandidate[], field: string): string | undefined {
  let best: FieldCandidate | undefined;
  for (const candidate of candidates) {
    if (candidate.field === field && (!best || candidate.confidence > best.confidence)) {
      best = candidate;
    }
  }
  return best?.value;
}

/**
 * Employment facts from one turn, or null when the turn carried none. Bare
 * years ("back in 1998") only count while employment is being discussed, so
 * a birth or graduation year does not become a job.
 */
export function buildFragment(
  turn: number,
  years: number[],
  candidates: FieldCandidate[],
  acceptBareYears: boolean,
): EmploymentFragment | null {
  const allYears = new Set<number>();
  let dated = false;
  for (const candidate of candidates) {
    if (candidate.field === 'start_date' || candidate.field === 'end_date') {
      dated = true;
      for (const year of yearsIn(candidate.value)) allYears.add(year);
    }
  }

  const fragment: EmploymentFragment = { years: [], turn };
  const employer = strongest(candidates, 'employer_name');
  const title = strongest(candidates, 'job_title');
  const industry = strongest(candidates, 'industry');
  if (employer) fragment.employer = employer;
  if (title) fragment.title = title;
  if (industry) fragment.industry = industry;

  const employment = dated || employer !== undefined || title !== undefined || industry !== undefined;
  if (employment || acceptBareYears) {
    for (const year of years) allYears.add(year);
  }
  fragment.years = [...allYears].sort((a, b) => a - b);

  if (fragment.years.length === 0 && !employment) {
    return null;
  }
  return fragment;
}

function expectingEmployment(stage: ConversationStage): boolean {
  return stage === 'employment' || stage === 'gap_resolution';
}

function sameFragment(a: EmploymentFragment, b: EmploymentFragment): boolean {
  return (
    a.years.join(',') === b.years.join(',')
    && (a.employer ?? '').toLowerCase() === (b.employer ?? '').toLowerCase()
    && (a.title ?? '').toLowerCase() === (b.title ?? '').toLowerCase()
    && (a.industry ?? '').toLowerCase() === (b.industry ?? '').toLowerCase()
  );
}

function withDetails(
  base: EmploymentFragment,
  fallback: EmploymentFragment | undefined,
): EmploymentFragment {
  const fragment: EmploymentFragment = { years: base.years, turn: base.turn };
  const employer = base.employer ?? fallback?.employer;
  const title = base.title ?? fallback?.title;
  const industry = base.industry ?? fallback?.industry;
  if (employer) fragment.employer = employer;
  if (title) fragment.title = title;
  if (industry) fragment.industry = industry;
  return fragment;
}

/**
 * A fragment without years waits in `pending` until a later turn supplies
 * them ("I was a welder at Acme" ... "from 1990 to 1995").
 */
export function applyFragment(
  fragments: EmploymentFragment[],
  pending: EmploymentFragment | undefined,
  fragment: EmploymentFragment | null,
): { fragments: EmploymentFragment[]; pending: EmploymentFragment | undefined } {
  if (!fragment) {
    return { fragments, pending };
  }

  if (fragment.years.length === 0) {
    return { fragments, pending: withDetails(fragment, pending) };
  }

  const completed = withDetails(fragment, pending);
  if (fragments.some((existing) => sameFragment(existing, completed))) {
    return { fragments, pending: undefined };
  }
  return { fragments: [...fragments, completed], pending: undefined };
}

interface Draft {
  extractedFields: ExtractedFields;
  fragments: EmploymentFragment[];
  pendingFragment: EmploymentFragment | undefined;
  gapExplanations: GapExplanation[];
}

/**
 * Turns one caller utterance into the next prompt. Pure apart from the reply
 * generator call: the input session is not mutated and the returned snapshot
 * is what the caller persists.
 */
export class ConversationEngine {
  private readonly generateReply: ReplyGenerator;
  private readonly classifier: UtteranceClassifier;
  private readonly clock: Clock;
  private readonly config: EngineConfig;

  constructor(options: ConversationEngineOptions) {
    this.generateReply = options.generateReply;
    this.classifier = options.classifier ?? new HeuristicClassifier();
    this.clock = options.clock ?? systemClock;
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
  }

  async processTurn(session: CallSession, utterance: string): Promise<TurnOutcome> {
    const now = this.clock();
    const nowIso = new Date(now).toISOString();
    const state = session.conversationState;
    const text = utterance.trim();
    const turnCount = state.turnCount + 1;

    const endClassify = startStageTimer('classify');
    const classification = this.classifier.classify(text, {
      recentUtterances: state.recentUtterances,
      currentYear: new Date(now).getUTCFullYear(),
      expectingEmployment: expectingEmployment(state.stage),
    });
    endClassify();

    const adversarialScore = session.adversarialScore + classification.score;

    // Classifier findings shape the prompt context; they are only kept if the reply is usable.
    const tentative = this.applyExtraction(session, state, turnCount, text, classification, [], nowIso);
    const tentativeAnalysis = this.analyze(tentative);
    const context = this.buildContext(tentative, tentativeAnalysis, turnCount, adversarialScore);

    const userTurn: ConversationTurn = { role: 'user', text, at: nowIso };
    const history = [...state.recentTurns, userTurn].slice(-this.config.historyWindow);

    const endLlm = startStageTimer('llm');
    const result = await this.generateReply({
      callId: session.callId,
      systemContext: renderSystemContext(context),
      recentTurns: history.map((turn): InterviewTurn => ({ role: turn.role, text: turn.text })),
      context,
    });
    endLlm();

    let draft: Draft;
    if (!result.ok || !result.reply.analysis.isRelevant) {
      // Failed or off-topic reply: nothing is recorded this turn.
      draft = {
        extractedFields: session.extractedFields,
        fragments: state.fragments,
        pendingFragment: state.pendingFragment,
        gapExplanations: state.gapExplanations,
      };
    } else {
      draft = this.applyExtraction(
        session,
        state,
        turnCount,
        text,
        classification,
        modelFieldCandidates(result.reply.extractedFields),
        nowIso,
      );
    }

    const analysis = this.analyze(draft);
    const completeness = completenessScore(draft.extractedFields, this.config.weights);
    const stage = deriveStage(draft.extractedFields, analysis.gaps, this.config.confidenceThreshold);
    const terminationReason = this.decideTermination(result, classification, {
      completeness,
      turnCount,
      adversarialScore,
    });

    let message: string;
    if (terminationReason) {
      message = terminationReason === 'model_complete' && result.ok
        ? result.reply.reply
        : closingPrompt(terminationReason);
    } else {
      message = result.ok ? result.reply.reply : FALLBACK_PROMPT;
    }

    const focus = prioritizeGaps(analysis.gaps.filter((gap) => !gap.resolved))[0];
    const assistantTurn: ConversationTurn = { role: 'assistant', text: message, at: nowIso };

    const conversationState: ConversationState = {
      stage,
      turnCount,
      fallbackTurns: state.fallbackTurns + (result.ok ? 0 : 1),
      recentTurns: [...history, assistantTurn].slice(-this.config.historyWindow),
      recentUtterances: [...state.recentUtterances, text].slice(-REMEMBERED_UTTERANCES),
      fragments: draft.fragments,
      gapExplanations: draft.gapExplanations,
      completeness,
      isComplete: terminationReason !== undefined,
      lastReplySource: result.source,
    };
    if (draft.pendingFragment) conversationState.pendingFragment = draft.pendingFragment;
    if (focus) conversationState.focusedGap = { startYear: focus.startYear, endYear: focus.endYear };
    if (terminationReason) conversationState.terminationReason = terminationReason;

    const updatedSession: CallSession = {
      ...session,
      status: session.status === 'queued' ? 'active' : session.status,
      extractedFields: draft.extractedFields,
      employmentPeriods: analysis.periods,
      employmentGaps: analysis.gaps,
      adversarialScore,
      conversationState,
      updatedAt: nowIso,
    };

    log.debug(
      {
        event: 'turn_processed',
        call_id: session.callId,
        turn: turnCount,
        stage,
        reply_source: result.source,
        turn_score: classification.score,
        signals: classification.signals,
        completeness,
        gaps: analysis.gaps.length,
        termination_reason: terminationReason,
      },
      'turn processed',
    );

    return {
      message,
      nextAction: terminationReason ? 'complete' : 'continue',
      stage,
      replySource: result.source,
      terminationReason,
      classification,
      analysis,
      updatedSession,
    };
  }

  private applyExtraction(
    session: CallSession,
    state: ConversationState,
    turnCount: number,
    text: string,
    classification: Classification,
    modelCandidates: FieldCandidate[],
    capturedAt: string,
  ): Draft {
    const candidates = [...classification.fields, ...modelCandidates];
    const { fields } = mergeExtractedFields(session.extractedFields, candidates, capturedAt);
    const { fragments, pending } = applyFragment(
      state.fragments,
      state.pendingFragment,
      buildFragment(turnCount, classification.years, candidates, expectingEmployment(state.stage)),
    );

    let gapExplanations = state.gapExplanations;
    if (state.stage === 'gap_resolution' && state.focusedGap && classification.gapReason) {
      const explanation: GapExplanation = {
        startYear: state.focusedGap.startYear,
        endYear: state.focusedGap.endYear,
        reason: classification.gapReason.reason,
        note: text.slice(0, MAX_NOTE_LENGTH),
      };
      gapExplanations = [...gapExplanations, explanation];
    }

    return { extractedFields: fields, fragments, pendingFragment: pending, gapExplanations };
  }

  private analyze(draft: Draft): TimelineAnalysis {
    return analyzeTimeline(draft.fragments, {
      thresholds: this.config.thresholds,
      explanations: draft.gapExplanations,
    });
  }

  private buildContext(
    draft: Draft,
    analysis: TimelineAnalysis,
    turnCount: number,
    adversarialScore: number,
  ): InterviewContext {
    const open = prioritizeGaps(analysis.gaps.filter((gap) => !gap.resolved));
    return {
      stage: deriveStage(draft.extractedFields, analysis.gaps, this.config.confidenceThreshold),
      turnCount,
      missingFields: missingFields(draft.extractedFields, this.config.confidenceThreshold),
      gaps: open.map((gap) => ({
        startYear: gap.startYear,
        endYear: gap.endYear,
        sizeYears: gap.sizeYears,
        severity: gap.severity,
        followUpQuestions: gap.followUpQuestions,
      })),
      strategy: suggestConversationStrategy(analysis),
      guarded: adversarialScore / turnCount > GUARDED_TURN_SCORE,
    };
  }

  /**
   * A failed reply never ends the call on its own; only the turn ceiling
   * still applies so a call with a dead model cannot run forever.
   */
  private decideTermination(
    result: InterviewReplyResult,
    classification: Classification,
    totals: { completeness: number; turnCount: number; adversarialScore: number },
  ): TerminationReason | undefined {
    if (!result.ok) {
      return totals.turnCount >= this.config.maxTurns ? 'max_turns' : undefined;
    }
    if (classification.terminationRequested) return 'caller_ended';
    if (result.reply.analysis.isComplete || isClosingReply(result.reply.reply)) return 'model_complete';
    if (totals.completeness > this.config.completionThreshold) return 'data_complete';
    if (totals.adversarialScore >= this.config.adversarialTerminateScore) return 'adversarial_limit';
    if (totals.turnCount >= this.config.maxTurns) return 'max_turns';
    return undefined;
  }
}
