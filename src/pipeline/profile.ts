import type { CallSession } from '../calls/types';
import { adversarialLevel } from '../conversation/conversationEngine';
import { bestValue } from '../conversation/fields';
import type { FieldCapture } from '../conversation/types';
import { analyzeTimeline } from '../timeline/timelineAnalyzer';
import type { SeverityThresholds, TimelineAssessment } from '../timeline/types';

export type ProfilePayload = {
  callId: string;
  callerIdentityHash: string;
  status: CallSession['status'];
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  terminationReason: string | null;
  turns: number;
  completeness: number;
  adversarialScore: number;
  adversarialLevel: string;
  summary: Record<string, string>;
  extractedFields: Record<string, FieldCapture[]>;
  employmentTimeline: CallSession['employmentPeriods'];
  employmentGaps: CallSession['employmentGaps'];
  assessment: TimelineAssessment;
  recommendations: string[];
  metadata: Record<string, string>;
};

/** The document delivered to the destination webhook when a call finishes. */
export function buildProfilePayload(session: CallSession, thresholds: SeverityThresholds): ProfilePayload {
  const state = session.conversationState;
  const analysis = analyzeTimeline(state.fragments, {
    thresholds,
    explanations: state.gapExplanations,
  });

  const summary: Record<string, string> = {};
  for (const name of Object.keys(session.extractedFields).sort()) {
    const value = bestValue(session.extractedFields, name);
    if (value !== undefined) {
      summary[name] = value;
    }
  }

  return {
    callId: session.callId,
    callerIdentityHash: session.callerIdentityHash,
    status: session.status,
    createdAt: session.createdAt,
    startedAt: session.startedAt ?? null,
    completedAt: session.completedAt ?? null,
    terminationReason: state.terminationReason ?? null,
    turns: state.turnCount,
    completeness: state.completeness,
    adversarialScore: session.adversarialScore,
    adversarialLevel: adversarialLevel(session.adversarialScore, state.turnCount),
    summary,
    extractedFields: session.extractedFields,
    employmentTimeline: analysis.periods,
    employmentGaps: analysis.gaps,
    assessment: analysis.assessment,
    recommendations: analysis.recommendations,
    metadata: session.metadata,
  };
}
