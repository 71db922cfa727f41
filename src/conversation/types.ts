import { z } from 'zod';
import { EmploymentFragmentSchema, GapExplanationSchema } from '../timeline/types';

export const ConversationStageSchema = z.enum([
  'greeting',
  'employment',
  'gap_resolution',
  'education',
  'skills',
  'closing',
]);
export type ConversationStage = z.infer<typeof ConversationStageSchema>;

export const TerminationReasonSchema = z.enum([
  'data_complete',
  'model_complete',
  'caller_ended',
  'max_turns',
  'adversarial_limit',
  'hangup',
]);
export type TerminationReason = z.infer<typeof TerminationReasonSchema>;

export const ReplySourceSchema = z.enum(['brain_http', 'brain_local_default', 'fallback_error']);
export type ReplySource = z.infer<typeof ReplySourceSchema>;

export const FieldCaptureSchema = z.object({
  value: z.string().min(1),
  confidence: z.number().min(0).max(1),
  capturedAt: z.string(),
});
export type FieldCapture = z.infer<typeof FieldCaptureSchema>;

export const ExtractedFieldsSchema = z.record(z.array(FieldCaptureSchema));
export type ExtractedFields = z.infer<typeof ExtractedFieldsSchema>;

export const ConversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  text: z.string(),
  at: z.string(),
});
export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

const GapSpanSchema = z.object({
  startYear: z.number().int(),
  endYear: z.number().int(),
});

export const ConversationStateSchema = z.object({
  stage: ConversationStageSchema.default('greeting'),
  turnCount: z.number().int().nonnegative().default(0),
  fallbackTurns: z.number().int().nonnegative().default(0),
  recentTurns: z.array(ConversationTurnSchema).default([]),
  recentUtterances: z.array(z.string()).default([]),
  fragments: z.array(EmploymentFragmentSchema).default([]),
  pendingFragment: EmploymentFragmentSchema.optional(),
  gapExplanations: z.array(GapExplanationSchema).default([]),
  /** Gap the last prompt asked about; an explanation in the next answer is attributed to it. */
  focusedGap: GapSpanSchema.optional(),
  completeness: z.number().min(0).max(1).default(0),
  isComplete: z.boolean().default(false),
  terminationReason: TerminationReasonSchema.optional(),
  lastReplySource: ReplySourceSchema.optional(),
});
export type ConversationState = z.infer<typeof ConversationStateSchema>;

export function initialConversationState(): ConversationState {
  return {
    stage: 'greeting',
    turnCount: 0,
    fallbackTurns: 0,
    recentTurns: [],
    recentUtterances: [],
    fragments: [],
    gapExplanations: [],
    completeness: 0,
    isComplete: false,
  };
}
