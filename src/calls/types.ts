import { z } from 'zod';
import { ConversationStateSchema, ExtractedFieldsSchema } from '../conversation/types';
import { EmploymentGapSchema, EmploymentPeriodSchema } from '../timeline/types';

export type CallId = string;

export const CallStatusSchema = z.enum(['queued', 'active', 'completed', 'failed']);
export type CallStatus = z.infer<typeof CallStatusSchema>;

export const CallSessionSchema = z.object({
  callId: z.string().min(1),
  /** One-way hash of the caller's number; the raw number is never persisted. */
  callerIdentityHash: z.string().min(1),
  status: CallStatusSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
  destinationUrl: z.string().optional(),
  metadata: z.record(z.string()).default({}),
  conversationState: ConversationStateSchema,
  extractedFields: ExtractedFieldsSchema.default({}),
  employmentPeriods: z.array(EmploymentPeriodSchema).default([]),
  employmentGaps: z.array(EmploymentGapSchema).default([]),
  adversarialScore: z.number().min(0).default(0),
  failureReason: z.string().optional(),
  deliveryEventId: z.string().optional(),
  /** Set when the call was dialed from the call queue. */
  queueId: z.string().optional(),
});
export type CallSession = z.infer<typeof CallSessionSchema>;

export type SessionInit = Partial<Pick<CallSession, 'status' | 'destinationUrl' | 'metadata' | 'queueId'>>;

/** Fields a caller may change; identity and creation time are fixed for the life of a call. */
export type SessionPatch = Partial<
  Omit<CallSession, 'callId' | 'callerIdentityHash' | 'createdAt' | 'updatedAt' | 'queueId'>
>;
