import { z } from 'zod';

const QueuedCallStatusSchema = z.enum(['pending', 'dialing', 'completed', 'failed']);

export const QueuedCallSchema = z.object({
  queueId: z.string().min(1),
  /** Needed to dial; kept only on the queue item and never logged. */
  phoneNumber: z.string().min(1),
  destinationUrl: z.string().url().optional(),
  metadata: z.record(z.string()).default({}),
  priority: z.number().int(),
  scheduledAt: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  status: QueuedCallStatusSchema,
  attempts: z.number().int().nonnegative(),
  maxAttempts: z.number().int().positive(),
  /** Session id of the latest dial attempt. */
  callId: z.string().optional(),
  lastError: z.string().optional(),
});
export type QueuedCall = z.infer<typeof QueuedCallSchema>;

export interface QueueCallRequest {
  phoneNumber: string;
  destinationUrl?: string;
  metadata?: Record<string, string>;
  /** Higher dials first among due calls. */
  priority?: number;
  scheduledAt?: Date;
}

export interface BatchEnqueueResult {
  added: number;
  failed: number;
  queueIds: string[];
  total: number;
}

export interface CallQueueStats {
  pending: number;
  dialing: number;
  failed: number;
  total: number;
}

export interface CallQueueConfig {
  prefix: string;
  ttlMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  stallMs: number;
  scanLimit: number;
}
