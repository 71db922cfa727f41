import { z } from 'zod';

export type JsonObject = Record<string, unknown>;

export const OutboxEntrySchema = z.object({
  eventId: z.string().min(1),
  callId: z.string().min(1),
  callerIdentityHash: z.string().optional(),
  eventType: z.string().min(1),
  payload: z.record(z.unknown()),
  destinationUrl: z.string().url(),
  createdAt: z.string(),
  retryCount: z.number().int().nonnegative(),
  nextRetryAt: z.string(),
  maxRetries: z.number().int().positive(),
  lastError: z.string().optional(),
  lastStatusCode: z.number().int().optional(),
  lastAttemptAt: z.string().optional(),
});
export type OutboxEntry = z.infer<typeof OutboxEntrySchema>;

export const DeadLetterSchema = OutboxEntrySchema.extend({
  deadLetteredAt: z.string(),
  reason: z.string(),
});
export type DeadLetter = z.infer<typeof DeadLetterSchema>;

export interface EnqueueOptions {
  /** Stable id for an event that may be enqueued more than once; the consumer dedupes on it. */
  eventId?: string;
  eventType?: string;
  callerIdentityHash?: string;
  maxRetries?: number;
}

export interface OutboxConfig {
  prefix: string;
  ttlMs: number;
  maxRetries: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  batchSize: number;
  leaseMs: number;
  timeoutMs: number;
}

export interface DrainStats {
  processed: number;
  delivered: number;
  retried: number;
  deadLettered: number;
  skipped: number;
  errors: number;
}

export interface OutboxStats {
  pending: number;
  dead: number;
}

export interface DeliveryRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
  timeoutMs: number;
}

export interface DeliveryResponse {
  status: number;
  body: string;
}

export type DeliveryTransport = (request: DeliveryRequest) => Promise<DeliveryResponse>;
