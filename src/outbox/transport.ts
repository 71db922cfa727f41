import { createHmac } from 'node:crypto';
import { fetch } from 'undici';
import type { DeliveryRequest, DeliveryResponse, DeliveryTransport, OutboxEntry } from './types';

export const USER_AGENT = 'interview-call-pipeline/1.0';
const MAX_RESPONSE_PREVIEW = 1000;

/** `sha256=<hex>` over `${timestamp}.${body}`. */
export function signPayload(secret: string, timestamp: string, body: string): string {
  const digest = createHmac('sha256', secret).update(`${timestamp}.${body}`).digest('hex');
  return `sha256=${digest}`;
}

export function buildDeliveryRequest(
  entry: OutboxEntry,
  options: { now: number; timeoutMs: number; signingSecret?: string },
): DeliveryRequest {
  const body = JSON.stringify({
    eventType: entry.eventType,
    eventId: entry.eventId,
    callId: entry.callId,
    timestamp: new Date(options.now).toISOString(),
    profile: entry.payload,
  });
  const timestamp = String(Math.floor(options.now / 1000));

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'User-Agent': USER_AGENT,
    'X-Event-Type': entry.eventType,
    'X-Event-Id': entry.eventId,
    'Idempotency-Key': entry.eventId,
    'X-Call-Id': entry.callId,
    'X-Webhook-Timestamp': timestamp,
  };
  if (options.signingSecret) {
    headers['X-Webhook-Signature'] = signPayload(options.signingSecret, timestamp, body);
  }

  return { url: entry.destinationUrl, headers, body, timeoutMs: options.timeoutMs };
}

export const httpTransport: DeliveryTransport = async (request: DeliveryRequest): Promise<DeliveryResponse> => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

  try {
    const response = await fetch(request.url, {
      method: 'POST',
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    });
    const text = await response.text();
    return { status: response.status, body: text.slice(0, MAX_RESPONSE_PREVIEW) };
  } finally {
    clearTimeout(timeout);
  }
};
