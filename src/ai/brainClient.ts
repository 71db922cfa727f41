import { z } from 'zod';
import { env } from '../env';
import { log } from '../log';
import type { InterviewContext } from '../conversation/prompts';
import { defaultInterviewReply } from './defaultBrain';

export interface InterviewTurn {
  role: 'user' | 'assistant';
  text: string;
}

export interface InterviewReplyInput {
  callId: string;
  systemContext: string;
  recentTurns: InterviewTurn[];
  /** Structured form of systemContext; only the local interviewer reads it. */
  context: InterviewContext;
}

const FieldValueSchema = z.union([
  z.string(),
  z.number(),
  z.array(z.union([z.string(), z.number()])),
  z.null(),
]);

export const InterviewReplySchema = z.object({
  reply: z.string().trim().min(1),
  extractedFields: z.record(FieldValueSchema).default({}),
  analysis: z
    .object({
      isRelevant: z.boolean().default(true),
      missingFields: z.array(z.string()).default([]),
      isComplete: z.boolean().default(false),
    })
    .default({}),
});

export type InterviewReply = z.infer<typeof InterviewReplySchema>;

export type InterviewReplySource = 'brain_http' | 'brain_local_default' | 'fallback_error';

export type InterviewReplyResult =
  | { ok: true; source: Exclude<InterviewReplySource, 'fallback_error'>; reply: InterviewReply }
  | { ok: false; source: 'fallback_error'; error: string };

export type ReplyGenerator = (input: InterviewReplyInput) => Promise<InterviewReplyResult>;

export interface BrainClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

function buildBrainUrl(base: string): string {
  const trimmed = base.replace(/\/$/, '');
  if (trimmed.endsWith('/interview')) {
    return trimmed;
  }
  return `${trimmed}/interview`;
}

async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    log.debug({ err: error, event: 'brain_body_unreadable' }, 'brain body unreadable');
    return '';
  }
}

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Models often wrap the JSON object in a markdown fence or pad it with prose;
 * take the fenced block when there is one, else the outermost braces.
 */
export function extractJsonObject(raw: string): unknown {
  const fenced = FENCE_PATTERN.exec(raw);
  let candidate = (fenced ? fenced[1] : raw).trim();

  if (!candidate.startsWith('{')) {
    const start = candidate.indexOf('{');
    const end = candidate.lastIndexOf('}');
    if (start === -1 || end <= start) {
      throw new Error('brain reply is not a JSON object');
    }
    candidate = candidate.slice(start, end + 1);
  }

  return JSON.parse(candidate);
}

export function parseInterviewReply(raw: string): InterviewReply {
  const parsed = InterviewReplySchema.safeParse(extractJsonObject(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'reply'}: ${issue.message}`)
      .join(', ');
    throw new Error(`brain reply invalid: ${issues}`);
  }
  return parsed.data;
}

export function createBrainClient(options: BrainClientOptions = {}): ReplyGenerator {
  const baseUrl = options.baseUrl ?? env.BRAIN_URL;
  const timeoutMs = options.timeoutMs ?? env.BRAIN_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (input: InterviewReplyInput): Promise<InterviewReplyResult> => {
    if (!baseUrl) {
      log.debug(
        { event: 'brain_route', source: 'brain_local_default', call_id: input.callId, has_brain_url: false },
        'brain routed to local default',
      );
      return { ok: true, source: 'brain_local_default', reply: defaultInterviewReply(input.context) };
    }

    const url = buildBrainUrl(baseUrl);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          callId: input.callId,
          systemContext: input.systemContext,
          recentTurns: input.recentTurns,
        }),
        signal: controller.signal,
      });

      const body = await readResponseText(response);
      if (!response.ok) {
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        throw new Error(`brain reply failed ${response.status}: ${preview}`);
      }

      return { ok: true, source: 'brain_http', reply: parseInterviewReply(body) };
    } catch (error) {
      log.error(
        {
          err: error,
          event: 'brain_reply_failed',
          call_id: input.callId,
        },
        'brain reply failed',
      );
      return {
        ok: false,
        source: 'fallback_error',
        error: error instanceof Error ? error.message : String(error),
      };
    } finally {
      clearTimeout(timeout);
    }
  };
}
