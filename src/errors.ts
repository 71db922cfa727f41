export type PipelineErrorCode = 'call_not_found' | 'call_exists' | 'rate_limited' | 'invalid_request';

export class PipelineError extends Error {
  constructor(
    public readonly code: PipelineErrorCode,
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The session expired or never existed. Callers should acknowledge and stop, not retry. */
export class SessionNotFoundError extends PipelineError {
  constructor(public readonly callId: string) {
    super('call_not_found', `call session ${callId} not found`, 404);
  }
}

export class CallExistsError extends PipelineError {
  constructor(public readonly callId: string) {
    super('call_exists', `call session ${callId} already exists`, 409);
  }
}

export class RateLimitedError extends PipelineError {
  constructor(
    public readonly count: number,
    public readonly limit: number,
    public readonly resetAt: Date | null,
  ) {
    super('rate_limited', `caller exceeded ${limit} calls in the current window`, 429);
  }
}

export class InvalidRequestError extends PipelineError {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }> = [],
  ) {
    super('invalid_request', message, 400);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
