import { log } from '../log';

export function logCallEvent(
  event: string,
  callId: string,
  payload: Record<string, unknown> = {},
): void {
  log.info({ event, call_id: callId, ...payload }, event.replace(/_/g, ' '));
}
