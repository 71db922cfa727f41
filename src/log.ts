import pino from 'pino';
import { env } from './env';

export const log = pino({
  level: env.LOG_LEVEL,
  base: { service: 'interview-call-pipeline' },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['phoneNumber', 'phone_number', '*.phoneNumber', '*.phone_number'],
    censor: '[redacted]',
  },
});
