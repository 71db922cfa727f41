import { createHash, createHmac } from 'node:crypto';

const HASH_LENGTH = 16;

/** Strips spacing and punctuation; a leading + is kept. */
export function normalizePhoneNumber(phoneNumber: string): string {
  const trimmed = phoneNumber.trim();
  const digits = trimmed.replace(/\D/g, '');
  return trimmed.startsWith('+') ? `+${digits}` : digits;
}

/**
 * One-way identity for rate limiting and session ownership. With a secret the
 * hash is keyed, so the small space of phone numbers cannot be enumerated.
 */
export function hashCallerIdentity(phoneNumber: string, secret?: string): string {
  const normalized = normalizePhoneNumber(phoneNumber);
  const digest = secret
    ? createHmac('sha256', secret).update(normalized).digest('hex')
    : createHash('sha256').update(normalized).digest('hex');
  return digest.slice(0, HASH_LENGTH);
}
