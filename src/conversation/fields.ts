import type { EmploymentGap } from '../timeline/types';
import type { ConversationStage, ExtractedFields, FieldCapture } from './types';

export const FIELD_CATEGORIES = {
  identity: ['full_name'],
  employment: ['employer_name', 'job_title', 'start_date', 'end_date'],
  education: ['school_name', 'degree'],
  skills: ['skills'],
} as const;

export type FieldCategory = keyof typeof FIELD_CATEGORIES;

export const CATEGORY_ORDER: readonly FieldCategory[] = ['identity', 'employment', 'education', 'skills'];

/** Fields that carry most of the completeness score. */
export const REQUIRED_FIELDS: readonly string[] = FIELD_CATEGORIES.employment;
export const OPTIONAL_FIELDS: readonly string[] = [...FIELD_CATEGORIES.education, ...FIELD_CATEGORIES.skills];

/** Never stored even when a model returns them. */
const IGNORED_FIELDS = new Set(['phone_number', 'phone']);

export interface FieldCandidate {
  field: string;
  value: string;
  confidence: number;
}

export interface CompletenessWeights {
  required: number;
  optional: number;
}

export function normalizeFieldName(name: string): string {
  return name
    .trim()
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .replace(/[\s-]+/g, '_')
    .toLowerCase();
}

function comparable(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function isIgnoredField(name: string): boolean {
  return IGNORED_FIELDS.has(normalizeFieldName(name));
}

/**
 * Appends new captures to the per-field lists. A value already present for the
 * same field (compared case- and whitespace-insensitively) is not added again,
 * so replaying the same candidates leaves the fields unchanged.
 */
export function mergeExtractedFields(
  existing: ExtractedFields,
  candidates: FieldCandidate[],
  capturedAt: string,
): { fields: ExtractedFields; added: number } {
  const fields: ExtractedFields = {};
  for (const [name, captures] of Object.entries(existing)) {
    fields[name] = [...captures];
  }

  let added = 0;
  for (const candidate of candidates) {
    const name = normalizeFieldName(candidate.field);
    const value = candidate.value.trim().replace(/\s+/g, ' ');
    if (!name || !value || IGNORED_FIELDS.has(name)) {
      continue;
    }

    const list = fields[name] ?? [];
    if (list.some((capture) => comparable(capture.value) === comparable(value))) {
      continue;
    }

    const capture: FieldCapture = {
      value,
      confidence: Math.min(1, Math.max(0, candidate.confidence)),
      capturedAt,
    };
    fields[name] = [...list, capture];
    added += 1;
  }

  return { fields, added };
}

export function hasField(fields: ExtractedFields, name: string, threshold: number): boolean {
  return (fields[name] ?? []).some((capture) => capture.confidence >= threshold);
}

export function bestValue(fields: ExtractedFields, name: string): string | undefined {
  let best: FieldCapture | undefined;
  for (const capture of fields[name] ?? []) {
    if (!best || capture.confidence > best.confidence) {
      best = capture;
    }
  }
  return best?.value;
}

export function missingFields(fields: ExtractedFields, threshold: number): string[] {
  const missing: string[] = [];
  for (const category of CATEGORY_ORDER) {
    const names: readonly string[] = FIELD_CATEGORIES[category];
    for (const name of names) {
      if (!hasField(fields, name, threshold)) {
        missing.push(name);
      }
    }
  }
  return missing;
}

/**
 * Weighted share of required and optional fields that have been captured.
 * Confidence is ignored here; a field either has a value or it does not.
 */
export function completenessScore(fields: ExtractedFields, weights: CompletenessWeights): number {
  const present = (name: string): boolean => (fields[name] ?? []).length > 0;
  const requiredShare = REQUIRED_FIELDS.filter(present).length / REQUIRED_FIELDS.length;
  const optionalShare = OPTIONAL_FIELDS.filter(present).length / OPTIONAL_FIELDS.length;
  const score = weights.required * requiredShare + weights.optional * optionalShare;
  return Math.round(Math.min(1, score) * 1000) / 1000;
}

function categoryComplete(fields: ExtractedFields, category: FieldCategory, threshold: number): boolean {
  const names: readonly string[] = FIELD_CATEGORIES[category];
  return names.every((name) => hasField(fields, name, threshold));
}

/**
 * Stage is derived from what has been captured, never stored independently:
 * the first category still missing a field wins, and unresolved gaps are
 * worked through once the employment basics are in.
 */
export function deriveStage(
  fields: ExtractedFields,
  gaps: EmploymentGap[],
  threshold: number,
): ConversationStage {
  if (!categoryComplete(fields, 'identity', threshold)) return 'greeting';
  if (!categoryComplete(fields, 'employment', threshold)) return 'employment';
  if (gaps.some((gap) => !gap.resolved)) return 'gap_resolution';
  if (!categoryComplete(fields, 'education', threshold)) return 'education';
  if (!categoryComplete(fields, 'skills', threshold)) return 'skills';
  return 'closing';
}

const YEAR_PATTERN = /\b(?:19|20)\d{2}\b/g;

export function yearsIn(text: string): number[] {
  return (text.match(YEAR_PATTERN) ?? []).map((year) => Number.parseInt(year, 10));
}
