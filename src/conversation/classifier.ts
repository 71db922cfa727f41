import type { GapReason } from '../timeline/types';
import type { FieldCandidate } from './fields';
import lexicon from './lexicon.json';

export const HEURISTIC_CONFIDENCE = 0.6;
export const MAX_TURN_SCORE = 10;
const EARLIEST_YEAR = 1940;
const REPEAT_LOOKBACK = 3;
const MAX_EMPLOYER_WORDS = 4;

export type AdversarialSignal = 'short_answer' | 'evasive' | 'hostile' | 'self_correction' | 'repetition';

const SIGNAL_WEIGHTS: Record<AdversarialSignal, number> = {
  short_answer: 2,
  evasive: 2,
  hostile: 3,
  self_correction: 1,
  repetition: 2,
};

export interface ClassifierContext {
  /** Earlier caller utterances, oldest first. */
  recentUtterances: string[];
  currentYear: number;
  /** The last question was about jobs, so a pair of years reads as a job's start and end. */
  expectingEmployment: boolean;
}

export interface Classification {
  score: number;
  signals: AdversarialSignal[];
  fields: FieldCandidate[];
  years: number[];
  terminationRequested: boolean;
  gapReason?: { reason: GapReason; phrase: string };
}

export interface UtteranceClassifier {
  classify(utterance: string, context: ClassifierContext): Classification;
}

export function normalizeUtterance(text: string): string {
  return text
    .replace(/[‘’]/g, "'")
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word match, so "no" does not fire on "know" or "bye" on "goodbye". */
export function containsPhrase(normalized: string, phrase: string): boolean {
  const pattern = new RegExp(`(?:^|[^a-z0-9'])${escapeRegExp(phrase)}(?:$|[^a-z0-9'])`);
  return pattern.test(normalized);
}

function firstPhrase(normalized: string, phrases: readonly string[]): string | undefined {
  return phrases.find((phrase) => containsPhrase(normalized, phrase));
}

function phraseIndex(normalized: string, phrase: string): number {
  const pattern = new RegExp(`(?:^|[^a-z0-9'])(${escapeRegExp(phrase)})(?:$|[^a-z0-9'])`);
  const match = pattern.exec(normalized);
  if (!match) {
    return -1;
  }
  return match.index + match[0].indexOf(match[1]);
}

const NAME_PATTERN = /^\s+([A-Z][A-Za-z'-]+(?:\s+[A-Z][A-Za-z'-]+){0,2})/;
const EMPLOYER_STOP_WORDS = new Set([
  'from', 'in', 'as', 'since', 'until', 'till', 'for', 'between', 'during', 'and', 'when', 'where',
  'back', 'about', 'around', 'doing', 'then', 'but',
]);

/** Same spacing as normalizeUtterance, original casing kept, so indexes line up. */
function collapse(text: string): string {
  return text.replace(/[‘’]/g, "'").replace(/\s+/g, ' ').trim();
}

function extractName(original: string, normalized: string): string | undefined {
  for (const indicator of lexicon.nameIndicators) {
    const index = phraseIndex(normalized, indicator);
    if (index < 0) continue;
    const match = NAME_PATTERN.exec(original.slice(index + indicator.length));
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

function extractEmployer(original: string, normalized: string): string | undefined {
  for (const indicator of lexicon.companyIndicators) {
    const index = phraseIndex(normalized, indicator);
    if (index < 0) continue;

    const words: string[] = [];
    for (const raw of original.slice(index + indicator.length).trim().split(' ')) {
      const word = raw.replace(/^[^A-Za-z0-9&]+/, '');
      const stripped = word.replace(/[^A-Za-z0-9&]+$/, '');
      if (!stripped || EMPLOYER_STOP_WORDS.has(stripped.toLowerCase()) || /^\d{4}$/.test(stripped)) {
        break;
      }
      words.push(stripped);
      // trailing punctuation ends the name
      if (stripped !== word || words.length >= MAX_EMPLOYER_WORDS) {
        break;
      }
    }

    const employer = words.join(' ').replace(/^(?:the|a|an)\s+/i, '');
    if (employer) {
      return employer;
    }
  }
  return undefined;
}

function extractYears(normalized: string, currentYear: number): number[] {
  const years = new Set<number>();
  for (const match of normalized.match(/\b(?:19|20)\d{2}\b/g) ?? []) {
    const year = Number.parseInt(match, 10);
    if (year >= EARLIEST_YEAR && year <= currentYear) {
      years.add(year);
    }
  }
  return [...years].sort((a, b) => a - b);
}

function detectGapReason(normalized: string): Classification['gapReason'] {
  const reasons: Array<[GapReason, string[]]> = [
    ['family', lexicon.gapReasons.family],
    ['education', lexicon.gapReasons.education],
    ['health', lexicon.gapReasons.health],
    ['economic', lexicon.gapReasons.economic],
    ['personal', lexicon.gapReasons.personal],
  ];
  for (const [reason, phrases] of reasons) {
    const phrase = firstPhrase(normalized, phrases);
    if (phrase) {
      return { reason, phrase };
    }
  }
  return undefined;
}

/**
 * Keyword scoring and extraction. Runs before the language model on every
 * turn and is the only extractor when no model is configured.
 */
export class HeuristicClassifier implements UtteranceClassifier {
  classify(utterance: string, context: ClassifierContext): Classification {
    const original = collapse(utterance);
    const normalized = normalizeUtterance(utterance);

    const signals: AdversarialSignal[] = [];
    const wordCount = normalized === '' ? 0 : normalized.split(' ').length;
    if (wordCount <= 2) signals.push('short_answer');
    if (firstPhrase(normalized, lexicon.evasivePhrases)) signals.push('evasive');
    if (firstPhrase(normalized, lexicon.hostilePhrases)) signals.push('hostile');
    if (firstPhrase(normalized, lexicon.correctionPhrases)) signals.push('self_correction');

    const previous = context.recentUtterances.slice(-REPEAT_LOOKBACK).map(normalizeUtterance);
    if (normalized !== '' && previous.includes(normalized)) signals.push('repetition');

    const score = Math.min(
      MAX_TURN_SCORE,
      signals.reduce((sum, signal) => sum + SIGNAL_WEIGHTS[signal], 0),
    );

    const fields: FieldCandidate[] = [];
    const add = (field: string, value: string | undefined): void => {
      if (value) fields.push({ field, value, confidence: HEURISTIC_CONFIDENCE });
    };

    const employer = extractEmployer(original, normalized);
    const title = firstPhrase(normalized, lexicon.jobTitles);
    add('full_name', extractName(original, normalized));
    add('employer_name', employer);
    add('job_title', title);
    add('industry', firstPhrase(normalized, lexicon.industries));

    const years = extractYears(normalized, context.currentYear);
    if (years.length >= 2 && (employer || title || context.expectingEmployment)) {
      add('start_date', String(years[0]));
      add('end_date', String(years[years.length - 1]));
    }

    return {
      score,
      signals,
      fields,
      years,
      terminationRequested: firstPhrase(normalized, lexicon.terminationPhrases) !== undefined,
      gapReason: detectGapReason(normalized),
    };
  }
}

export function isClosingReply(reply: string): boolean {
  return firstPhrase(normalizeUtterance(reply), lexicon.closingPhrases) !== undefined;
}
