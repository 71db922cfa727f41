import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import type { ExtractedFields } from '../src/conversation/types';
import type { EmploymentGap } from '../src/timeline/types';

setTestEnv();

const AT = '2024-01-01T00:00:00.000Z';

function fieldsOf(entries: Record<string, number>): ExtractedFields {
  const fields: ExtractedFields = {};
  for (const [name, confidence] of Object.entries(entries)) {
    fields[name] = [{ value: `${name} value`, confidence, capturedAt: AT }];
  }
  return fields;
}

const EMPLOYMENT = { full_name: 0.9, employer_name: 0.9, job_title: 0.9, start_date: 0.9, end_date: 0.9 };

const openGap: EmploymentGap = {
  startYear: 2001,
  endYear: 2004,
  sizeYears: 4,
  severity: 'major',
  suggestedIndustries: [],
  followUpQuestions: [],
  resolved: false,
};

test('field names are normalized to snake case', async () => {
  const { normalizeFieldName } = await import('../src/conversation/fields');

  assert.equal(normalizeFieldName('employerName'), 'employer_name');
  assert.equal(normalizeFieldName(' Job Title '), 'job_title');
  assert.equal(normalizeFieldName('start-date'), 'start_date');
});

test('merge appends new values, skips duplicates and ignored fields', async () => {
  const { mergeExtractedFields } = await import('../src/conversation/fields');

  const candidates = [
    { field: 'employerName', value: 'Acme   Steel', confidence: 0.6 },
    { field: 'employer_name', value: 'acme steel', confidence: 0.9 },
    { field: 'phone', value: '5550100000', confidence: 1 },
    { field: 'job_title', value: '  ', confidence: 0.9 },
    { field: 'skills', value: 'welding', confidence: 1.5 },
  ];
  const first = mergeExtractedFields({}, candidates, AT);

  assert.equal(first.added, 2);
  assert.deepEqual(first.fields, {
    employer_name: [{ value: 'Acme Steel', confidence: 0.6, capturedAt: AT }],
    skills: [{ value: 'welding', confidence: 1, capturedAt: AT }],
  });

  const replay = mergeExtractedFields(first.fields, candidates, '2024-01-02T00:00:00.000Z');
  assert.equal(replay.added, 0);
  assert.deepEqual(replay.fields, first.fields);
});

test('best value is the highest confidence capture', async () => {
  const { bestValue, hasField } = await import('../src/conversation/fields');
  const fields: ExtractedFields = {
    job_title: [
      { value: 'clerk', confidence: 0.6, capturedAt: AT },
      { value: 'supervisor', confidence: 0.9, capturedAt: AT },
    ],
  };

  assert.equal(bestValue(fields, 'job_title'), 'supervisor');
  assert.equal(bestValue(fields, 'degree'), undefined);
  assert.equal(hasField(fields, 'job_title', 0.9), true);
  assert.equal(hasField(fields, 'job_title', 0.95), false);
});

test('missing fields follow category order and respect the threshold', async () => {
  const { missingFields } = await import('../src/conversation/fields');

  assert.deepEqual(missingFields(fieldsOf({ full_name: 0.6, employer_name: 0.4 }), 0.5), [
    'employer_name',
    'job_title',
    'start_date',
    'end_date',
    'school_name',
    'degree',
    'skills',
  ]);
});

test('completeness weighs required and optional fields', async () => {
  const { completenessScore } = await import('../src/conversation/fields');
  const weights = { required: 0.7, optional: 0.3 };

  assert.equal(completenessScore({}, weights), 0);
  assert.equal(completenessScore(fieldsOf(EMPLOYMENT), weights), 0.7);
  assert.equal(completenessScore(fieldsOf({ ...EMPLOYMENT, school_name: 0.2 }), weights), 0.8);
  assert.equal(
    completenessScore(fieldsOf({ ...EMPLOYMENT, school_name: 1, degree: 1, skills: 1 }), weights),
    1,
  );
});

test('stage advances as categories fill and gaps are resolved', async () => {
  const { deriveStage } = await import('../src/conversation/fields');

  assert.equal(deriveStage({}, [], 0.5), 'greeting');
  assert.equal(deriveStage(fieldsOf({ full_name: 0.9 }), [], 0.5), 'employment');
  assert.equal(deriveStage(fieldsOf(EMPLOYMENT), [openGap], 0.5), 'gap_resolution');
  assert.equal(deriveStage(fieldsOf(EMPLOYMENT), [{ ...openGap, resolved: true }], 0.5), 'education');
  assert.equal(deriveStage(fieldsOf({ ...EMPLOYMENT, school_name: 0.9, degree: 0.9 }), [], 0.5), 'skills');
  assert.equal(
    deriveStage(fieldsOf({ ...EMPLOYMENT, school_name: 0.9, degree: 0.9, skills: 0.9 }), [], 0.5),
    'closing',
  );
});

test('yearsIn finds four digit years', async () => {
  const { yearsIn } = await import('../src/conversation/fields');

  assert.deepEqual(yearsIn('from 1995 to 2001, not 12345'), [1995, 2001]);
});
