import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import type { InterviewReply, InterviewReplyInput, InterviewReplyResult, ReplyGenerator } from '../src/ai/brainClient';
import type { CallSession } from '../src/calls/types';
import type { EngineConfig } from '../src/conversation/conversationEngine';
import type { ConversationState } from '../src/conversation/types';

setTestEnv();

const NOW = Date.UTC(2024, 5, 1);
const NOW_ISO = '2024-06-01T00:00:00.000Z';

function reply(
  text: string,
  extractedFields: InterviewReply['extractedFields'] = {},
  analysis: Partial<InterviewReply['analysis']> = {},
): InterviewReplyResult {
  return {
    ok: true,
    source: 'brain_http',
    reply: {
      reply: text,
      extractedFields,
      analysis: { isRelevant: true, missingFields: [], isComplete: false, ...analysis },
    },
  };
}

const failure: InterviewReplyResult = { ok: false, source: 'fallback_error', error: 'brain reply failed 503: down' };

function scripted(...results: InterviewReplyResult[]): { inputs: InterviewReplyInput[]; generate: ReplyGenerator } {
  const inputs: InterviewReplyInput[] = [];
  const generate: ReplyGenerator = async (input) => {
    inputs.push(input);
    const next = results.shift();
    if (!next) {
      throw new Error('no scripted reply left');
    }
    return next;
  };
  return { inputs, generate };
}

async function newSession(overrides: Partial<CallSession> = {}, state: Partial<ConversationState> = {}): Promise<CallSession> {
  const { initialConversationState } = await import('../src/conversation/types');
  return {
    callId: 'call-1',
    callerIdentityHash: 'abc123',
    status: 'queued',
    createdAt: '2024-06-01T00:00:00.000Z',
    updatedAt: '2024-06-01T00:00:00.000Z',
    metadata: {},
    extractedFields: {},
    employmentPeriods: [],
    employmentGaps: [],
    adversarialScore: 0,
    ...overrides,
    conversationState: { ...initialConversationState(), ...state },
  };
}

async function engineWith(generate: ReplyGenerator, config: Partial<EngineConfig> = {}) {
  const { ConversationEngine } = await import('../src/conversation/conversationEngine');
  return new ConversationEngine({ generateReply: generate, clock: () => NOW, config });
}

const NAMED = { full_name: [{ value: 'Sam Reyes', confidence: 0.9, capturedAt: NOW_ISO }] };

test('first turn captures the name and asks the local interviewer question', async () => {
  const { createBrainClient } = await import('../src/ai/brainClient');
  const engine = await engineWith(createBrainClient({ baseUrl: undefined }));

  const outcome = await engine.processTurn(await newSession(), 'My name is Sam Reyes');

  assert.equal(outcome.message, 'Where are you working now, or where did you work most recently?');
  assert.equal(outcome.nextAction, 'continue');
  assert.equal(outcome.stage, 'employment');
  assert.equal(outcome.replySource, 'brain_local_default');
  assert.equal(outcome.terminationReason, undefined);

  const session = outcome.updatedSession;
  assert.equal(session.status, 'active');
  assert.deepEqual(session.extractedFields, {
    full_name: [{ value: 'Sam Reyes', confidence: 0.6, capturedAt: NOW_ISO }],
  });
  assert.equal(session.conversationState.turnCount, 1);
  assert.equal(session.conversationState.completeness, 0);
  assert.deepEqual(session.conversationState.recentUtterances, ['My name is Sam Reyes']);
  assert.deepEqual(
    session.conversationState.recentTurns.map((turn) => [turn.role, turn.text]),
    [
      ['user', 'My name is Sam Reyes'],
      ['assistant', 'Where are you working now, or where did you work most recently?'],
    ],
  );
});

test('employment answers build the timeline and move to gap resolution', async () => {
  const { inputs, generate } = scripted(
    reply('What were you doing between 2002 and 2009?', {
      employerName: 'Acme Steel',
      skills: ['welding', 'forklift'],
      phone_number: '5550100000',
    }),
    reply('Did you go to high school, college or a trade school?'),
  );
  const engine = await engineWith(generate);
  const session = await newSession(
    { status: 'active', extractedFields: NAMED },
    { stage: 'employment', turnCount: 1, fragments: [{ years: [2010, 2015], employer: 'Beta Foods', turn: 1 }] },
  );

  const outcome = await engine.processTurn(session, 'I worked at Acme Steel from 1995 to 2001 as a welder');

  assert.equal(outcome.stage, 'gap_resolution');
  assert.equal(outcome.nextAction, 'continue');
  assert.equal(outcome.message, 'What were you doing between 2002 and 2009?');
  assert.equal(inputs[0].context.stage, 'gap_resolution');
  assert.deepEqual(inputs[0].context.gaps.map((gap) => [gap.startYear, gap.endYear, gap.severity]), [
    [2002, 2009, 'major'],
  ]);

  const updated = outcome.updatedSession;
  assert.deepEqual(updated.extractedFields.employer_name, [
    { value: 'Acme Steel', confidence: 0.6, capturedAt: NOW_ISO },
  ]);
  assert.deepEqual(
    updated.extractedFields.skills.map((capture) => [capture.value, capture.confidence]),
    [
      ['welding', 0.9],
      ['forklift', 0.9],
    ],
  );
  assert.equal(updated.extractedFields.phone_number, undefined);
  assert.equal(updated.conversationState.completeness, 0.8);
  assert.deepEqual(updated.conversationState.fragments[1], {
    years: [1995, 2001],
    turn: 2,
    employer: 'Acme Steel',
    title: 'welder',
  });
  assert.equal(updated.employmentPeriods.length, 2);
  assert.deepEqual(updated.conversationState.focusedGap, { startYear: 2002, endYear: 2009 });

  const next = await engine.processTurn(updated, 'I was raising my kids during those years');

  assert.equal(next.stage, 'education');
  assert.deepEqual(next.updatedSession.conversationState.gapExplanations, [
    { startYear: 2002, endYear: 2009, reason: 'family', note: 'I was raising my kids during those years' },
  ]);
  assert.equal(next.updatedSession.employmentGaps[0].resolved, true);
  assert.equal(next.updatedSession.conversationState.focusedGap, undefined);
});

test('completeness above the threshold ends the call with the closing prompt', async () => {
  const { generate } = scripted(reply('And what was the degree?', { school_name: 'Lincoln High', degree: 'diploma' }));
  const engine = await engineWith(generate);
  const session = await newSession(
    {
      status: 'active',
      extractedFields: {
        ...NAMED,
        employer_name: [{ value: 'Acme', confidence: 0.9, capturedAt: NOW_ISO }],
        job_title: [{ value: 'welder', confidence: 0.9, capturedAt: NOW_ISO }],
        start_date: [{ value: '1995', confidence: 0.9, capturedAt: NOW_ISO }],
        end_date: [{ value: '2001', confidence: 0.9, capturedAt: NOW_ISO }],
      },
    },
    { stage: 'education', turnCount: 4 },
  );

  const outcome = await engine.processTurn(session, 'I went to Lincoln High and got my diploma');

  assert.equal(outcome.terminationReason, 'data_complete');
  assert.equal(outcome.nextAction, 'complete');
  assert.equal(outcome.message, "Thank you, that's everything I need. We'll be in touch. Have a great day!");
  assert.equal(outcome.updatedSession.conversationState.completeness, 0.9);
  assert.equal(outcome.updatedSession.conversationState.isComplete, true);
  assert.equal(outcome.updatedSession.conversationState.terminationReason, 'data_complete');
});

test('caller asking to leave ends the call', async () => {
  const { generate } = scripted(reply('Before you go, where did you work?'));
  const engine = await engineWith(generate);

  const outcome = await engine.processTurn(await newSession(), 'Sorry, I have to go now');

  assert.equal(outcome.terminationReason, 'caller_ended');
  assert.equal(outcome.message, 'No problem. Thanks for your time today. Goodbye!');
});

test('model completion keeps the model reply as the final message', async () => {
  const flagged = scripted(reply('Thanks so much, we are all set.', {}, { isComplete: true }));
  const byFlag = await (await engineWith(flagged.generate)).processTurn(await newSession(), 'Nothing else to add');
  assert.equal(byFlag.terminationReason, 'model_complete');
  assert.equal(byFlag.message, 'Thanks so much, we are all set.');

  const phrased = scripted(reply('Great, I have all the information I need.'));
  const byPhrase = await (await engineWith(phrased.generate)).processTurn(await newSession(), 'Nothing else to add');
  assert.equal(byPhrase.terminationReason, 'model_complete');
});

test('a failed reply records nothing and asks again', async () => {
  const { generate } = scripted(failure);
  const engine = await engineWith(generate);

  const outcome = await engine.processTurn(await newSession(), 'My name is Sam Reyes');

  assert.equal(outcome.message, "Sorry, I didn't quite catch that. Could you tell me a little more?");
  assert.equal(outcome.nextAction, 'continue');
  assert.equal(outcome.replySource, 'fallback_error');
  assert.deepEqual(outcome.updatedSession.extractedFields, {});
  assert.equal(outcome.updatedSession.conversationState.fallbackTurns, 1);
  assert.equal(outcome.updatedSession.conversationState.lastReplySource, 'fallback_error');
});

test('adversarial score accumulates even when the reply fails', async () => {
  const { generate } = scripted(failure);
  const engine = await engineWith(generate);

  const outcome = await engine.processTurn(await newSession({ adversarialScore: 4 }), 'No.');

  assert.equal(outcome.updatedSession.adversarialScore, 9);
  assert.equal(outcome.terminationReason, undefined);
});

test('turn ceiling still applies after a failed reply', async () => {
  const { generate } = scripted(failure);
  const engine = await engineWith(generate, { maxTurns: 3 });

  const outcome = await engine.processTurn(await newSession({}, { turnCount: 2 }), 'Hello?');

  assert.equal(outcome.terminationReason, 'max_turns');
  assert.equal(outcome.message, "We're out of time for today. Thank you for everything you shared. Goodbye!");
});

test('hostile callers are let go at the adversarial limit', async () => {
  const { generate } = scripted(reply('Could you tell me your full name?'));
  const engine = await engineWith(generate, { adversarialTerminateScore: 5 });

  const outcome = await engine.processTurn(await newSession(), 'No.');

  assert.equal(outcome.terminationReason, 'adversarial_limit');
  assert.equal(outcome.message, "I'll let you go for now. Thank you for your time. Goodbye!");
});

test('an off-topic reply keeps the turn but records no fields', async () => {
  const { generate } = scripted(reply('Could you repeat that?', { full_name: 'Sam Reyes' }, { isRelevant: false }));
  const engine = await engineWith(generate);

  const outcome = await engine.processTurn(await newSession(), 'My name is Sam Reyes');

  assert.equal(outcome.message, 'Could you repeat that?');
  assert.deepEqual(outcome.updatedSession.extractedFields, {});
  assert.equal(outcome.updatedSession.conversationState.fallbackTurns, 0);
});

test('only the configured history window is sent and kept', async () => {
  const { inputs, generate } = scripted(reply('Where do you work?'));
  const engine = await engineWith(generate, { historyWindow: 2 });
  const session = await newSession({}, {
    turnCount: 1,
    recentTurns: [
      { role: 'assistant', text: 'Hi there', at: NOW_ISO },
      { role: 'user', text: 'Hello', at: NOW_ISO },
      { role: 'assistant', text: 'Your name?', at: NOW_ISO },
    ],
  });

  const outcome = await engine.processTurn(session, 'Sam Reyes');

  assert.deepEqual(inputs[0].recentTurns, [
    { role: 'assistant', text: 'Your name?' },
    { role: 'user', text: 'Sam Reyes' },
  ]);
  assert.deepEqual(
    outcome.updatedSession.conversationState.recentTurns.map((turn) => turn.text),
    ['Sam Reyes', 'Where do you work?'],
  );
});

test('a reluctant caller is flagged in the prompt context', async () => {
  const { inputs, generate } = scripted(reply('Take your time. Where did you work?'));
  const engine = await engineWith(generate);

  await engine.processTurn(await newSession({ adversarialScore: 10 }, { turnCount: 1 }), 'No.');

  assert.equal(inputs[0].context.guarded, true);
  assert.match(inputs[0].systemContext, /The caller seems reluctant\./);
});

test('adversarial level buckets the per-turn average', async () => {
  const { adversarialLevel } = await import('../src/conversation/conversationEngine');

  assert.equal(adversarialLevel(10, 2), 'high');
  assert.equal(adversarialLevel(6, 2), 'medium');
  assert.equal(adversarialLevel(4, 2), 'low');
  assert.equal(adversarialLevel(0, 0), 'low');
});

test('model fields are normalized and empty values dropped', async () => {
  const { modelFieldCandidates } = await import('../src/conversation/conversationEngine');

  assert.deepEqual(
    modelFieldCandidates({
      fullName: 'Sam Reyes',
      skills: ['welding', 3],
      phone: '5550100000',
      degree: null,
      school_name: 'unknown',
    }),
    [
      { field: 'full_name', value: 'Sam Reyes', confidence: 0.9 },
      { field: 'skills', value: 'welding', confidence: 0.9 },
      { field: 'skills', value: '3', confidence: 0.9 },
    ],
  );
});

test('fragments without years wait for a later turn to date them', async () => {
  const { applyFragment, buildFragment } = await import('../src/conversation/conversationEngine');

  assert.equal(buildFragment(3, [1970], [], false), null);
  assert.deepEqual(buildFragment(3, [1998], [], true), { years: [1998], turn: 3 });

  const first = applyFragment([], undefined, { years: [], employer: 'Acme', turn: 1 });
  assert.deepEqual(first, { fragments: [], pending: { years: [], employer: 'Acme', turn: 1 } });

  const second = applyFragment(first.fragments, first.pending, { years: [1990, 1995], turn: 2 });
  assert.deepEqual(second, {
    fragments: [{ years: [1990, 1995], employer: 'Acme', turn: 2 }],
    pending: undefined,
  });

  const repeated = applyFragment(second.fragments, undefined, { years: [1990, 1995], employer: 'ACME', turn: 3 });
  assert.equal(repeated.fragments.length, 1);
});
