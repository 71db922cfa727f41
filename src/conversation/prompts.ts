import type { ConversationStrategy, EmploymentGap } from '../timeline/types';
import type { ConversationStage, TerminationReason } from './types';

export const GREETING_PROMPT =
  "Hi, thanks for taking our call. I'd like to go over your work history with you. To start, could you tell me your full name?";

export const FALLBACK_PROMPT = "Sorry, I didn't quite catch that. Could you tell me a little more?";

export const FINISHED_PROMPT = 'This call has already ended. Thank you for your time.';

const CLOSING_PROMPTS: Record<TerminationReason, string> = {
  data_complete: "Thank you, that's everything I need. We'll be in touch. Have a great day!",
  model_complete: "Thank you, that's everything I need. We'll be in touch. Have a great day!",
  caller_ended: 'No problem. Thanks for your time today. Goodbye!',
  max_turns: "We're out of time for today. Thank you for everything you shared. Goodbye!",
  adversarial_limit: "I'll let you go for now. Thank you for your time. Goodbye!",
  hangup: 'Thank you for your time. Goodbye!',
};

export function closingPrompt(reason: TerminationReason): string {
  return CLOSING_PROMPTS[reason];
}

export interface InterviewContext {
  stage: ConversationStage;
  turnCount: number;
  missingFields: string[];
  /** Unresolved gaps, highest priority first. */
  gaps: Array<Pick<EmploymentGap, 'startYear' | 'endYear' | 'sizeYears' | 'severity' | 'followUpQuestions'>>;
  strategy: ConversationStrategy;
  /** Caller has been evasive or hostile on recent turns. */
  guarded: boolean;
}

const MAX_CONTEXT_GAPS = 3;

const STAGE_GOALS: Record<ConversationStage, string> = {
  greeting: "Learn the caller's full name.",
  employment: 'Collect employer, job title, start year and end year for each job, most recent first.',
  gap_resolution: 'Ask what the caller was doing during the open gaps in their work history.',
  education: 'Ask about schooling: school name and degree or certificate.',
  skills: 'Ask what skills, tools or equipment the caller is best at.',
  closing: 'Thank the caller and end the interview.',
};

/**
 * Rendered identically for identical input so that replies can be replayed
 * against a recorded context.
 */
export function renderSystemContext(context: InterviewContext): string {
  const lines = [
    'You are a friendly phone interviewer collecting a caller\'s employment history.',
    'Ask one short question at a time. Never ask for a phone number.',
    `Current stage: ${context.stage}. Goal: ${STAGE_GOALS[context.stage]}`,
    `Turn: ${context.turnCount}`,
    `Missing fields: ${context.missingFields.length > 0 ? context.missingFields.join(', ') : 'none'}`,
  ];

  const gaps = context.gaps.slice(0, MAX_CONTEXT_GAPS);
  if (gaps.length > 0) {
    lines.push('Open employment gaps:');
    for (const gap of gaps) {
      const question = gap.followUpQuestions[0] ?? '';
      lines.push(`- ${gap.startYear}-${gap.endYear} (${gap.sizeYears} years, ${gap.severity}): ${question}`);
    }
  }

  if (context.strategy.conversationTips.length > 0) {
    lines.push(`Tips: ${context.strategy.conversationTips.join('; ')}`);
  }

  if (context.guarded) {
    lines.push('The caller seems reluctant. Be patient and reassuring, and keep questions simple.');
  }

  lines.push(
    'Respond with JSON only: {"reply": string, "extractedFields": {field: value}, '
      + '"analysis": {"isRelevant": boolean, "missingFields": string[], "isComplete": boolean}}',
  );

  return lines.join('\n');
}
