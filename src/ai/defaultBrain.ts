import type { InterviewContext } from '../conversation/prompts';
import type { InterviewReply } from './brainClient';

const FIELD_QUESTIONS: Record<string, string> = {
  full_name: 'Could you tell me your full name?',
  employer_name: 'Where are you working now, or where did you work most recently?',
  job_title: 'What was your job title there?',
  start_date: 'What year did you start that job?',
  end_date: 'And what year did that job end, or are you still there?',
  school_name: 'Did you go to high school, college or a trade school? Which school was it?',
  degree: 'Did you finish with a diploma, degree or certificate?',
  skills: 'What skills, tools or equipment are you best with?',
};

const CLOSING_REPLY = "Thank you, that's everything I need. We'll be in touch. Have a great day!";

/**
 * Deterministic interviewer used when no brain URL is configured: asks the
 * next question the context calls for and extracts nothing itself.
 */
export function defaultInterviewReply(context: InterviewContext): InterviewReply {
  if (context.stage === 'closing') {
    return {
      reply: CLOSING_REPLY,
      extractedFields: {},
      analysis: { isRelevant: true, missingFields: [], isComplete: true },
    };
  }

  let question: string;
  if (context.stage === 'gap_resolution' && context.gaps.length > 0) {
    const gap = context.gaps[0];
    question = gap.followUpQuestions[0] ?? `What were you doing between ${gap.startYear} and ${gap.endYear}?`;
  } else {
    const next = context.missingFields.find((field) => FIELD_QUESTIONS[field] !== undefined);
    question = next ? FIELD_QUESTIONS[next] : 'Is there anything else about your work history you would like to add?';
  }

  return {
    reply: context.guarded ? `No problem, take your time. ${question}` : question,
    extractedFields: {},
    analysis: { isRelevant: true, missingFields: context.missingFields, isComplete: false },
  };
}
