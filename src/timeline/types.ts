import { z } from 'zod';

export const GapSeveritySchema = z.enum(['minor', 'moderate', 'major', 'critical']);
export type GapSeverity = z.infer<typeof GapSeveritySchema>;

export const GapReasonSchema = z.enum(['family', 'education', 'health', 'economic', 'personal']);
export type GapReason = z.infer<typeof GapReasonSchema>;

/** Employment facts pulled from a single conversational turn. */
export const EmploymentFragmentSchema = z.object({
  years: z.array(z.number().int()),
  employer: z.string().min(1).optional(),
  title: z.string().min(1).optional(),
  industry: z.string().min(1).optional(),
  turn: z.number().int().nonnegative(),
});
export type EmploymentFragment = z.infer<typeof EmploymentFragmentSchema>;

export const EmploymentPeriodSchema = z.object({
  startYear: z.number().int(),
  /** Absent for a single-year period. */
  endYear: z.number().int().optional(),
  employer: z.string().optional(),
  title: z.string().optional(),
  industry: z.string().optional(),
  confidence: z.number().min(0).max(1),
  source: z.enum(['extracted', 'inferred']),
});
export type EmploymentPeriod = z.infer<typeof EmploymentPeriodSchema>;

export const EmploymentGapSchema = z.object({
  startYear: z.number().int(),
  endYear: z.number().int(),
  sizeYears: z.number().int().positive(),
  severity: GapSeveritySchema,
  suggestedIndustries: z.array(z.string()),
  followUpQuestions: z.array(z.string()),
  resolved: z.boolean(),
});
export type EmploymentGap = z.infer<typeof EmploymentGapSchema>;

/** A caller's account of what they were doing during a span of years. */
export const GapExplanationSchema = z.object({
  startYear: z.number().int(),
  endYear: z.number().int(),
  reason: GapReasonSchema,
  note: z.string(),
});
export type GapExplanation = z.infer<typeof GapExplanationSchema>;

export interface SeverityThresholds {
  minorMaxYears: number;
  moderateMaxYears: number;
  majorMaxYears: number;
}

export interface TimelineAssessment {
  totalTimelineYears: number;
  coveredYears: number;
  gapYears: number;
  completenessScore: number;
  totalGaps: number;
  unresolvedGaps: number;
  criticalGaps: number;
  majorGaps: number;
  needsAttention: boolean;
}

export interface TimelineAnalysis {
  periods: EmploymentPeriod[];
  gaps: EmploymentGap[];
  assessment: TimelineAssessment;
  recommendations: string[];
}

export interface ConversationStrategy {
  approach: 'standard' | 'gap_focused';
  focusAreas: string[];
  conversationTips: string[];
  expectedDifficulty: 'normal' | 'high';
}
