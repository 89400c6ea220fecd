import { rawResponseSetSchema } from '../schema';

export type GenericSummary = {
  generic_summary: {
    assessment_name: string;
    total_questions_answered: number;
    processed_at: string;
  };
};

/** Fallback for instruments without a dedicated scorer; never rejects input. */
export function summarizeResponses(assessmentName: string, raw: unknown, now: () => Date): GenericSummary {
  const parsed = rawResponseSetSchema.safeParse(raw);
  return {
    generic_summary: {
      assessment_name: assessmentName,
      total_questions_answered: parsed.success ? Object.keys(parsed.data).length : 0,
      processed_at: now().toISOString(),
    },
  };
}
