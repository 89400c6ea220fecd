import { z } from 'zod';

export const DISC_LETTERS = ['D', 'I', 'S', 'C'] as const;

export const rawResponseSetSchema = z.record(z.string(), z.unknown());

export const scalarResponseSchema = z.object({
  response: z.union([z.string(), z.number(), z.boolean()]),
});

export const discResponseSchema = z
  .object({
    most_like_me: z.enum(DISC_LETTERS),
    least_like_me: z.enum(DISC_LETTERS),
  })
  .refine((r) => r.most_like_me !== r.least_like_me, {
    message: 'most_like_me and least_like_me must differ',
  });

export const attemptSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]),
  assessmentName: z.string().min(1),
  isCompleted: z.boolean(),
  rawResults: z.unknown().optional(),
});

export const scoredAttemptSchema = attemptSchema.extend({
  assessmentId: z.union([z.string().min(1), z.number().int()]),
  processedResults: z.record(z.string(), z.unknown()).nullable().optional(),
});

export const packageSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]),
  name: z.string().min(1),
  assessmentIds: z.array(z.union([z.string().min(1), z.number().int()])),
});

export const aggregationInputSchema = z.object({
  userId: z.union([z.string().min(1), z.number().int()]),
  package: packageSchema,
  attempts: z.array(scoredAttemptSchema),
});

export type RawResponseSet = z.infer<typeof rawResponseSetSchema>;
export type ScalarResponse = z.infer<typeof scalarResponseSchema>;
export type DiscLetter = (typeof DISC_LETTERS)[number];
export type DiscResponse = z.infer<typeof discResponseSchema>;
export type Attempt = z.infer<typeof attemptSchema>;
export type ScoredAttempt = z.infer<typeof scoredAttemptSchema>;
export type AssessmentPackage = z.infer<typeof packageSchema>;
export type AggregationInput = z.infer<typeof aggregationInputSchema>;
