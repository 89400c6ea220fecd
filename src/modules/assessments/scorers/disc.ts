import { z } from 'zod';
import discData from '../data/disc.json';
import { describeIssue, failValidation, ResponseValidationError } from '../errors';
import { orderByScore } from '../interpretation';
import { DISC_LETTERS, DiscLetter, discResponseSchema, RawResponseSet } from '../schema';

export const DISC_QUESTION_COUNT = 24;
/** Top two letters this close together form a combined pattern. */
export const DISC_PATTERN_GAP = 2;
export const DISC_STRESS_THRESHOLD = 10;

const patternInfoSchema = z.object({ name: z.string().min(1), description: z.string().min(1) });

const DISC_DATA = z
  .object({
    patterns: z.record(z.string(), patternInfoSchema),
    stress: z.object({ high: z.string().min(1), low: z.string().min(1) }),
  })
  .parse(discData);

export type DiscScores = Record<DiscLetter, number>;
export type DiscPattern = { id: string; name: string; description: string };
export type DiscProfile = { scores: DiscScores; pattern: DiscPattern };
export type StressLevel = 'high' | 'low';

export type DiscResult = {
  profiles: {
    adaptive: DiscProfile;
    natural: DiscProfile;
    perceived: DiscProfile;
  };
  final_behavioral_pattern: DiscPattern;
  stress_analysis: {
    score: number;
    level: StressLevel;
    threshold: number;
    interpretation: string;
  };
};

const emptyScores = (): DiscScores => ({ D: 0, I: 0, S: 0, C: 0 });

export function scoreDisc(raw: RawResponseSet): DiscResult {
  const entries = Object.entries(raw);
  if (entries.length !== DISC_QUESTION_COUNT) {
    const message = `Expected ${DISC_QUESTION_COUNT} DISC responses, received ${entries.length}`;
    throw new ResponseValidationError(message, { issues: [message] });
  }

  const adaptive = emptyScores();
  const natural = emptyScores();
  const issues: string[] = [];

  for (const [id, entry] of entries) {
    const parsed = discResponseSchema.safeParse(entry);
    if (!parsed.success) {
      issues.push(`question ${id}: ${parsed.error.issues.map(describeIssue).join(', ')}`);
      continue;
    }
    adaptive[parsed.data.most_like_me] += 1;
    natural[parsed.data.least_like_me] += 1;
  }

  if (issues.length) failValidation('Invalid DISC responses', issues);

  const perceived = emptyScores();
  for (const letter of DISC_LETTERS) perceived[letter] = adaptive[letter] - natural[letter];

  const perceivedPattern = behavioralPattern(perceived);
  const stressScore = DISC_LETTERS.reduce((sum, letter) => sum + Math.abs(adaptive[letter] - natural[letter]), 0);
  const level: StressLevel = stressScore > DISC_STRESS_THRESHOLD ? 'high' : 'low';

  return {
    profiles: {
      adaptive: { scores: adaptive, pattern: behavioralPattern(adaptive) },
      natural: { scores: natural, pattern: behavioralPattern(natural) },
      perceived: { scores: perceived, pattern: perceivedPattern },
    },
    final_behavioral_pattern: perceivedPattern,
    stress_analysis: {
      score: stressScore,
      level,
      threshold: DISC_STRESS_THRESHOLD,
      interpretation: DISC_DATA.stress[level],
    },
  };
}

/**
 * Strongest letter, or the strongest two (in score order) when the runner-up is
 * within DISC_PATTERN_GAP. Equal scores fall back to alphabetical order.
 */
export function behavioralPattern(scores: DiscScores): DiscPattern {
  const [first, second] = orderByScore(DISC_LETTERS, (letter) => scores[letter]);
  const id = scores[first] - scores[second] <= DISC_PATTERN_GAP ? `${first}${second}` : first;
  const info = DISC_DATA.patterns[id];
  if (!info) throw new Error(`No DISC pattern defined for ${id}`);
  return { id, name: info.name, description: info.description };
}
