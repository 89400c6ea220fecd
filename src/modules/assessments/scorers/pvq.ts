import { z } from 'zod';
import pvqData from '../data/pvq.json';
import { failValidation } from '../errors';
import { orderByScore, roundTo } from '../interpretation';
import { readLikert } from '../responses';
import { RawResponseSet } from '../schema';

export const PVQ_CATEGORIES = [
  'self_direction',
  'power',
  'universalism',
  'achievement',
  'security',
  'stimulation',
  'conformity',
  'tradition',
  'hedonism',
  'benevolence',
] as const;
export type PvqCategory = (typeof PVQ_CATEGORIES)[number];

const SCALE = { min: 1, max: 6 };

export const PVQ_QUESTIONS: Record<PvqCategory, readonly number[]> = {
  self_direction: [1, 11, 22, 34],
  power: [2, 17, 39],
  universalism: [3, 8, 19, 23, 29, 40],
  achievement: [4, 13, 24, 32],
  security: [5, 14, 21, 31, 35],
  stimulation: [6, 15, 30],
  conformity: [7, 16, 28, 36],
  tradition: [9, 20, 25, 38],
  hedonism: [10, 26, 37],
  benevolence: [12, 18, 27, 33],
};

const QUESTION_CATEGORY = new Map<string, PvqCategory>(
  PVQ_CATEGORIES.flatMap((category) => PVQ_QUESTIONS[category].map((q): [string, PvqCategory] => [String(q), category]))
);

const categoryInfoSchema = z.object({ name: z.string().min(1), description: z.string().min(1) });

const PVQ_DATA = z
  .object({
    categories: z.object({
      self_direction: categoryInfoSchema,
      power: categoryInfoSchema,
      universalism: categoryInfoSchema,
      achievement: categoryInfoSchema,
      security: categoryInfoSchema,
      stimulation: categoryInfoSchema,
      conformity: categoryInfoSchema,
      tradition: categoryInfoSchema,
      hedonism: categoryInfoSchema,
      benevolence: categoryInfoSchema,
    }),
  })
  .parse(pvqData);

export type PvqCategoryResult = {
  name: string;
  description: string;
  answered_count: number;
  question_count: number;
  total: number;
  average: number;
  deviation: number;
  rank: number;
};

export type PvqRankingEntry = {
  category: PvqCategory;
  name: string;
  average: number;
  deviation: number;
};

export type PvqResult = {
  categories: Record<PvqCategory, PvqCategoryResult>;
  ranking: Record<string, PvqRankingEntry>;
  summary: {
    grand_mean: number;
    total_responses: number;
    highest_value: PvqRankingEntry;
    lowest_value: PvqRankingEntry;
  };
};

type Tally = { count: number; total: number };

export function scorePvq(raw: RawResponseSet): PvqResult {
  const tallies = new Map<PvqCategory, Tally>(PVQ_CATEGORIES.map((c): [PvqCategory, Tally] => [c, { count: 0, total: 0 }]));
  const issues: string[] = [];
  let responseCount = 0;
  let responseTotal = 0;

  for (const [id, entry] of Object.entries(raw)) {
    const category = QUESTION_CATEGORY.get(id);
    if (!category) continue;
    const likert = readLikert(entry, SCALE);
    if (!likert.ok) {
      issues.push(`question ${id}: ${likert.reason}`);
      continue;
    }
    const tally = tallies.get(category);
    if (tally) {
      tally.count += 1;
      tally.total += likert.value;
    }
    responseCount += 1;
    responseTotal += likert.value;
  }

  if (issues.length) failValidation('Invalid PVQ responses', issues);

  const grandMean = responseCount ? responseTotal / responseCount : 0;
  const averages = new Map<PvqCategory, number>();
  for (const [category, tally] of tallies) averages.set(category, tally.count ? tally.total / tally.count : 0);
  const averageOf = (category: PvqCategory) => averages.get(category) ?? 0;

  // Ranked on unrounded deviations; rounding is for the output only.
  const ordered = orderByScore(PVQ_CATEGORIES, (c) => averageOf(c) - grandMean);
  const entryFor = (category: PvqCategory): PvqRankingEntry => ({
    category,
    name: PVQ_DATA.categories[category].name,
    average: roundTo(averageOf(category), 2),
    deviation: roundTo(averageOf(category) - grandMean, 2),
  });

  const ranking: Record<string, PvqRankingEntry> = {};
  ordered.forEach((category, idx) => {
    ranking[String(idx + 1)] = entryFor(category);
  });

  const categoryResult = (category: PvqCategory): PvqCategoryResult => {
    const tally = tallies.get(category) ?? { count: 0, total: 0 };
    return {
      ...PVQ_DATA.categories[category],
      answered_count: tally.count,
      question_count: PVQ_QUESTIONS[category].length,
      total: tally.total,
      average: roundTo(averageOf(category), 2),
      deviation: roundTo(averageOf(category) - grandMean, 2),
      rank: ordered.indexOf(category) + 1,
    };
  };

  return {
    categories: {
      self_direction: categoryResult('self_direction'),
      power: categoryResult('power'),
      universalism: categoryResult('universalism'),
      achievement: categoryResult('achievement'),
      security: categoryResult('security'),
      stimulation: categoryResult('stimulation'),
      conformity: categoryResult('conformity'),
      tradition: categoryResult('tradition'),
      hedonism: categoryResult('hedonism'),
      benevolence: categoryResult('benevolence'),
    },
    ranking,
    summary: {
      grand_mean: roundTo(grandMean, 2),
      total_responses: responseCount,
      highest_value: entryFor(ordered[0]),
      lowest_value: entryFor(ordered[ordered.length - 1]),
    },
  };
}
