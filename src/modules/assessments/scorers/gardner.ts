import { z } from 'zod';
import gardnerData from '../data/gardner.json';
import { ResponseValidationError } from '../errors';
import { Band, bandFor, keysWithScore, orderByScore, percentOf } from '../interpretation';
import { questionIds, readLikert } from '../responses';
import { RawResponseSet } from '../schema';

export const GARDNER_DIMENSIONS = [
  'linguistic_verbal',
  'logical_mathematical',
  'visual_spatial',
  'bodily_kinesthetic',
  'interpersonal',
  'intrapersonal',
  'musical',
  'naturalist',
] as const;
export type GardnerDimension = (typeof GARDNER_DIMENSIONS)[number];
export type GardnerLevel = 'weak' | 'medium' | 'strong';

export const GARDNER_QUESTION_COUNT = 80;
const SCALE = { min: 1, max: 5 };
const DIMENSION_MAX = 50;
const TOTAL_MAX = 400;

export const GARDNER_QUESTIONS: Record<GardnerDimension, readonly number[]> = {
  linguistic_verbal: [1, 9, 17, 25, 33, 41, 49, 57, 65, 73],
  logical_mathematical: [2, 10, 18, 26, 34, 42, 50, 58, 66, 74],
  visual_spatial: [3, 11, 19, 27, 35, 43, 51, 59, 67, 75],
  bodily_kinesthetic: [4, 12, 20, 28, 36, 44, 52, 60, 68, 76],
  interpersonal: [5, 13, 21, 29, 37, 45, 53, 61, 69, 77],
  intrapersonal: [6, 14, 22, 30, 38, 46, 54, 62, 70, 78],
  musical: [7, 15, 23, 31, 39, 47, 55, 63, 71, 79],
  naturalist: [8, 16, 24, 32, 40, 48, 56, 64, 72, 80],
};

// Levels read the literal sums, not the percentages.
const DIMENSION_BANDS: Band<GardnerLevel>[] = [
  { max: 20, label: 'weak' },
  { max: 35, label: 'medium' },
];
const TOTAL_BANDS: Band<GardnerLevel>[] = [
  { max: 160, label: 'weak' },
  { max: 240, label: 'medium' },
];

const dimensionInfoSchema = z.object({ name: z.string().min(1), description: z.string().min(1) });

const GARDNER_DATA = z
  .object({
    dimensions: z.object({
      linguistic_verbal: dimensionInfoSchema,
      logical_mathematical: dimensionInfoSchema,
      visual_spatial: dimensionInfoSchema,
      bodily_kinesthetic: dimensionInfoSchema,
      interpersonal: dimensionInfoSchema,
      intrapersonal: dimensionInfoSchema,
      musical: dimensionInfoSchema,
      naturalist: dimensionInfoSchema,
    }),
    total_interpretations: z.object({
      weak: z.string().min(1),
      medium: z.string().min(1),
      strong: z.string().min(1),
    }),
  })
  .parse(gardnerData);

export type GardnerDimensionResult = {
  dimension_id: GardnerDimension;
  name: string;
  description: string;
  raw_score: number;
  percentage: number;
  level: GardnerLevel;
  rank: number;
};

export type GardnerExtremes = { score: number; dimension_ids: GardnerDimension[] };

export type GardnerResult = {
  dimensions: Record<string, GardnerDimensionResult>;
  ranked_intelligences: GardnerDimensionResult[];
  strongest: GardnerExtremes;
  weakest: GardnerExtremes;
  total_score: number;
  total_percentage: number;
  total_level: GardnerLevel;
  total_interpretation: string;
};

function readAllAnswers(raw: RawResponseSet): Map<string, number> {
  const answers = new Map<string, number>();
  const missing: string[] = [];
  const invalid: string[] = [];
  const issues: string[] = [];

  for (const id of questionIds(GARDNER_QUESTION_COUNT)) {
    const entry = raw[id];
    if (entry === undefined) {
      missing.push(id);
      issues.push(`question ${id}: missing`);
      continue;
    }
    const likert = readLikert(entry, SCALE);
    if (!likert.ok) {
      invalid.push(id);
      issues.push(`question ${id}: ${likert.reason}`);
      continue;
    }
    answers.set(id, likert.value);
  }

  if (missing.length || invalid.length) {
    const parts: string[] = [];
    if (missing.length) parts.push(`missing questions ${missing.join(', ')}`);
    if (invalid.length) parts.push(`invalid questions ${invalid.join(', ')}`);
    throw new ResponseValidationError(`Invalid Gardner responses: ${parts.join('; ')}`, { issues, missing, invalid });
  }
  return answers;
}

export function scoreGardner(raw: RawResponseSet): GardnerResult {
  const answers = readAllAnswers(raw);

  const scores: Record<GardnerDimension, number> = {
    linguistic_verbal: 0,
    logical_mathematical: 0,
    visual_spatial: 0,
    bodily_kinesthetic: 0,
    interpersonal: 0,
    intrapersonal: 0,
    musical: 0,
    naturalist: 0,
  };
  for (const dimension of GARDNER_DIMENSIONS) {
    scores[dimension] = GARDNER_QUESTIONS[dimension].reduce((sum, id) => sum + (answers.get(String(id)) ?? 0), 0);
  }

  const ranked = orderByScore(GARDNER_DIMENSIONS, (d) => scores[d]).map(
    (dimension, idx): GardnerDimensionResult => ({
      dimension_id: dimension,
      ...GARDNER_DATA.dimensions[dimension],
      raw_score: scores[dimension],
      percentage: percentOf(scores[dimension], DIMENSION_MAX),
      level: bandFor(scores[dimension], DIMENSION_BANDS, 'strong'),
      rank: idx + 1,
    })
  );

  const dimensions: Record<string, GardnerDimensionResult> = {};
  for (const result of ranked) dimensions[result.dimension_id] = result;

  const values = GARDNER_DIMENSIONS.map((d) => scores[d]);
  const max = Math.max(...values);
  const min = Math.min(...values);
  const total = values.reduce((sum, v) => sum + v, 0);
  const totalLevel = bandFor(total, TOTAL_BANDS, 'strong');

  return {
    dimensions,
    ranked_intelligences: ranked,
    strongest: { score: max, dimension_ids: keysWithScore(GARDNER_DIMENSIONS, (d) => scores[d], max) },
    weakest: { score: min, dimension_ids: keysWithScore(GARDNER_DIMENSIONS, (d) => scores[d], min) },
    total_score: total,
    total_percentage: percentOf(total, TOTAL_MAX, 2),
    total_level: totalLevel,
    total_interpretation: GARDNER_DATA.total_interpretations[totalLevel],
  };
}
