import { z } from 'zod';
import neoData from '../data/neo.json';
import { failValidation } from '../errors';
import { Band, bandFor } from '../interpretation';
import { questionIds, readLikert } from '../responses';
import { RawResponseSet } from '../schema';

export const NEO_DIMENSIONS = ['neuroticism', 'extraversion', 'openness', 'agreeableness', 'conscientiousness'] as const;
export type NeoDimension = (typeof NEO_DIMENSIONS)[number];

export const NEO_STYLES = [
  'well_being',
  'defense_style',
  'anger_control',
  'impulse_control',
  'interests',
  'interactions',
  'activity',
  'attitudes',
  'learning',
  'character',
] as const;
export type NeoStyle = (typeof NEO_STYLES)[number];

export type NeoLevel = 'low' | 'medium' | 'high';
export type NeoStrength = 'weak' | 'medium' | 'strong';

export const NEO_QUESTION_COUNT = 60;
export const NEO_DEFAULT_RESPONSE = 2;
const SCALE = { min: 0, max: 4 };
const RAW_MAX = 48;
const STYLE_MIDPOINT = 50;

const REVERSED: Record<NeoDimension, ReadonlySet<number>> = {
  neuroticism: new Set([1, 16, 31, 46]),
  extraversion: new Set([12, 27, 42, 57]),
  openness: new Set([3, 8, 18, 23, 33, 38, 48]),
  agreeableness: new Set([9, 14, 24, 29, 39, 44, 54, 59]),
  conscientiousness: new Set([15, 30, 45, 55]),
};

const LEVEL_BANDS: Band<NeoLevel>[] = [
  { max: 12, label: 'low' },
  { max: 24, label: 'medium' },
];
const STRENGTH_BANDS: Band<NeoStrength>[] = [
  { max: 33, label: 'weak' },
  { max: 66, label: 'medium' },
];

const dimensionEnum = z.enum(NEO_DIMENSIONS);
const dimensionInfoSchema = z.object({
  name: z.string().min(1),
  letter: z.string().length(1),
  levels: z.object({ low: z.string().min(1), medium: z.string().min(1), high: z.string().min(1) }),
});
const archetypeSchema = z.object({ name: z.string().min(1), description: z.string().min(1) });
const styleInfoSchema = z.object({
  name: z.string().min(1),
  factors: z.tuple([dimensionEnum, dimensionEnum]),
  types: z.record(z.string(), archetypeSchema),
});

const NEO_DATA = z
  .object({
    dimensions: z.object({
      neuroticism: dimensionInfoSchema,
      extraversion: dimensionInfoSchema,
      openness: dimensionInfoSchema,
      agreeableness: dimensionInfoSchema,
      conscientiousness: dimensionInfoSchema,
    }),
    styles: z.object({
      well_being: styleInfoSchema,
      defense_style: styleInfoSchema,
      anger_control: styleInfoSchema,
      impulse_control: styleInfoSchema,
      interests: styleInfoSchema,
      interactions: styleInfoSchema,
      activity: styleInfoSchema,
      attitudes: styleInfoSchema,
      learning: styleInfoSchema,
      character: styleInfoSchema,
    }),
  })
  .parse(neoData);

export type NeoScoreValue = { value: number; min: number; max: number };

export type NeoDimensionResult = {
  name: string;
  letter: string;
  raw_score: NeoScoreValue;
  scaled_score: NeoScoreValue;
  level: NeoLevel;
  description: string;
  strength_percentage: number;
  strength_level: NeoStrength;
};

export type NeoStyleResult = {
  name: string;
  factor_scores: Partial<Record<NeoDimension, number>>;
  matching_type: { quadrant_code: string; name: string; description: string };
};

export type NeoResult = {
  dimensions: Record<NeoDimension, NeoDimensionResult>;
  personality_styles: Record<NeoStyle, NeoStyleResult>;
  defaulted_questions: string[];
};

const dimensionOf = (question: number): NeoDimension => NEO_DIMENSIONS[(question - 1) % NEO_DIMENSIONS.length];

export function scoreNeo(raw: RawResponseSet): NeoResult {
  const rawScores: Record<NeoDimension, number> = {
    neuroticism: 0,
    extraversion: 0,
    openness: 0,
    agreeableness: 0,
    conscientiousness: 0,
  };
  const defaulted: string[] = [];
  const issues: string[] = [];

  for (const id of questionIds(NEO_QUESTION_COUNT)) {
    const entry = raw[id];
    let answer = NEO_DEFAULT_RESPONSE;
    if (entry === undefined) {
      defaulted.push(id);
    } else {
      const likert = readLikert(entry, SCALE);
      if (!likert.ok) {
        issues.push(`question ${id}: ${likert.reason}`);
        continue;
      }
      answer = likert.value;
    }
    const question = Number(id);
    const dimension = dimensionOf(question);
    rawScores[dimension] += REVERSED[dimension].has(question) ? SCALE.max - answer : answer;
  }

  if (issues.length) failValidation('Invalid NEO responses', issues);

  const dimensions: Record<NeoDimension, NeoDimensionResult> = {
    neuroticism: describeDimension('neuroticism', rawScores.neuroticism),
    extraversion: describeDimension('extraversion', rawScores.extraversion),
    openness: describeDimension('openness', rawScores.openness),
    agreeableness: describeDimension('agreeableness', rawScores.agreeableness),
    conscientiousness: describeDimension('conscientiousness', rawScores.conscientiousness),
  };
  const scaledOf = (dimension: NeoDimension) => dimensions[dimension].scaled_score.value;

  const personality_styles: Record<NeoStyle, NeoStyleResult> = {
    well_being: describeStyle('well_being', scaledOf),
    defense_style: describeStyle('defense_style', scaledOf),
    anger_control: describeStyle('anger_control', scaledOf),
    impulse_control: describeStyle('impulse_control', scaledOf),
    interests: describeStyle('interests', scaledOf),
    interactions: describeStyle('interactions', scaledOf),
    activity: describeStyle('activity', scaledOf),
    attitudes: describeStyle('attitudes', scaledOf),
    learning: describeStyle('learning', scaledOf),
    character: describeStyle('character', scaledOf),
  };

  return { dimensions, personality_styles, defaulted_questions: defaulted };
}

function describeDimension(dimension: NeoDimension, rawScore: number): NeoDimensionResult {
  const info = NEO_DATA.dimensions[dimension];
  const scaled = Math.round((rawScore / RAW_MAX) * 100);
  const strength = Math.round((Math.abs(STYLE_MIDPOINT - scaled) / STYLE_MIDPOINT) * 100);
  const level = bandFor(rawScore, LEVEL_BANDS, 'high');

  return {
    name: info.name,
    letter: info.letter,
    raw_score: { value: rawScore, min: 0, max: RAW_MAX },
    scaled_score: { value: scaled, min: 0, max: 100 },
    level,
    description: info.levels[level],
    strength_percentage: strength,
    strength_level: bandFor(strength, STRENGTH_BANDS, 'strong'),
  };
}

function describeStyle(style: NeoStyle, scaledOf: (dimension: NeoDimension) => number): NeoStyleResult {
  const info = NEO_DATA.styles[style];
  const factorScores: Partial<Record<NeoDimension, number>> = {};
  let code = '';
  for (const factor of info.factors) {
    const scaled = scaledOf(factor);
    factorScores[factor] = scaled;
    code += `${NEO_DATA.dimensions[factor].letter}${scaled >= STYLE_MIDPOINT ? '+' : '-'}`;
  }

  const archetype = info.types[code];
  if (!archetype) throw new Error(`No ${style} archetype defined for ${code}`);
  return {
    name: info.name,
    factor_scores: factorScores,
    matching_type: { quadrant_code: code, name: archetype.name, description: archetype.description },
  };
}
