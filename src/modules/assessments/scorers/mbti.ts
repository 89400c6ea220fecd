import { z } from 'zod';
import mbtiData from '../data/mbti.json';
import { failValidation } from '../errors';
import { percentOf } from '../interpretation';
import { questionIds, readChoice } from '../responses';
import { RawResponseSet } from '../schema';

export type MbtiLetter = 'E' | 'I' | 'S' | 'N' | 'T' | 'F' | 'J' | 'P';
export type MbtiAxisKey = 'EI' | 'SN' | 'TF' | 'JP';

type AxisDefinition = { key: MbtiAxisKey; a: MbtiLetter; b: MbtiLetter };

// Option "a" always lands on the first letter listed here, option "b" on the second.
const AXES: Record<MbtiAxisKey, AxisDefinition> = {
  EI: { key: 'EI', a: 'I', b: 'E' },
  SN: { key: 'SN', a: 'S', b: 'N' },
  TF: { key: 'TF', a: 'T', b: 'F' },
  JP: { key: 'JP', a: 'P', b: 'J' },
};
const AXIS_ORDER: MbtiAxisKey[] = ['EI', 'SN', 'TF', 'JP'];

export const MBTI_QUESTION_COUNT = 60;

// 1 → EI, 2 → SN, 3 → TF, 4 → JP, 5 → EI, ...
const QUESTION_AXES: ReadonlyMap<string, AxisDefinition> = new Map(
  questionIds(MBTI_QUESTION_COUNT).map((id, idx): [string, AxisDefinition] => [id, AXES[AXIS_ORDER[idx % AXIS_ORDER.length]]])
);

const letterInfoSchema = z.object({ name: z.string().min(1), description: z.string().min(1) });
const typeInfoSchema = z.object({ title: z.string().min(1), summary: z.string().min(1) });

const MBTI_DATA = z
  .object({
    letters: z.object({
      E: letterInfoSchema,
      I: letterInfoSchema,
      S: letterInfoSchema,
      N: letterInfoSchema,
      T: letterInfoSchema,
      F: letterInfoSchema,
      J: letterInfoSchema,
      P: letterInfoSchema,
    }),
    types: z.record(z.string(), typeInfoSchema),
  })
  .parse(mbtiData);

export type MbtiTypeDescription = z.infer<typeof typeInfoSchema>;

export type MbtiAxisResult = {
  preference: string;
  is_tied: boolean;
  scores: Record<string, number>;
  percentages: Record<string, number>;
  description: string;
};

export type MbtiResult = {
  scores: Record<MbtiLetter, number>;
  preferences: Record<MbtiAxisKey, MbtiAxisResult>;
  mbti_type: string;
  type_description: MbtiTypeDescription;
  tied_axes: MbtiAxisKey[];
  answered_questions: number;
};

export function scoreMbti(raw: RawResponseSet): MbtiResult {
  const scores: Record<MbtiLetter, number> = { E: 0, I: 0, S: 0, N: 0, T: 0, F: 0, J: 0, P: 0 };
  const issues: string[] = [];
  let answered = 0;

  for (const [id, entry] of Object.entries(raw)) {
    const axis = QUESTION_AXES.get(id);
    if (!axis) continue;
    const choice = readChoice(entry, ['a', 'b'] as const);
    if (!choice.ok) {
      issues.push(`question ${id}: ${choice.reason}`);
      continue;
    }
    scores[choice.value === 'a' ? axis.a : axis.b] += 1;
    answered += 1;
  }

  if (issues.length) failValidation('Invalid MBTI responses', issues);

  const preferences: Record<MbtiAxisKey, MbtiAxisResult> = {
    EI: resolveAxis(AXES.EI, scores),
    SN: resolveAxis(AXES.SN, scores),
    TF: resolveAxis(AXES.TF, scores),
    JP: resolveAxis(AXES.JP, scores),
  };
  const tiedAxes = AXIS_ORDER.filter((key) => preferences[key].is_tied);
  const tokens = AXIS_ORDER.map((key) => preferences[key].preference);
  const mbtiType = tiedAxes.length ? tokens.join('-') : tokens.join('');

  return {
    scores,
    preferences,
    mbti_type: mbtiType,
    type_description: tiedAxes.length ? combinedTypeDescription(tiedAxes) : describeType(mbtiType),
    tied_axes: tiedAxes,
    answered_questions: answered,
  };
}

function resolveAxis(axis: AxisDefinition, scores: Record<MbtiLetter, number>): MbtiAxisResult {
  const aScore = scores[axis.a];
  const bScore = scores[axis.b];
  const total = aScore + bScore;
  const winner = aScore === bScore ? null : aScore > bScore ? axis.a : axis.b;

  return {
    preference: winner ?? `${axis.a}/${axis.b}`,
    is_tied: winner === null,
    scores: { [axis.a]: aScore, [axis.b]: bScore },
    percentages: { [axis.a]: percentOf(aScore, total), [axis.b]: percentOf(bScore, total) },
    description: winner ? MBTI_DATA.letters[winner].description : blendedDescription(axis),
  };
}

function blendedDescription(axis: AxisDefinition): string {
  const first = MBTI_DATA.letters[axis.a];
  const second = MBTI_DATA.letters[axis.b];
  return (
    `Balanced between ${first.name} (${axis.a}) and ${second.name} (${axis.b}). ` +
    `Both styles show up equally often, so either one can lead depending on the situation: ` +
    `${first.description} ${second.description}`
  );
}

function describeType(code: string): MbtiTypeDescription {
  const info: MbtiTypeDescription | undefined = MBTI_DATA.types[code];
  return info ?? { title: code, summary: 'No description is available for this type.' };
}

function combinedTypeDescription(tiedAxes: MbtiAxisKey[]): MbtiTypeDescription {
  const balanced = tiedAxes
    .map((key) => `${MBTI_DATA.letters[AXES[key].a].name}/${MBTI_DATA.letters[AXES[key].b].name}`)
    .join(', ');
  return {
    title: 'Combined personality type',
    summary:
      `Preferences are balanced on ${balanced}, so this profile combines the neighbouring types ` +
      'rather than settling on one four-letter code. Traits from both sides of each balanced axis apply.',
  };
}
