import { z } from 'zod';
import hollandData from '../data/holland.json';
import { failValidation } from '../errors';
import { groupByScore, percentOf } from '../interpretation';
import { readFlag, readLikert } from '../responses';
import { RawResponseSet } from '../schema';

export const HOLLAND_DIMENSIONS = [
  'realistic',
  'investigative',
  'artistic',
  'social',
  'enterprising',
  'conventional',
] as const;
export type HollandDimension = (typeof HOLLAND_DIMENSIONS)[number];
export type HollandScores = Record<HollandDimension, number>;

// Keys look like `interests___artistic___3` or `self_assessment_1___3`; the
// frontend has used both three and five underscores as the separator.
const KEY_SEPARATOR = /_{3,}/;
const SELF_ASSESSMENT_SECTION = /^self_assessment_\d+$/;
const SELF_ASSESSMENT_SCALE = { min: 1, max: 5 };

const SELF_ASSESSMENT_DIMENSIONS: ReadonlyMap<string, HollandDimension> = new Map<string, HollandDimension>([
  ['1', 'realistic'],
  ['2', 'investigative'],
  ['3', 'artistic'],
  ['4', 'social'],
  ['5', 'enterprising'],
  ['6', 'conventional'],
]);

const dimensionInfoSchema = z.object({
  letter: z.string().length(1),
  name: z.string().min(1),
  characteristics: z.array(z.string().min(1)).min(1),
  suitable_occupations: z.string().min(1),
});

const HOLLAND_DATA = z
  .object({
    realistic: dimensionInfoSchema,
    investigative: dimensionInfoSchema,
    artistic: dimensionInfoSchema,
    social: dimensionInfoSchema,
    enterprising: dimensionInfoSchema,
    conventional: dimensionInfoSchema,
  })
  .parse(hollandData);

type ParsedKey = { kind: 'checkbox' | 'self_assessment'; section: string; dimension: HollandDimension };

export type HollandDimensionResult = z.infer<typeof dimensionInfoSchema> & {
  score: number;
  percentage: number;
  rank: number;
};

export type HollandRankGroup = {
  rank: number;
  score: number;
  dimensions: HollandDimension[];
  letters: string[];
};

export type HollandResult = {
  scores: HollandScores;
  section_scores: Record<string, HollandScores>;
  total_score: number;
  ranking: HollandRankGroup[];
  holland_code: string;
  dimensions: Record<string, HollandDimensionResult>;
};

const emptyScores = (): HollandScores => ({
  realistic: 0,
  investigative: 0,
  artistic: 0,
  social: 0,
  enterprising: 0,
  conventional: 0,
});

function parseKey(key: string): ParsedKey | null {
  const parts = key.split(KEY_SEPARATOR);
  if (parts.length === 3) {
    const dimension = HOLLAND_DIMENSIONS.find((d) => d === parts[1]);
    return dimension ? { kind: 'checkbox', section: parts[0], dimension } : null;
  }
  if (parts.length === 2 && SELF_ASSESSMENT_SECTION.test(parts[0])) {
    const dimension = SELF_ASSESSMENT_DIMENSIONS.get(parts[1]);
    return dimension ? { kind: 'self_assessment', section: parts[0], dimension } : null;
  }
  return null;
}

export function scoreHolland(raw: RawResponseSet): HollandResult {
  const scores = emptyScores();
  const sectionScores = new Map<string, HollandScores>();
  const issues: string[] = [];

  for (const [key, entry] of Object.entries(raw)) {
    const parsed = parseKey(key);
    if (!parsed) continue;

    let contribution: number;
    if (parsed.kind === 'checkbox') {
      const flag = readFlag(entry);
      if (!flag.ok) {
        issues.push(`${key}: ${flag.reason}`);
        continue;
      }
      contribution = flag.value ? 1 : 0;
    } else {
      const likert = readLikert(entry, SELF_ASSESSMENT_SCALE);
      if (!likert.ok) {
        issues.push(`${key}: ${likert.reason}`);
        continue;
      }
      contribution = likert.value;
    }

    let section = sectionScores.get(parsed.section);
    if (!section) {
      section = emptyScores();
      sectionScores.set(parsed.section, section);
    }
    section[parsed.dimension] += contribution;
    scores[parsed.dimension] += contribution;
  }

  if (issues.length) failValidation('Invalid Holland responses', issues);

  const total = HOLLAND_DIMENSIONS.reduce((sum, d) => sum + scores[d], 0);
  const groups = groupByScore(HOLLAND_DIMENSIONS, (d) => scores[d]);
  const ranking = groups.map((group) => ({
    rank: group.rank,
    score: group.score,
    dimensions: group.members,
    letters: group.members.map((d) => HOLLAND_DATA[d].letter),
  }));
  const rankOf = new Map(groups.flatMap((group) => group.members.map((d) => [d, group.rank] as const)));

  const dimensions: Record<string, HollandDimensionResult> = {};
  for (const dimension of HOLLAND_DIMENSIONS) {
    dimensions[dimension] = {
      ...HOLLAND_DATA[dimension],
      score: scores[dimension],
      percentage: percentOf(scores[dimension], total),
      rank: rankOf.get(dimension) ?? groups.length,
    };
  }

  return {
    scores,
    section_scores: Object.fromEntries(sectionScores),
    total_score: total,
    ranking,
    holland_code: buildHollandCode(ranking),
    dimensions,
  };
}

/** Top three score levels; ties widen a level rather than pushing others out. */
export function buildHollandCode(ranking: HollandRankGroup[]): string {
  return ranking
    .slice(0, 3)
    .map((group) => group.letters.join('/'))
    .join('-');
}
