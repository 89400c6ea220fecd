import { ResponseValidationError } from '../errors';
import { roundTo } from '../interpretation';
import { questionIds, readLikert } from '../responses';
import { RawResponseSet } from '../schema';

export type SwansonSubscale = 'inattention' | 'hyperactivity_impulsivity';
export type CutoffStatus = 'Above cutoff' | 'Below cutoff';
export type SwansonCategory =
  | 'Combined'
  | 'Predominantly Inattentive'
  | 'Predominantly Hyperactive-Impulsive'
  | 'No Significant ADHD';

export const SWANSON_QUESTION_COUNT = 18;
const SCALE = { min: 0, max: 3 };

const SUBSCALES: Record<SwansonSubscale, { questions: { from: number; to: number }; cutoff: number }> = {
  inattention: { questions: { from: 1, to: 9 }, cutoff: 1.78 },
  hyperactivity_impulsivity: { questions: { from: 10, to: 18 }, cutoff: 1.44 },
};

const CATEGORY_DESCRIPTIONS: Record<SwansonCategory, string> = {
  Combined: 'Both inattention and hyperactivity-impulsivity averages are above their cutoffs.',
  'Predominantly Inattentive': 'The inattention average is above its cutoff; hyperactivity-impulsivity is not.',
  'Predominantly Hyperactive-Impulsive':
    'The hyperactivity-impulsivity average is above its cutoff; inattention is not.',
  'No Significant ADHD': 'Neither subscale average is above its cutoff.',
};

export type SubscaleScore = { sum: number; average: number };
export type SubscaleStatus = { average: number; cutoff: number; status: CutoffStatus };

export type SwansonResult = {
  scores: Record<SwansonSubscale, SubscaleScore>;
  interpretation: {
    subscale_status: Record<SwansonSubscale, SubscaleStatus>;
    category: { id: SwansonCategory; description: string };
  };
};

export function scoreSwanson(raw: RawResponseSet): SwansonResult {
  const answers = new Map<number, number>();
  const missing: string[] = [];
  const invalid: string[] = [];
  const issues: string[] = [];

  for (const id of questionIds(SWANSON_QUESTION_COUNT)) {
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
    answers.set(Number(id), likert.value);
  }

  if (issues.length) {
    throw new ResponseValidationError(`Invalid Swanson responses: ${issues.join('; ')}`, { issues, missing, invalid });
  }

  const subscaleScore = (subscale: SwansonSubscale): SubscaleScore => {
    const { from, to } = SUBSCALES[subscale].questions;
    let sum = 0;
    for (let q = from; q <= to; q++) sum += answers.get(q) ?? 0;
    return { sum, average: sum / (to - from + 1) };
  };
  const averages: Record<SwansonSubscale, SubscaleScore> = {
    inattention: subscaleScore('inattention'),
    hyperactivity_impulsivity: subscaleScore('hyperactivity_impulsivity'),
  };
  // Cutoffs compare the exact averages; rounding is for the output only.
  const rounded = (subscale: SwansonSubscale): SubscaleScore => ({
    sum: averages[subscale].sum,
    average: roundTo(averages[subscale].average, 2),
  });
  const scores: Record<SwansonSubscale, SubscaleScore> = {
    inattention: rounded('inattention'),
    hyperactivity_impulsivity: rounded('hyperactivity_impulsivity'),
  };

  const statusOf = (subscale: SwansonSubscale): SubscaleStatus => {
    const { cutoff } = SUBSCALES[subscale];
    return {
      average: scores[subscale].average,
      cutoff,
      status: averages[subscale].average > cutoff ? 'Above cutoff' : 'Below cutoff',
    };
  };
  const subscaleStatus: Record<SwansonSubscale, SubscaleStatus> = {
    inattention: statusOf('inattention'),
    hyperactivity_impulsivity: statusOf('hyperactivity_impulsivity'),
  };

  const category = categorize(
    subscaleStatus.inattention.status === 'Above cutoff',
    subscaleStatus.hyperactivity_impulsivity.status === 'Above cutoff'
  );

  return {
    scores,
    interpretation: {
      subscale_status: subscaleStatus,
      category: { id: category, description: CATEGORY_DESCRIPTIONS[category] },
    },
  };
}

function categorize(inattentive: boolean, hyperactive: boolean): SwansonCategory {
  if (inattentive && hyperactive) return 'Combined';
  if (inattentive) return 'Predominantly Inattentive';
  if (hyperactive) return 'Predominantly Hyperactive-Impulsive';
  return 'No Significant ADHD';
}
