import { safeLogger } from '../../security/safeLogger';
import { ResponseValidationError, ValidationDetails } from './errors';
import { rawResponseSetSchema, RawResponseSet } from './schema';
import { DiscResult, scoreDisc } from './scorers/disc';
import { GardnerResult, scoreGardner } from './scorers/gardner';
import { GenericSummary, summarizeResponses } from './scorers/generic';
import { HollandResult, scoreHolland } from './scorers/holland';
import { MbtiResult, scoreMbti } from './scorers/mbti';
import { NeoResult, scoreNeo } from './scorers/neo';
import { PvqResult, scorePvq } from './scorers/pvq';
import { scoreSwanson, SwansonResult } from './scorers/swanson';

export const INSTRUMENTS = ['mbti', 'holland', 'disc', 'gardner', 'neo', 'pvq', 'swanson'] as const;
export type Instrument = (typeof INSTRUMENTS)[number];

export type Scorer<R> = (raw: RawResponseSet) => R;

type InstrumentResults = {
  mbti: MbtiResult;
  holland: HollandResult;
  disc: DiscResult;
  gardner: GardnerResult;
  neo: NeoResult;
  pvq: PvqResult;
  swanson: SwansonResult;
};

const SCORERS: { [K in Instrument]: Scorer<InstrumentResults[K]> } = {
  mbti: scoreMbti,
  holland: scoreHolland,
  disc: scoreDisc,
  gardner: scoreGardner,
  neo: scoreNeo,
  pvq: scorePvq,
  swanson: scoreSwanson,
};

const DISPLAY_NAMES: Record<Instrument, string> = {
  mbti: 'MBTI',
  holland: 'Holland',
  disc: 'DISC',
  gardner: 'Gardner',
  neo: 'NEO',
  pvq: 'PVQ',
  swanson: 'Swanson',
};

export const GENERIC_INSTRUMENT = 'generic' as const;

export type ScoringPayload = InstrumentResults[Instrument] | GenericSummary;

export type ScoringSuccess = { status: 'success'; instrument: Instrument | typeof GENERIC_INSTRUMENT } & ScoringPayload;
export type ScoringFailure = { status: 'error'; message: string; details?: ValidationDetails };
export type ScoringSkipped = { status: 'skipped'; message: string };
export type ScoringResult = ScoringSuccess | ScoringFailure | ScoringSkipped;

export type ScoringOptions = {
  /** Clock for timestamps in generic summaries. */
  now?: () => Date;
};

export function resolveInstrument(name: string): Instrument | null {
  const normalized = name.trim().toLowerCase();
  return INSTRUMENTS.find((instrument) => instrument === normalized) ?? null;
}

export function calculateScores(instrumentName: string, rawResponses: unknown, options: ScoringOptions = {}): ScoringResult {
  const instrument = resolveInstrument(instrumentName);
  if (!instrument) {
    safeLogger.info('assessments.scoring.generic', { assessmentName: instrumentName });
    const summary = summarizeResponses(instrumentName, rawResponses, options.now ?? (() => new Date()));
    return { status: 'success', instrument: GENERIC_INSTRUMENT, ...summary };
  }

  try {
    const payload = runScorer(instrument, rawResponses);
    safeLogger.info('assessments.scoring.completed', { instrument });
    return { status: 'success', instrument, ...payload };
  } catch (err) {
    if (err instanceof ResponseValidationError) {
      safeLogger.warn('assessments.scoring.rejected', { instrument, issueCount: err.details.issues.length });
      return { status: 'error', message: err.message, details: err.details };
    }
    const message = err instanceof Error ? err.message : String(err);
    safeLogger.error('assessments.scoring.failed', {
      instrument,
      message,
      stack: err instanceof Error ? err.stack : undefined,
    });
    return { status: 'error', message: `Failed to score ${DISPLAY_NAMES[instrument]} responses: ${message}` };
  }
}

function runScorer(instrument: Instrument, rawResponses: unknown): InstrumentResults[Instrument] {
  const parsed = rawResponseSetSchema.safeParse(rawResponses);
  if (!parsed.success) {
    const message = `Invalid ${DISPLAY_NAMES[instrument]} responses: expected an object keyed by question id`;
    throw new ResponseValidationError(message, { issues: parsed.error.issues.map((issue) => issue.message) });
  }
  return SCORERS[instrument](parsed.data);
}
