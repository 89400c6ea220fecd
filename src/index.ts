export { calculateScores, resolveInstrument, INSTRUMENTS, GENERIC_INSTRUMENT } from './modules/assessments/scoring';
export type {
  Instrument,
  Scorer,
  ScoringOptions,
  ScoringPayload,
  ScoringResult,
  ScoringSuccess,
  ScoringFailure,
  ScoringSkipped,
} from './modules/assessments/scoring';
export { scoreAttempt, prepareAggregatedPackageData } from './modules/assessments/service';
export type { AggregatedAssessment, AggregatedPackageData } from './modules/assessments/service';
export { ScoringError, ResponseValidationError } from './modules/assessments/errors';
export type { ValidationDetails } from './modules/assessments/errors';
export { scoreMbti } from './modules/assessments/scorers/mbti';
export { scoreHolland, buildHollandCode } from './modules/assessments/scorers/holland';
export { scoreDisc, behavioralPattern } from './modules/assessments/scorers/disc';
export { scoreGardner } from './modules/assessments/scorers/gardner';
export { scoreNeo } from './modules/assessments/scorers/neo';
export { scorePvq } from './modules/assessments/scorers/pvq';
export { scoreSwanson } from './modules/assessments/scorers/swanson';
export type {
  Attempt,
  ScoredAttempt,
  AssessmentPackage,
  AggregationInput,
  RawResponseSet,
} from './modules/assessments/schema';
