import { safeLogger } from '../../security/safeLogger';
import { describeIssue } from './errors';
import { aggregationInputSchema, attemptSchema } from './schema';
import { calculateScores, ScoringOptions, ScoringResult } from './scoring';

type RecordId = string | number;

export type AggregatedAssessment = {
  assessment_id: RecordId;
  assessment_name: string;
  results: Record<string, unknown>;
};

export type AggregatedPackageData = {
  user_id: RecordId;
  package_id: RecordId;
  package_name: string;
  assessments_data: AggregatedAssessment[];
};

function isEmptyResults(rawResults: unknown): boolean {
  if (!rawResults) return true;
  return typeof rawResults === 'object' && Object.keys(rawResults).length === 0;
}

/**
 * Scores a stored attempt. Incomplete attempts and attempts without raw results
 * are skipped; everything else goes through `calculateScores`.
 */
export function scoreAttempt(attempt: unknown, options: ScoringOptions = {}): ScoringResult {
  const parsed = attemptSchema.safeParse(attempt);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(describeIssue);
    safeLogger.warn('assessments.attempt.invalid', { issues });
    return { status: 'error', message: 'Invalid attempt record', details: { issues } };
  }

  const { id, assessmentName, isCompleted, rawResults } = parsed.data;
  if (!isCompleted) {
    const message = `Attempt ${id} is not completed. Skipping score calculation.`;
    safeLogger.warn('assessments.attempt.skipped', { attemptId: id, reason: 'incomplete' });
    return { status: 'skipped', message };
  }
  if (isEmptyResults(rawResults)) {
    const message = `Attempt ${id} has no raw results data for score calculation.`;
    safeLogger.warn('assessments.attempt.skipped', { attemptId: id, reason: 'empty' });
    return { status: 'skipped', message };
  }

  const result = calculateScores(assessmentName, rawResults, options);
  safeLogger.info('assessments.attempt.scored', { attemptId: id, assessmentName, status: result.status });
  return result;
}

/**
 * Collects the processed results of a user's completed attempts for the
 * assessments in a package. Returns null when the package has no assessments
 * or the input does not validate.
 */
export function prepareAggregatedPackageData(input: unknown): AggregatedPackageData | null {
  const parsed = aggregationInputSchema.safeParse(input);
  if (!parsed.success) {
    safeLogger.error('assessments.package.invalid', { issues: parsed.error.issues.map(describeIssue) });
    return null;
  }

  const { userId, package: pkg, attempts } = parsed.data;
  if (!pkg.assessmentIds.length) {
    safeLogger.warn('assessments.package.empty', { packageId: pkg.id });
    return null;
  }

  const inPackage = new Set(pkg.assessmentIds.map(String));
  const assessmentsData = attempts
    .filter((attempt) => attempt.isCompleted && inPackage.has(String(attempt.assessmentId)))
    .map(
      (attempt): AggregatedAssessment => ({
        assessment_id: attempt.assessmentId,
        assessment_name: attempt.assessmentName,
        results: attempt.processedResults ?? {},
      })
    );

  safeLogger.info('assessments.package.aggregated', {
    userId,
    packageId: pkg.id,
    assessmentCount: assessmentsData.length,
  });
  return {
    user_id: userId,
    package_id: pkg.id,
    package_name: pkg.name,
    assessments_data: assessmentsData,
  };
}
