import { safeLogger } from '../../security/safeLogger';
import { prepareAggregatedPackageData, scoreAttempt } from './service';

const allChoices = (choice: string) => {
  const raw: Record<string, { response: string }> = {};
  for (let i = 1; i <= 60; i++) raw[String(i)] = { response: choice };
  return raw;
};

afterEach(() => {
  jest.restoreAllMocks();
});

describe('scoreAttempt', () => {
  it('skips incomplete attempts', () => {
    const result = scoreAttempt({ id: 7, assessmentName: 'MBTI', isCompleted: false, rawResults: allChoices('a') });
    expect(result).toEqual({ status: 'skipped', message: 'Attempt 7 is not completed. Skipping score calculation.' });
  });

  it('skips attempts without raw results', () => {
    const expected = { status: 'skipped', message: 'Attempt 7 has no raw results data for score calculation.' };
    expect(scoreAttempt({ id: 7, assessmentName: 'MBTI', isCompleted: true, rawResults: {} })).toEqual(expected);
    expect(scoreAttempt({ id: 7, assessmentName: 'MBTI', isCompleted: true })).toEqual(expected);
    expect(scoreAttempt({ id: 7, assessmentName: 'MBTI', isCompleted: true, rawResults: null })).toEqual(expected);
    for (const rawResults of [false, 0, '', []]) {
      expect(scoreAttempt({ id: 7, assessmentName: 'MBTI', isCompleted: true, rawResults })).toEqual(expected);
    }
  });

  it('scores completed attempts through the dispatcher', () => {
    const result = scoreAttempt({ id: 'a-1', assessmentName: 'MBTI', isCompleted: true, rawResults: allChoices('b') });
    expect(result).toMatchObject({ status: 'success', instrument: 'mbti', mbti_type: 'ENFJ' });
  });

  it('passes the clock through to generic summaries', () => {
    const result = scoreAttempt(
      { id: 8, assessmentName: 'Study Habits', isCompleted: true, rawResults: { q1: { response: 'often' } } },
      { now: () => new Date('2024-02-03T04:05:06.000Z') }
    );
    expect(result).toEqual({
      status: 'success',
      instrument: 'generic',
      generic_summary: {
        assessment_name: 'Study Habits',
        total_questions_answered: 1,
        processed_at: '2024-02-03T04:05:06.000Z',
      },
    });
  });

  it('reports malformed attempt records', () => {
    expect(scoreAttempt({ id: 7 })).toEqual({
      status: 'error',
      message: 'Invalid attempt record',
      details: { issues: ['assessmentName Required', 'isCompleted Required'] },
    });
  });
});

describe('prepareAggregatedPackageData', () => {
  const pkg = { id: 3, name: 'Career Starter', assessmentIds: [1, 2] };

  it('collects completed attempts that belong to the package', () => {
    const data = prepareAggregatedPackageData({
      userId: 42,
      package: pkg,
      attempts: [
        { id: 10, assessmentId: 1, assessmentName: 'MBTI', isCompleted: true, processedResults: { mbti_type: 'ISTP' } },
        { id: 11, assessmentId: 2, assessmentName: 'Holland', isCompleted: false },
        { id: 12, assessmentId: 9, assessmentName: 'DISC', isCompleted: true, processedResults: {} },
        { id: 13, assessmentId: '2', assessmentName: 'Holland', isCompleted: true, processedResults: null },
      ],
    });

    expect(data).toEqual({
      user_id: 42,
      package_id: 3,
      package_name: 'Career Starter',
      assessments_data: [
        { assessment_id: 1, assessment_name: 'MBTI', results: { mbti_type: 'ISTP' } },
        { assessment_id: '2', assessment_name: 'Holland', results: {} },
      ],
    });
  });

  it('returns null for a package without assessments', () => {
    const warn = jest.spyOn(safeLogger, 'warn').mockImplementation(() => undefined);

    const data = prepareAggregatedPackageData({ userId: 42, package: { ...pkg, assessmentIds: [] }, attempts: [] });

    expect(data).toBeNull();
    expect(warn).toHaveBeenCalledWith('assessments.package.empty', { packageId: 3 });
  });

  it('returns null for malformed input', () => {
    jest.spyOn(safeLogger, 'error').mockImplementation(() => undefined);
    expect(prepareAggregatedPackageData({ userId: 42, package: pkg })).toBeNull();
  });
});
