import { z } from 'zod';

export type ValidationDetails = {
  issues: string[];
  missing?: string[];
  invalid?: string[];
};

export class ScoringError extends Error {}

export class ResponseValidationError extends ScoringError {
  constructor(message: string, public readonly details: ValidationDetails) {
    super(message);
  }
}

export function failValidation(prefix: string, issues: string[]): never {
  throw new ResponseValidationError(`${prefix}: ${issues.join('; ')}`, { issues });
}

export function describeIssue(issue: z.ZodIssue): string {
  return issue.path.length ? `${issue.path.join('.')} ${issue.message}` : issue.message;
}
