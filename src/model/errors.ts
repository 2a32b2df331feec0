import { ValidationIssue } from './types';

/**
 * Thrown by `ProblemBuilder.build()` when the definition cannot be solved as
 * written: an undeclared variable, a missing or empty domain, and so on.
 */
export class InvalidProblemError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const errors = issues.filter((issue) => issue.level === 'error');
    super(`Invalid problem definition: ${errors.map((issue) => issue.message).join('; ')}`);
    this.name = 'InvalidProblemError';
    this.issues = issues;
  }
}
