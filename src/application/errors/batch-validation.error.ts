/**
 * Raised for orchestration input that cannot be run at all (unknown mode,
 * empty path). File-level problems are never thrown; they are results.
 */
export class BatchValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid batch request: ${issues.join('; ')}`);
    this.name = 'BatchValidationError';
    this.issues = issues;
  }
}
