/**
 * Raised when a recognized option is given an out-of-domain value.
 * The pipeline validates configuration before loading anything, so this is
 * the only error a run can end with.
 */
export class EdaConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid EDA configuration: ${issues.join('; ')}`);
    this.name = 'EdaConfigError';
    this.issues = issues;
  }
}

export function isEdaConfigError(error: unknown): error is EdaConfigError {
  return error instanceof EdaConfigError;
}
