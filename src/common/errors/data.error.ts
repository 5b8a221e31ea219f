/**
 * DataError
 *
 * Raised when input data cannot be loaded: malformed dates, broken
 * invariants, duplicate identifiers or a dataset file that fails validation.
 * `issues` lists every problem found, not only the first one.
 */
export class DataError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'DataError';
    this.issues = issues;
  }
}
