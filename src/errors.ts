/**
 * A single problem found while validating a roster request.
 */
export interface RosterInputIssue {
  /** Dotted path into the request, e.g. `"employees.2.role"`. Empty for request-level issues. */
  path: string;
  message: string;
}

/**
 * Error thrown when a roster request is rejected before generation starts.
 *
 * Carries every issue found so callers can report them together. Nothing is
 * generated when this is thrown.
 *
 * @category Errors
 */
export class RosterInputError extends Error {
  public readonly issues: readonly RosterInputIssue[];

  constructor(message: string, issues: readonly RosterInputIssue[]) {
    super(message);
    this.name = "RosterInputError";
    this.issues = issues;
  }
}
