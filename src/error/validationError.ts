import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Renders a single issue as `path: message`, or the bare message at the root.
 */
function describeIssue(issue: StandardSchemaV1.Issue): string {
  const path = (issue.path ?? [])
    .map((segment) => String(typeof segment === 'object' ? segment.key : segment))
    .join('.');

  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Error representing a validation error when validating with @standard-schema
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError that extends Error, with accompanying Issues */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length ? `${message}; issues: ${issues.map(describeIssue).join(', ')}` : message, opts);
    this.issues = issues;
  }
}

/**
 * Type guard for {@link ValidationError}, following nested causes.
 */
export function isValidationError(error: unknown): boolean {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): ValidationError | null {
  return unwrapErrorType(ValidationError, error);
}
