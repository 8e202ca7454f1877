import type { ZodIssue } from 'zod';

/**
 * A value failed its declared bounds while being constructed
 * (request coordinates or the assembled response).
 */
export class ValidationError extends Error {
  readonly issues: ZodIssue[];
  constructor(msg: string, issues: ZodIssue[] = []) {
    super(msg);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class PreconditionError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = 'PreconditionError';
  }
}

/** Station catalog or archive file missing, unreadable or malformed. */
export class DataUnavailableError extends Error {
  readonly source: string;
  constructor(msg: string, source: string) {
    super(msg);
    this.name = 'DataUnavailableError';
    this.source = source;
  }
}

export function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
