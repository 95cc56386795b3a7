import type { z } from 'zod';

export class UpgradeSchemaError extends Error {
  constructor(message = 'Upgrade table validation failed') {
    super(message);
    this.name = 'UpgradeSchemaError';
  }
}

/**
 * Raised when a transition, price or policy document fails structural or
 * cross-reference validation. `issues` keeps the raw zod issues so callers can
 * render them however they like.
 */
export class TableValidationError extends UpgradeSchemaError {
  constructor(
    readonly source: string,
    readonly issues: readonly z.ZodIssue[],
  ) {
    super(`Invalid ${source}: ${formatIssues(issues)}`);
    this.name = 'TableValidationError';
  }
}

export const formatIssuePath = (path: readonly (string | number)[]): string =>
  path.length === 0 ? '<root>' : path.join('.');

export const formatIssues = (issues: readonly z.ZodIssue[]): string =>
  issues
    .map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`)
    .join('; ');
