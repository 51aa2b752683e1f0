import type { ZodIssue } from 'zod';

import type { RoundingParameter } from './types';

const describeIssues = (issues: ZodIssue[]): string =>
  issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

/** Thrown before any rounding happens when a digit count or request is out of range. */
export class InvalidParameterError extends Error {
  readonly parameter: RoundingParameter;
  readonly received: unknown;
  readonly issues: ZodIssue[];

  constructor(parameter: RoundingParameter, received: unknown, issues: ZodIssue[]) {
    super(
      parameter === 'request'
        ? `Invalid rounding request: ${describeIssues(issues)}`
        : `Invalid ${parameter} (${String(received)}): ${describeIssues(issues)}`,
    );
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
    this.received = received;
    this.issues = issues;
  }
}
