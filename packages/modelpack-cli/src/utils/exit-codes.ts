/**
 * Process exit codes for the modelpack CLI.
 */

import { ModelPackError, normalizeError } from 'modelpack';
import type { ErrorCategory } from 'modelpack';

/** Bad arguments or a missing manifest file */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 1;
export const EXIT_UNEXPECTED = 5;

const CATEGORY_EXIT_CODES: Record<ErrorCategory, number> = {
  download: 2,
  verification: 3,
  permission: 4,
  configuration: 6,
  lock: 7,
  cancelled: 130,
};

export function exitCodeFor(err: unknown): number {
  if (err instanceof UsageError) {
    return EXIT_USAGE;
  }
  const normalized = normalizeError(err);
  if (normalized instanceof ModelPackError) {
    return CATEGORY_EXIT_CODES[normalized.category];
  }
  return EXIT_UNEXPECTED;
}
