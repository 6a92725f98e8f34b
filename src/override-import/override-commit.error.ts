import { OverrideAction } from './override-import.types';

/** Raised when a row cannot be applied; the surrounding transaction has been rolled back. */
export class OverrideCommitError extends Error {
  constructor(
    readonly csvRowNumber: number,
    readonly action: OverrideAction,
    readonly reason: unknown,
  ) {
    super(`Row ${csvRowNumber}: failed to ${action} override: ${reason instanceof Error ? reason.message : String(reason)}`);
    this.name = 'OverrideCommitError';
  }
}
