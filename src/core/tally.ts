import type { TaskOutcome, TransferTally } from '@shared';

export function createTally(): TransferTally {
  return { uploaded: 0, failed: 0 };
}

/**
 * Counts a settled task and returns the running total for its outcome.
 * The only place a tally is mutated.
 */
export function recordOutcome(
  tally: TransferTally,
  outcome: TaskOutcome,
): number {
  if (outcome.ok) {
    tally.uploaded += 1;
    return tally.uploaded;
  }
  tally.failed += 1;
  return tally.failed;
}
