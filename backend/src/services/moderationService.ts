import { MODERATION_THRESHOLDS, type ModerationThresholds } from '../config/moderation.js';
import type { ParkStatus, VoteTally } from '../types/park.js';

export const isTerminal = (status: ParkStatus): boolean => status !== 'pending';

const share = (part: number, tally: VoteTally): number => {
  const total = tally.upvotes + tally.downvotes;
  return total === 0 ? 0 : part / total;
};

/**
 * Status a park should hold after its tally changed.
 *
 * Approval is checked before rejection. A terminal status is returned as is,
 * so votes arriving after a decision are counted but never move the park.
 */
export const nextStatus = (
  current: ParkStatus,
  tally: VoteTally,
  thresholds: ModerationThresholds = MODERATION_THRESHOLDS
): ParkStatus => {
  if (isTerminal(current)) {
    return current;
  }

  if (
    tally.upvotes >= thresholds.minUpvotes &&
    share(tally.upvotes, tally) >= thresholds.approvalRatio
  ) {
    return 'approved';
  }

  if (
    tally.downvotes >= thresholds.minDownvotes &&
    share(tally.downvotes, tally) >= thresholds.rejectionRatio
  ) {
    return 'rejected';
  }

  return current;
};
