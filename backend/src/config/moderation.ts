/**
 * Vote thresholds that move a park out of `pending`.
 * A park is approved once it has at least `minUpvotes` upvotes making up at
 * least `approvalRatio` of all votes; rejection mirrors this for downvotes.
 */
export const MODERATION_THRESHOLDS = {
  minUpvotes: 10,
  approvalRatio: 0.7,
  minDownvotes: 5,
  rejectionRatio: 0.7,
} as const;

export type ModerationThresholds = {
  minUpvotes: number;
  approvalRatio: number;
  minDownvotes: number;
  rejectionRatio: number;
};
