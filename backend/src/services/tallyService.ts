import type { VoteTally } from '../types/park.js';
import type { ParkVote } from '../types/vote.js';

export const EMPTY_TALLY: VoteTally = Object.freeze({ upvotes: 0, downvotes: 0 });

export const tallyVotes = (votes: readonly Pick<ParkVote, 'vote_type'>[]): VoteTally =>
  votes.reduce<VoteTally>(
    (acc, vote) =>
      vote.vote_type
        ? { upvotes: acc.upvotes + 1, downvotes: acc.downvotes }
        : { upvotes: acc.upvotes, downvotes: acc.downvotes + 1 },
    EMPTY_TALLY
  );

/**
 * Reads the up/down counts for a park from the ledger. Must be called with
 * the same unit of work that inserted the vote.
 */
export const recomputeTally = async (
  ledger: { countVotes(parkId: string): Promise<VoteTally> },
  parkId: string
): Promise<VoteTally> => {
  const tally = await ledger.countVotes(parkId);
  if (tally.upvotes < 0 || tally.downvotes < 0) {
    throw new Error(`Negative tally for park ${parkId}`);
  }
  return tally;
};
