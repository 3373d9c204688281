import type { ParkStore } from '../db/store.js';
import type { Caller } from '../types/caller.js';
import type { Park } from '../types/park.js';
import { toVoteType, type ParkVote, type VoteDirection } from '../types/vote.js';
import {
  DuplicateVoteError,
  NotFoundOrHiddenError,
  UnauthorizedError,
  UnknownSubmissionError,
} from '../utils/errors.js';
import { canRead, canWrite } from './accessPolicy.js';
import { nextStatus } from './moderationService.js';
import { recomputeTally } from './tallyService.js';

export interface CastVoteResult {
  vote: ParkVote;
  /** The park after the vote, or null when the voter may not read it (e.g. someone else's pending park). */
  park: Park | null;
}

/**
 * Append-only record of one vote per (park, voter).
 *
 * Casting a vote runs ledger insert, tally and moderation inside one unit of
 * work on the park, so the park is never seen with counts that disagree with
 * its votes or its status.
 */
export class VoteLedger {
  constructor(private readonly store: ParkStore) {}

  async castVote(caller: Caller, parkId: string, direction: VoteDirection): Promise<CastVoteResult> {
    if (caller.id === null) {
      throw new UnauthorizedError(caller, 'vote');
    }
    const voterId = caller.id;
    if (!canWrite(caller, { kind: 'vote', row: { user_id: voterId } }, 'insert')) {
      throw new UnauthorizedError(caller, 'vote');
    }

    return this.store.withVoteTransaction(parkId, async (tx) => {
      const locked = tx.park;
      if (!locked) {
        throw new UnknownSubmissionError(parkId);
      }

      const vote = await tx.insertVote({
        park_id: parkId,
        user_id: voterId,
        vote_type: toVoteType(direction),
      });
      if (!vote) {
        throw new DuplicateVoteError(parkId);
      }

      const tally = await recomputeTally(tx, parkId);
      const status = nextStatus(locked.status, tally);
      const park = await tx.saveModeration(parkId, tally, status);

      if (status !== locked.status) {
        console.log(`Park ${parkId} ${status} at ${tally.upvotes} up / ${tally.downvotes} down`);
      }

      return { vote, park: canRead(caller, { kind: 'park', row: park }) ? park : null };
    });
  }

  /**
   * Votes the caller may read on a park: their own, or every vote for an admin.
   * Voting does not require seeing the park, so neither does reading one's vote.
   */
  async listVotes(caller: Caller, parkId: string): Promise<ParkVote[]> {
    const park = await this.store.findPark(parkId);
    if (!park) {
      throw new NotFoundOrHiddenError('Park');
    }
    const votes = await this.store.listVotes(parkId);
    return votes.filter((vote) => canRead(caller, { kind: 'vote', row: vote }));
  }

  async getOwnVote(caller: Caller, parkId: string): Promise<ParkVote | null> {
    if (caller.id === null) {
      throw new UnauthorizedError(caller, 'read votes');
    }
    const votes = await this.listVotes(caller, parkId);
    return votes.find((vote) => vote.user_id === caller.id) ?? null;
  }
}
