export type VoteDirection = 'up' | 'down';

export interface ParkVote {
  id: string;
  park_id: string;
  user_id: string;
  /** true for an upvote, false for a downvote */
  vote_type: boolean;
  created_at: string;
}

export interface NewVoteRow {
  park_id: string;
  user_id: string;
  vote_type: boolean;
}

export const toVoteType = (direction: VoteDirection): boolean => direction === 'up';
