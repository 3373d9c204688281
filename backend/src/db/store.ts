import type { ParkComment, NewCommentRow } from '../types/comment.js';
import type { NewParkRow, Park, ParkFilter, ParkStatus, VoteTally } from '../types/park.js';
import type { NewPhotoRow, ParkPhoto } from '../types/photo.js';
import type { NewTagRow, ParkTag } from '../types/tag.js';
import type { NewVoteRow, ParkVote } from '../types/vote.js';

/**
 * Operations available inside the atomic unit of work of a single vote.
 * The park row is locked for the lifetime of the transaction.
 */
export interface VoteTransaction {
  /** The locked park, or null when it does not exist. */
  readonly park: Park | null;
  /** Inserts the vote, or returns null if the voter already has one on this park. */
  insertVote(row: NewVoteRow): Promise<ParkVote | null>;
  countVotes(parkId: string): Promise<VoteTally>;
  saveModeration(parkId: string, tally: VoteTally, status: ParkStatus): Promise<Park>;
}

/**
 * Persistence port. Reads return raw rows; visibility filtering happens in
 * the services through the access policy.
 */
export interface ParkStore {
  insertPark(row: NewParkRow): Promise<Park>;
  findPark(id: string): Promise<Park | null>;
  /** Newest first, optionally only parks in one status. */
  listParks(filter?: ParkFilter): Promise<Park[]>;
  setParkStatus(id: string, status: ParkStatus): Promise<Park | null>;
  /** Removes the park and every vote, photo, comment and tag attached to it. */
  deletePark(id: string): Promise<boolean>;

  withVoteTransaction<T>(parkId: string, work: (tx: VoteTransaction) => Promise<T>): Promise<T>;
  listVotes(parkId: string): Promise<ParkVote[]>;

  insertPhoto(row: NewPhotoRow): Promise<ParkPhoto>;
  findPhoto(id: string): Promise<ParkPhoto | null>;
  listPhotos(parkId: string): Promise<ParkPhoto[]>;
  setPhotoApproval(id: string, approved: boolean): Promise<ParkPhoto | null>;
  deletePhoto(id: string): Promise<boolean>;

  insertComment(row: NewCommentRow): Promise<ParkComment>;
  findComment(id: string): Promise<ParkComment | null>;
  listComments(parkId: string): Promise<ParkComment[]>;
  setCommentReported(id: string, reported: boolean): Promise<ParkComment | null>;
  deleteComment(id: string): Promise<boolean>;

  insertTag(row: NewTagRow): Promise<ParkTag>;
  findTag(id: string): Promise<ParkTag | null>;
  listTags(parkId: string): Promise<ParkTag[]>;
  deleteTag(id: string): Promise<boolean>;

  close(): Promise<void>;
}
