import { v4 as uuid } from 'uuid';
import { tallyVotes } from '../services/tallyService.js';
import { NotFoundOrHiddenError } from '../utils/errors.js';
import type { NewCommentRow, ParkComment } from '../types/comment.js';
import type { NewParkRow, Park, ParkFilter, ParkStatus, VoteTally } from '../types/park.js';
import type { NewPhotoRow, ParkPhoto } from '../types/photo.js';
import type { NewTagRow, ParkTag } from '../types/tag.js';
import type { NewVoteRow, ParkVote } from '../types/vote.js';
import type { ParkStore, VoteTransaction } from './store.js';

const now = (): string => new Date().toISOString();

const voteKey = (parkId: string, userId: string): string => `${parkId}:${userId}`;

const dropChildren = <T extends { park_id: string }>(table: Map<string, T>, parkId: string): void => {
  for (const [key, row] of table) {
    if (row.park_id === parkId) table.delete(key);
  }
};

/**
 * In-process store used for development and tests.
 *
 * Votes on one park run one at a time behind a promise chain; the vote and the
 * park's new counts become visible together when the unit of work resolves.
 */
export class MemoryStore implements ParkStore {
  private readonly parks = new Map<string, Park>();
  private readonly votes = new Map<string, ParkVote>();
  private readonly photos = new Map<string, ParkPhoto>();
  private readonly comments = new Map<string, ParkComment>();
  private readonly tags = new Map<string, ParkTag>();
  private readonly locks = new Map<string, Promise<void>>();

  async insertPark(row: NewParkRow): Promise<Park> {
    const park: Park = {
      id: uuid(),
      name: row.name,
      description: row.description,
      latitude: row.latitude,
      longitude: row.longitude,
      address: row.address,
      status: 'pending',
      created_at: now(),
      created_by: row.created_by,
      upvotes: 0,
      downvotes: 0,
    };
    this.parks.set(park.id, park);
    return { ...park };
  }

  async findPark(id: string): Promise<Park | null> {
    const park = this.parks.get(id);
    return park ? { ...park } : null;
  }

  async listParks(filter: ParkFilter = {}): Promise<Park[]> {
    return [...this.parks.values()]
      .filter((park) => filter.status === undefined || park.status === filter.status)
      .reverse()
      .map((park) => ({ ...park }));
  }

  async setParkStatus(id: string, status: ParkStatus): Promise<Park | null> {
    return this.serialize(id, async () => {
      const park = this.parks.get(id);
      if (!park) return null;
      const updated = { ...park, status };
      this.parks.set(id, updated);
      return { ...updated };
    });
  }

  async deletePark(id: string): Promise<boolean> {
    return this.serialize(id, async () => {
      if (!this.parks.delete(id)) return false;
      dropChildren(this.votes, id);
      dropChildren(this.photos, id);
      dropChildren(this.comments, id);
      dropChildren(this.tags, id);
      return true;
    });
  }

  async withVoteTransaction<T>(
    parkId: string,
    work: (tx: VoteTransaction) => Promise<T>
  ): Promise<T> {
    return this.serialize(parkId, () => this.runVoteTransaction(parkId, work));
  }

  // Row lock stand-in: writes to one park's row run one after another.
  private async serialize<T>(parkId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(parkId) ?? Promise.resolve();
    const run = previous.then(fn);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(parkId, settled);
    try {
      return await run;
    } finally {
      if (this.locks.get(parkId) === settled) {
        this.locks.delete(parkId);
      }
    }
  }

  private async runVoteTransaction<T>(
    parkId: string,
    work: (tx: VoteTransaction) => Promise<T>
  ): Promise<T> {
    const locked = this.parks.get(parkId);
    const staged: ParkVote[] = [];
    let stagedPark: Park | null = locked ? { ...locked } : null;

    const tx: VoteTransaction = {
      park: locked ? { ...locked } : null,
      insertVote: async (row) => {
        const key = voteKey(row.park_id, row.user_id);
        if (this.votes.has(key) || staged.some((v) => voteKey(v.park_id, v.user_id) === key)) {
          return null;
        }
        const vote: ParkVote = { id: uuid(), ...row, created_at: now() };
        staged.push(vote);
        return { ...vote };
      },
      countVotes: async (id) => {
        const committed = [...this.votes.values()].filter((v) => v.park_id === id);
        return tallyVotes([...committed, ...staged.filter((v) => v.park_id === id)]);
      },
      saveModeration: async (id, tally: VoteTally, status) => {
        if (!stagedPark || stagedPark.id !== id) {
          throw new Error(`Park ${id} is not locked by this transaction`);
        }
        stagedPark = { ...stagedPark, ...tally, status };
        return { ...stagedPark };
      },
    };

    const result = await work(tx);

    for (const vote of staged) {
      this.votes.set(voteKey(vote.park_id, vote.user_id), vote);
    }
    if (stagedPark) {
      this.parks.set(parkId, stagedPark);
    }
    return result;
  }

  async listVotes(parkId: string): Promise<ParkVote[]> {
    return [...this.votes.values()]
      .filter((vote) => vote.park_id === parkId)
      .map((vote) => ({ ...vote }));
  }

  async insertPhoto(row: NewPhotoRow): Promise<ParkPhoto> {
    this.requirePark(row.park_id);
    const photo: ParkPhoto = { id: uuid(), ...row, created_at: now(), is_approved: false };
    this.photos.set(photo.id, photo);
    return { ...photo };
  }

  async findPhoto(id: string): Promise<ParkPhoto | null> {
    const photo = this.photos.get(id);
    return photo ? { ...photo } : null;
  }

  async listPhotos(parkId: string): Promise<ParkPhoto[]> {
    return [...this.photos.values()]
      .filter((photo) => photo.park_id === parkId)
      .map((photo) => ({ ...photo }));
  }

  async setPhotoApproval(id: string, approved: boolean): Promise<ParkPhoto | null> {
    const photo = this.photos.get(id);
    if (!photo) return null;
    const updated = { ...photo, is_approved: approved };
    this.photos.set(id, updated);
    return { ...updated };
  }

  async deletePhoto(id: string): Promise<boolean> {
    return this.photos.delete(id);
  }

  async insertComment(row: NewCommentRow): Promise<ParkComment> {
    this.requirePark(row.park_id);
    const comment: ParkComment = { id: uuid(), ...row, created_at: now(), is_reported: false };
    this.comments.set(comment.id, comment);
    return { ...comment };
  }

  async findComment(id: string): Promise<ParkComment | null> {
    const comment = this.comments.get(id);
    return comment ? { ...comment } : null;
  }

  async listComments(parkId: string): Promise<ParkComment[]> {
    return [...this.comments.values()]
      .filter((comment) => comment.park_id === parkId)
      .map((comment) => ({ ...comment }));
  }

  async setCommentReported(id: string, reported: boolean): Promise<ParkComment | null> {
    const comment = this.comments.get(id);
    if (!comment) return null;
    const updated = { ...comment, is_reported: reported };
    this.comments.set(id, updated);
    return { ...updated };
  }

  async deleteComment(id: string): Promise<boolean> {
    return this.comments.delete(id);
  }

  async insertTag(row: NewTagRow): Promise<ParkTag> {
    this.requirePark(row.park_id);
    const tag: ParkTag = { id: uuid(), ...row };
    this.tags.set(tag.id, tag);
    return { ...tag };
  }

  async findTag(id: string): Promise<ParkTag | null> {
    const tag = this.tags.get(id);
    return tag ? { ...tag } : null;
  }

  async listTags(parkId: string): Promise<ParkTag[]> {
    return [...this.tags.values()]
      .filter((tag) => tag.park_id === parkId)
      .sort((a, b) => a.tag.localeCompare(b.tag))
      .map((tag) => ({ ...tag }));
  }

  async deleteTag(id: string): Promise<boolean> {
    return this.tags.delete(id);
  }

  async close(): Promise<void> {}

  private requirePark(parkId: string): void {
    if (!this.parks.has(parkId)) {
      throw new NotFoundOrHiddenError('Park');
    }
  }
}
