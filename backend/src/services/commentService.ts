import type { ParkStore } from '../db/store.js';
import type { Caller } from '../types/caller.js';
import type { ParkComment } from '../types/comment.js';
import { NotFoundOrHiddenError, UnauthorizedError, ValidationError } from '../utils/errors.js';
import { canRead, canWrite } from './accessPolicy.js';
import { requireVisiblePark } from './parkService.js';

export class CommentService {
  constructor(private readonly store: ParkStore) {}

  async addComment(caller: Caller, parkId: string, content: string): Promise<ParkComment> {
    if (caller.id === null) {
      throw new UnauthorizedError(caller, 'comment');
    }
    const text = content.trim();
    if (!text) {
      throw new ValidationError('content is required');
    }
    await requireVisiblePark(this.store, caller, parkId);
    const row = { park_id: parkId, user_id: caller.id, content: text };
    if (!canWrite(caller, { kind: 'comment', row: { ...row, is_reported: false } }, 'insert')) {
      throw new UnauthorizedError(caller, 'comment');
    }
    return this.store.insertComment(row);
  }

  /**
   * Comments on a park, oldest first. Reported comments are only shown to
   * their author and to admins.
   */
  async listComments(caller: Caller, parkId: string): Promise<ParkComment[]> {
    await requireVisiblePark(this.store, caller, parkId);
    const comments = await this.store.listComments(parkId);
    return comments.filter((comment) => canRead(caller, { kind: 'comment', row: comment }));
  }

  async getComment(caller: Caller, id: string): Promise<ParkComment> {
    const comment = await this.store.findComment(id);
    if (!comment || !canRead(caller, { kind: 'comment', row: comment })) {
      throw new NotFoundOrHiddenError('Comment');
    }
    await requireVisiblePark(this.store, caller, comment.park_id);
    return comment;
  }

  async setCommentReported(caller: Caller, id: string, reported: boolean): Promise<ParkComment> {
    const comment = await this.getComment(caller, id);
    if (!canWrite(caller, { kind: 'comment', row: comment }, 'update')) {
      throw new UnauthorizedError(caller, 'moderate comments');
    }
    const updated = await this.store.setCommentReported(id, reported);
    if (!updated) {
      throw new NotFoundOrHiddenError('Comment');
    }
    return updated;
  }

  async deleteComment(caller: Caller, id: string): Promise<void> {
    const comment = await this.getComment(caller, id);
    if (!canWrite(caller, { kind: 'comment', row: comment }, 'delete')) {
      throw new UnauthorizedError(caller, 'delete comments');
    }
    if (!(await this.store.deleteComment(id))) {
      throw new NotFoundOrHiddenError('Comment');
    }
  }
}
