import type { Caller } from '../types/caller.js';
import type { ParkComment } from '../types/comment.js';
import type { Park } from '../types/park.js';
import type { ParkPhoto } from '../types/photo.js';
import type { ParkTag } from '../types/tag.js';
import type { ParkVote } from '../types/vote.js';

export type Role = 'anonymous' | 'authenticated' | 'owner' | 'admin';

export type WriteOperation = 'insert' | 'update' | 'delete';

/**
 * A row as seen by the policy: only the fields visibility depends on.
 * Inserts pass the row about to be written.
 */
export type PolicyTarget =
  | { kind: 'park'; row: Pick<Park, 'status' | 'created_by'> }
  | { kind: 'photo'; row: Pick<ParkPhoto, 'is_approved' | 'uploaded_by'> }
  | { kind: 'comment'; row: Pick<ParkComment, 'is_reported' | 'user_id'> }
  | { kind: 'tag'; row: Partial<Pick<ParkTag, 'park_id'>> }
  | { kind: 'vote'; row: Pick<ParkVote, 'user_id'> };

export const ownerOf = (target: PolicyTarget): string | null => {
  switch (target.kind) {
    case 'park':
      return target.row.created_by;
    case 'photo':
      return target.row.uploaded_by;
    case 'comment':
    case 'vote':
      return target.row.user_id;
    case 'tag':
      return null;
  }
};

export const roleOf = (caller: Caller, ownerId: string | null): Role => {
  if (caller.isAdmin) return 'admin';
  if (caller.id === null) return 'anonymous';
  if (ownerId !== null && caller.id === ownerId) return 'owner';
  return 'authenticated';
};

export function canRead(caller: Caller, target: PolicyTarget): boolean {
  const role = roleOf(caller, ownerOf(target));
  if (role === 'admin') return true;

  switch (target.kind) {
    case 'park':
      if (target.row.status === 'approved') return true;
      // Owners keep sight of their submission only while it is under review.
      return role === 'owner' && target.row.status === 'pending';
    case 'photo':
      return target.row.is_approved || role === 'owner';
    case 'comment':
      return !target.row.is_reported || role === 'owner';
    case 'tag':
      return true;
    case 'vote':
      return role === 'owner';
  }
}

export function canWrite(caller: Caller, target: PolicyTarget, operation: WriteOperation): boolean {
  const role = roleOf(caller, ownerOf(target));
  if (role === 'admin') return true;
  if (operation !== 'insert') return false;
  if (role === 'anonymous') return false;

  // Non-admins may only insert rows that record themselves as the author.
  return target.kind === 'tag' || role === 'owner';
}
