import type { ParkStore } from '../db/store.js';
import type { Caller } from '../types/caller.js';
import type { ParkPhoto } from '../types/photo.js';
import { NotFoundOrHiddenError, UnauthorizedError } from '../utils/errors.js';
import { canRead, canWrite } from './accessPolicy.js';
import { requireVisiblePark } from './parkService.js';

/**
 * Photos attach a stored image URL to a park. They stay hidden from everyone
 * but the uploader until an admin approves them.
 */
export class PhotoService {
  constructor(private readonly store: ParkStore) {}

  async addPhoto(caller: Caller, parkId: string, url: string): Promise<ParkPhoto> {
    if (caller.id === null) {
      throw new UnauthorizedError(caller, 'upload photos');
    }
    await requireVisiblePark(this.store, caller, parkId);
    const row = { park_id: parkId, url, uploaded_by: caller.id };
    if (!canWrite(caller, { kind: 'photo', row: { ...row, is_approved: false } }, 'insert')) {
      throw new UnauthorizedError(caller, 'upload photos');
    }
    return this.store.insertPhoto(row);
  }

  async listPhotos(caller: Caller, parkId: string): Promise<ParkPhoto[]> {
    await requireVisiblePark(this.store, caller, parkId);
    const photos = await this.store.listPhotos(parkId);
    return photos.filter((photo) => canRead(caller, { kind: 'photo', row: photo }));
  }

  async getPhoto(caller: Caller, id: string): Promise<ParkPhoto> {
    const photo = await this.store.findPhoto(id);
    if (!photo || !canRead(caller, { kind: 'photo', row: photo })) {
      throw new NotFoundOrHiddenError('Photo');
    }
    await requireVisiblePark(this.store, caller, photo.park_id);
    return photo;
  }

  async setPhotoApproval(caller: Caller, id: string, approved: boolean): Promise<ParkPhoto> {
    const photo = await this.getPhoto(caller, id);
    if (!canWrite(caller, { kind: 'photo', row: photo }, 'update')) {
      throw new UnauthorizedError(caller, 'moderate photos');
    }
    const updated = await this.store.setPhotoApproval(id, approved);
    if (!updated) {
      throw new NotFoundOrHiddenError('Photo');
    }
    return updated;
  }

  async deletePhoto(caller: Caller, id: string): Promise<void> {
    const photo = await this.getPhoto(caller, id);
    if (!canWrite(caller, { kind: 'photo', row: photo }, 'delete')) {
      throw new UnauthorizedError(caller, 'delete photos');
    }
    if (!(await this.store.deletePhoto(id))) {
      throw new NotFoundOrHiddenError('Photo');
    }
  }
}
