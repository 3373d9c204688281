import type { ParkStore } from '../db/store.js';
import type { Caller } from '../types/caller.js';
import type { CreateParkInput, Park, ParkFilter, ParkStatus } from '../types/park.js';
import type { Cache } from '../utils/cache.js';
import { getCacheKey } from '../utils/cache.js';
import { NotFoundOrHiddenError, UnauthorizedError, ValidationError } from '../utils/errors.js';
import { isValidCoordinate } from '../utils/geospatial.js';
import { canRead, canWrite } from './accessPolicy.js';

const blankToNull = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

/**
 * Loads a park the caller may read. Missing and hidden parks look the same.
 */
export async function requireVisiblePark(store: ParkStore, caller: Caller, parkId: string): Promise<Park> {
  const park = await store.findPark(parkId);
  if (!park || !canRead(caller, { kind: 'park', row: park })) {
    throw new NotFoundOrHiddenError('Park');
  }
  return park;
}

export class ParkService {
  constructor(
    private readonly store: ParkStore,
    private readonly cache: Cache
  ) {}

  /**
   * Submit a new park. It starts out pending with no votes.
   */
  async createSubmission(caller: Caller, input: CreateParkInput): Promise<Park> {
    if (caller.id === null) {
      throw new UnauthorizedError(caller, 'submit parks');
    }
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError('name is required');
    }
    if (!isValidCoordinate(input.latitude, input.longitude)) {
      throw new ValidationError('latitude must be between -90 and 90, longitude between -180 and 180');
    }

    const row = {
      name,
      description: blankToNull(input.description),
      latitude: input.latitude,
      longitude: input.longitude,
      address: blankToNull(input.address),
      created_by: caller.id,
    };
    if (!canWrite(caller, { kind: 'park', row: { status: 'pending', created_by: row.created_by } }, 'insert')) {
      throw new UnauthorizedError(caller, 'submit parks');
    }

    return this.store.insertPark(row);
  }

  async getSubmission(caller: Caller, id: string): Promise<Park> {
    return requireVisiblePark(this.store, caller, id);
  }

  /**
   * Parks the caller may see, newest first.
   */
  async listVisibleSubmissions(caller: Caller, filter: ParkFilter = {}): Promise<Park[]> {
    // Anonymous callers only ever see approved parks.
    if (caller.id === null) {
      if (filter.status !== undefined && filter.status !== 'approved') {
        return [];
      }
      return this.store.listParks({ status: 'approved' });
    }
    const parks = await this.store.listParks(filter);
    return parks.filter((park) => canRead(caller, { kind: 'park', row: park }));
  }

  /**
   * Moderator override of the vote-driven status.
   */
  async setSubmissionStatus(caller: Caller, id: string, status: ParkStatus): Promise<Park> {
    const park = await requireVisiblePark(this.store, caller, id);
    if (!canWrite(caller, { kind: 'park', row: park }, 'update')) {
      throw new UnauthorizedError(caller, 'change park status');
    }
    const updated = await this.store.setParkStatus(id, status);
    if (!updated) {
      throw new NotFoundOrHiddenError('Park');
    }
    console.log(`Park ${id} set to ${status} by ${caller.id ?? 'unknown'}`);
    return updated;
  }

  async deleteSubmission(caller: Caller, id: string): Promise<void> {
    const park = await requireVisiblePark(this.store, caller, id);
    if (!canWrite(caller, { kind: 'park', row: park }, 'delete')) {
      throw new UnauthorizedError(caller, 'delete parks');
    }
    if (!(await this.store.deletePark(id))) {
      throw new NotFoundOrHiddenError('Park');
    }
    await this.cache.del(getCacheKey.parkTags(id));
  }
}
