import type { ParkStore } from '../db/store.js';
import type { Caller } from '../types/caller.js';
import type { ParkTag } from '../types/tag.js';
import { CACHE_TTL, getCacheKey, type Cache } from '../utils/cache.js';
import { NotFoundOrHiddenError, UnauthorizedError, ValidationError } from '../utils/errors.js';
import { canRead, canWrite } from './accessPolicy.js';
import { requireVisiblePark } from './parkService.js';

export const normalizeTag = (tag: string): string => tag.trim().toLowerCase();

export class TagService {
  constructor(
    private readonly store: ParkStore,
    private readonly cache: Cache,
    private readonly ttl: number = CACHE_TTL.PARK_TAGS
  ) {}

  async addTag(caller: Caller, parkId: string, tag: string): Promise<ParkTag> {
    if (caller.id === null) {
      throw new UnauthorizedError(caller, 'tag parks');
    }
    const normalized = normalizeTag(tag);
    if (!normalized) {
      throw new ValidationError('tag is required');
    }
    await requireVisiblePark(this.store, caller, parkId);
    const row = { park_id: parkId, tag: normalized };
    if (!canWrite(caller, { kind: 'tag', row }, 'insert')) {
      throw new UnauthorizedError(caller, 'tag parks');
    }
    const created = await this.store.insertTag(row);
    await this.cache.del(getCacheKey.parkTags(parkId));
    return created;
  }

  /**
   * Tags are unmoderated, so the list for a park is the same for every caller
   * who can see the park and is cached as a whole.
   */
  async listTags(caller: Caller, parkId: string): Promise<ParkTag[]> {
    await requireVisiblePark(this.store, caller, parkId);

    const cacheKey = getCacheKey.parkTags(parkId);
    const cached = await this.cache.get<ParkTag[]>(cacheKey);
    if (cached) {
      return cached;
    }

    const tags = (await this.store.listTags(parkId)).filter((tag) =>
      canRead(caller, { kind: 'tag', row: tag })
    );
    await this.cache.set(cacheKey, tags, this.ttl);
    return tags;
  }

  async deleteTag(caller: Caller, id: string): Promise<void> {
    const tag = await this.store.findTag(id);
    if (!tag) {
      throw new NotFoundOrHiddenError('Tag');
    }
    await requireVisiblePark(this.store, caller, tag.park_id);
    if (!canWrite(caller, { kind: 'tag', row: tag }, 'delete')) {
      throw new UnauthorizedError(caller, 'delete tags');
    }
    if (!(await this.store.deleteTag(id))) {
      throw new NotFoundOrHiddenError('Tag');
    }
    await this.cache.del(getCacheKey.parkTags(tag.park_id));
  }
}
