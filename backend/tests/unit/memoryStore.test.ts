import { MemoryStore } from '../../src/db/memoryStore';
import { NotFoundOrHiddenError } from '../../src/utils/errors';
import { MISSING_ID, OTHER_ID, insertPark } from '../helpers/fixtures';

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  describe('withVoteTransaction', () => {
    it('commits the vote and the park together', async () => {
      const park = await insertPark(store);

      await store.withVoteTransaction(park.id, async (tx) => {
        await tx.insertVote({ park_id: park.id, user_id: OTHER_ID, vote_type: true });
        const tally = await tx.countVotes(park.id);
        await tx.saveModeration(park.id, tally, 'pending');
      });

      expect(await store.listVotes(park.id)).toHaveLength(1);
      expect(await store.findPark(park.id)).toMatchObject({ upvotes: 1, downvotes: 0 });
    });

    it('commits nothing when the unit of work throws', async () => {
      const park = await insertPark(store);

      await expect(
        store.withVoteTransaction(park.id, async (tx) => {
          await tx.insertVote({ park_id: park.id, user_id: OTHER_ID, vote_type: true });
          await tx.saveModeration(park.id, { upvotes: 1, downvotes: 0 }, 'approved');
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(await store.listVotes(park.id)).toEqual([]);
      expect(await store.findPark(park.id)).toMatchObject({ status: 'pending', upvotes: 0, downvotes: 0 });
    });

    it('reports a second vote from the same voter as a conflict', async () => {
      const park = await insertPark(store);

      const second = await store.withVoteTransaction(park.id, async (tx) => {
        await tx.insertVote({ park_id: park.id, user_id: OTHER_ID, vote_type: true });
        return tx.insertVote({ park_id: park.id, user_id: OTHER_ID, vote_type: false });
      });

      expect(second).toBeNull();
    });

    it('hands the unit of work a null park when it does not exist', async () => {
      const seen = await store.withVoteTransaction(MISSING_ID, async (tx) => tx.park);

      expect(seen).toBeNull();
    });
  });

  it('returns copies so callers cannot mutate stored rows', async () => {
    const park = await insertPark(store);
    const copy = await store.findPark(park.id);
    if (!copy) throw new Error('park missing');

    copy.status = 'approved';

    expect(await store.findPark(park.id)).toMatchObject({ status: 'pending' });
  });

  it('cascades a park delete to its children', async () => {
    const park = await insertPark(store);
    await store.insertPhoto({ park_id: park.id, url: 'https://img.test/1.jpg', uploaded_by: OTHER_ID });
    await store.insertComment({ park_id: park.id, user_id: OTHER_ID, content: 'hi' });
    await store.insertTag({ park_id: park.id, tag: 'bars' });

    expect(await store.deletePark(park.id)).toBe(true);

    expect(await store.listPhotos(park.id)).toEqual([]);
    expect(await store.listComments(park.id)).toEqual([]);
    expect(await store.listTags(park.id)).toEqual([]);
    expect(await store.deletePark(park.id)).toBe(false);
  });

  it('refuses children for a missing park', async () => {
    await expect(store.insertTag({ park_id: MISSING_ID, tag: 'bars' })).rejects.toBeInstanceOf(NotFoundOrHiddenError);
  });
});
