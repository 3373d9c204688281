import type { ParkStore } from '../../src/db/store';
import type { VoteLedger } from '../../src/services/voteLedger';
import { userCaller } from '../../src/types/caller';
import type { CreateParkInput, Park } from '../../src/types/park';

export const OWNER_ID = '11111111-1111-4111-8111-111111111111';
export const OTHER_ID = '22222222-2222-4222-8222-222222222222';
export const ADMIN_ID = '33333333-3333-4333-8333-333333333333';
export const MISSING_ID = '99999999-9999-4999-8999-999999999999';

export const voterId = (n: number): string => `44444444-4444-4444-8444-${String(n).padStart(12, '0')}`;

export const parkInput = (overrides: Partial<CreateParkInput> = {}): CreateParkInput => ({
  name: 'Test Park',
  description: 'Bars and rings',
  latitude: 40.4168,
  longitude: -3.7038,
  address: 'Main Street 1',
  ...overrides,
});

export const insertPark = (store: ParkStore, createdBy: string = OWNER_ID): Promise<Park> =>
  store.insertPark({
    name: 'Test Park',
    description: null,
    latitude: 40.4168,
    longitude: -3.7038,
    address: null,
    created_by: createdBy,
  });

/**
 * Casts `ups` upvotes then `downs` downvotes from distinct voters, one after another.
 */
export async function castVotes(ledger: VoteLedger, parkId: string, ups: number, downs: number, offset = 0) {
  for (let i = 0; i < ups; i++) {
    await ledger.castVote(userCaller(voterId(offset + i)), parkId, 'up');
  }
  for (let i = 0; i < downs; i++) {
    await ledger.castVote(userCaller(voterId(offset + ups + i)), parkId, 'down');
  }
}
