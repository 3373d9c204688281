import { getPool } from '../config/database.js';
import { config } from '../config/index.js';
import { createServices } from '../services/index.js';
import { userCaller } from '../types/caller.js';
import type { CreateParkInput } from '../types/park.js';
import { NoopCache } from '../utils/cache.js';
import { MemoryStore } from './memoryStore.js';
import { PostgresStore } from './postgresStore.js';

const SEED_OWNER = '00000000-0000-4000-8000-000000000001';
const SEED_VOTERS = Array.from(
  { length: 12 },
  (_, i) => `00000000-0000-4000-8000-${String(100 + i).padStart(12, '0')}`
);

const seedParks: CreateParkInput[] = [
  {
    name: 'Riverside Bars',
    description: 'Pull-up bars, dip station and parallel bars by the river path.',
    latitude: 52.5163,
    longitude: 13.3777,
    address: 'Riverside Walk 1',
  },
  {
    name: 'Hilltop Fitness Corner',
    description: 'Monkey bars and a low bar set, lit in the evening.',
    latitude: 48.1374,
    longitude: 11.5755,
    address: null,
  },
];

async function seedDatabase() {
  const store = config.database.url ? new PostgresStore(getPool()) : new MemoryStore();
  const services = createServices(store, new NoopCache());
  const owner = userCaller(SEED_OWNER);

  try {
    for (const input of seedParks) {
      const park = await services.parks.createSubmission(owner, input);
      console.log(`✓ Seeded ${park.name} (${park.latitude}, ${park.longitude})`);
    }

    // Vote the first park through approval so listings have something public.
    const parks = await services.parks.listVisibleSubmissions(owner);
    const first = parks.find((park) => park.name === seedParks[0].name);
    if (first) {
      for (const voter of SEED_VOTERS) {
        await services.votes.castVote(userCaller(voter), first.id, 'up');
      }
      const approved = await services.parks.getSubmission(owner, first.id);
      console.log(`✓ ${approved.name} is ${approved.status}`);
    }
  } catch (error) {
    console.error('Error seeding database:', error);
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

void seedDatabase();
