import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { pino } from 'pino';
import { readCatalogFixture, seedCatalog } from '../services/seed.js';
import { createStore } from '../services/store.js';

const FIXTURE_CANDIDATES = [
  new URL('../../data/sample-catalog.json', import.meta.url),
  new URL('../../apps/api/data/sample-catalog.json', import.meta.url)
];

function fixturePath(): string {
  const explicit = process.argv[2];
  if (explicit) return explicit;

  const found = FIXTURE_CANDIDATES.map((url) => fileURLToPath(url)).find((file) => existsSync(file));
  if (!found) throw new Error('sample_catalog_not_found');
  return found;
}

const log = pino({ name: 'seed' });
const store = createStore();

try {
  const file = fixturePath();
  const counts = seedCatalog(store, readCatalogFixture(file));
  log.info({ file, dbFile: store.file, ...counts }, 'catalog_seeded');
} catch (error) {
  log.error({ err: error }, 'catalog_seed_failed');
  process.exitCode = 1;
} finally {
  store.close();
}
