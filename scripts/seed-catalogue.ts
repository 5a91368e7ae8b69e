/**
 * Write the bundled sample postings into a SQLite catalogue.
 *
 * Usage: npx tsx scripts/seed-catalogue.ts [path]   (default: JOB_CATALOGUE_PATH)
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { loadConfigFromEnv } from '../src/config.js';
import { loadSamplePostings, seedCatalogue } from '../src/db/seed.js';
import { logger, setLogLevel } from '../src/utils/logger.js';

const config = loadConfigFromEnv();
if (!config.ok) {
  process.exit(1);
}
setLogLevel(config.value.LOG_LEVEL);

const target = process.argv[2] || config.value.JOB_CATALOGUE_PATH;

try {
  mkdirSync(dirname(target), { recursive: true });
  const postings = loadSamplePostings();
  const stats = seedCatalogue(target, postings);

  console.log('\n📊 Catalogue statistics:');
  console.log(`   Total jobs:       ${stats.total}`);
  console.log(`   Unique titles:    ${stats.uniqueTitles}`);
  console.log(`   Unique companies: ${stats.uniqueCompanies}`);
  console.log(`\n✅ Catalogue written to ${target}\n`);
} catch (error) {
  logger.error('Seed', 'Failed to write catalogue', error);
  process.exit(1);
}
