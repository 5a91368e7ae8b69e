import { readFileSync } from 'fs';
import { z } from 'zod';
import type { JobPosting } from '../core/types.js';
import { logger } from '../utils/logger.js';
import { openWritable } from './client.js';
import { JOBS_TABLE } from './job-catalogue.js';

export const SAMPLE_POSTINGS_URL = new URL('../../data/sample-jobs.json', import.meta.url);

const postingSchema = z.object({
  title: z.string().min(1),
  company: z.string(),
  salaryRangeText: z.string(),
  description: z.string(),
});

export interface SeedStats {
  total: number;
  uniqueTitles: number;
  uniqueCompanies: number;
}

/**
 * Read and validate a JSON array of postings (defaults to the bundled sample set)
 */
export function loadSamplePostings(source: URL | string = SAMPLE_POSTINGS_URL): JobPosting[] {
  const raw: unknown = JSON.parse(readFileSync(source, 'utf-8'));
  return z.array(postingSchema).parse(raw);
}

/**
 * Replace the jobs table in a SQLite file with the given postings.
 * Inserts run in one transaction, in array order.
 */
export function seedCatalogue(path: string, postings: readonly JobPosting[]): SeedStats {
  const db = openWritable(path);

  try {
    db.exec(`DROP TABLE IF EXISTS ${JOBS_TABLE}`);
    db.exec(`
      CREATE TABLE ${JOBS_TABLE} (
        "Job Title" TEXT,
        Company TEXT,
        "Salary Range" TEXT,
        "Job Description" TEXT
      )
    `);

    const insert = db.prepare(`INSERT INTO ${JOBS_TABLE} VALUES (?, ?, ?, ?)`);
    const insertAll = db.transaction((rows: readonly JobPosting[]) => {
      for (const row of rows) {
        insert.run(row.title, row.company, row.salaryRangeText, row.description);
      }
    });
    insertAll(postings);

    const stats: SeedStats = {
      total: postings.length,
      uniqueTitles: new Set(postings.map((p) => p.title)).size,
      uniqueCompanies: new Set(postings.map((p) => p.company)).size,
    };
    logger.info('Seed', `Wrote ${stats.total} postings to ${path}`, stats);
    return stats;
  } finally {
    db.close();
  }
}
