import { z } from 'zod';
import type { CatalogueOpener, JobCatalogue } from '../core/interfaces.js';
import { StoreUnavailableError } from '../core/errors.js';
import { err, ok, type JobPosting, type Result } from '../core/types.js';
import { logger } from '../utils/logger.js';
import { openReadOnly, type SqliteDatabase } from './client.js';

export const JOBS_TABLE = 'jobs';

// NULL columns other than the title read as empty strings
const nullableText = z.string().nullable().transform((value) => value ?? '');

const jobRowSchema = z.object({
  'Job Title': z.string(),
  Company: nullableText,
  'Salary Range': nullableText,
  'Job Description': nullableText,
});

const titleRowSchema = z.object({ 'Job Title': z.string() });

function toPosting(row: z.infer<typeof jobRowSchema>): JobPosting {
  return {
    title: row['Job Title'],
    company: row.Company,
    salaryRangeText: row['Salary Range'],
    description: row['Job Description'],
  };
}

/**
 * Catalogue backed by a SQLite file with a `jobs` table of
 * "Job Title", Company, "Salary Range", "Job Description".
 * Rows are read in rowid order.
 */
export class SqliteJobCatalogue implements JobCatalogue {
  constructor(private readonly db: SqliteDatabase) {}

  allTitles(): string[] {
    const rows = this.db
      .prepare(`SELECT "Job Title" FROM ${JOBS_TABLE} WHERE "Job Title" IS NOT NULL ORDER BY rowid`)
      .all();
    return z.array(titleRowSchema).parse(rows).map((row) => row['Job Title']);
  }

  postingsForTitles(titles: ReadonlySet<string>): JobPosting[] {
    if (titles.size === 0) {
      return [];
    }

    const values = [...titles];
    const placeholders = values.map(() => '?').join(', ');
    const rows = this.db
      .prepare(
        `SELECT "Job Title", Company, "Salary Range", "Job Description"
         FROM ${JOBS_TABLE}
         WHERE "Job Title" IN (${placeholders})
         ORDER BY rowid`
      )
      .all(...values);

    const postings: JobPosting[] = [];
    for (const row of rows) {
      const parsed = jobRowSchema.safeParse(row);
      if (parsed.success) {
        postings.push(toPosting(parsed.data));
      } else {
        logger.warn('Catalogue', 'Skipping unreadable row', parsed.error.issues);
      }
    }
    return postings;
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Opener for a SQLite catalogue file. Each call opens a fresh read-only
 * connection and checks the jobs table is queryable.
 */
export function sqliteCatalogueOpener(path: string): CatalogueOpener {
  return (): Result<JobCatalogue, StoreUnavailableError> => {
    const opened = openReadOnly(path);
    if (!opened.ok) {
      return opened;
    }

    const db = opened.value;
    try {
      db.prepare(`SELECT 1 FROM ${JOBS_TABLE} LIMIT 1`).get();
    } catch (error) {
      db.close();
      logger.warn('Catalogue', `Table "${JOBS_TABLE}" is not readable in ${path}`, error);
      return err(new StoreUnavailableError(path, error));
    }

    return ok(new SqliteJobCatalogue(db));
  };
}

/**
 * Catalogue held in memory, in insertion order
 */
export class InMemoryJobCatalogue implements JobCatalogue {
  private readonly postings: readonly JobPosting[];

  constructor(postings: readonly JobPosting[]) {
    this.postings = [...postings];
  }

  allTitles(): string[] {
    return this.postings.map((posting) => posting.title);
  }

  postingsForTitles(titles: ReadonlySet<string>): JobPosting[] {
    return this.postings.filter((posting) => titles.has(posting.title));
  }

  close(): void {
    // nothing held open
  }
}

export function inMemoryCatalogueOpener(postings: readonly JobPosting[]): CatalogueOpener {
  const catalogue = new InMemoryJobCatalogue(postings);
  return () => ok(catalogue);
}
