import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StoreUnavailableError } from '../core/errors.js';
import type { JobPosting } from '../core/types.js';
import { JobMarketService } from '../services/job-market.js';
import { openWritable } from './client.js';
import { InMemoryJobCatalogue, sqliteCatalogueOpener } from './job-catalogue.js';
import { loadSamplePostings, seedCatalogue } from './seed.js';

vi.mock('../utils/logger.js', () => {
  const scoped = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return {
    logger: scoped,
    createQueryLogger: () => scoped,
  };
});

vi.mock('../utils/sentry.js', () => ({
  addSoftFailureBreadcrumb: vi.fn(),
  addMatchStageBreadcrumb: vi.fn(),
}));

const POSTINGS: JobPosting[] = [
  { title: 'Software Engineer', company: 'Northwind Labs', salaryRangeText: '$120k - $180k', description: 'Build services.' },
  { title: 'Data Scientist', company: 'Orchard Health', salaryRangeText: '$125k - $185k', description: 'Model outcomes.' },
  { title: 'Software Engineer', company: 'Bluefin Analytics', salaryRangeText: '$110k - $165k', description: 'Own features.' },
];

describe('SqliteJobCatalogue', () => {
  let dir: string;
  let dbPath: string;

  beforeEach(() => {
    vi.clearAllMocks();
    dir = mkdtempSync(join(tmpdir(), 'job-catalogue-'));
    dbPath = join(dir, 'job_info.db');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function open() {
    const opened = sqliteCatalogueOpener(dbPath)();
    if (!opened.ok) {
      throw opened.error;
    }
    return opened.value;
  }

  it('seeds the jobs table and reports statistics', () => {
    expect(seedCatalogue(dbPath, POSTINGS)).toEqual({ total: 3, uniqueTitles: 2, uniqueCompanies: 3 });
  });

  it('lists every title in storage order, duplicates included', () => {
    seedCatalogue(dbPath, POSTINGS);
    const catalogue = open();

    expect(catalogue.allTitles()).toEqual(['Software Engineer', 'Data Scientist', 'Software Engineer']);
    catalogue.close();
  });

  it('fetches postings for a title set in storage order', () => {
    seedCatalogue(dbPath, POSTINGS);
    const catalogue = open();

    expect(catalogue.postingsForTitles(new Set(['Software Engineer']))).toEqual([POSTINGS[0], POSTINGS[2]]);
    expect(catalogue.postingsForTitles(new Set())).toEqual([]);
    catalogue.close();
  });

  it('reads NULL columns as empty strings', () => {
    seedCatalogue(dbPath, []);
    const db = openWritable(dbPath);
    db.prepare('INSERT INTO jobs VALUES (?, ?, ?, ?)').run('Data Analyst', null, null, null);
    db.close();

    const catalogue = open();
    expect(catalogue.postingsForTitles(new Set(['Data Analyst']))).toEqual([
      { title: 'Data Analyst', company: '', salaryRangeText: '', description: '' },
    ]);
    catalogue.close();
  });

  it('reports a missing file as unavailable', () => {
    const opened = sqliteCatalogueOpener(join(dir, 'missing.db'))();

    expect(opened.ok).toBe(false);
    if (opened.ok) return;
    expect(opened.error).toBeInstanceOf(StoreUnavailableError);
    expect(opened.error.location).toBe(join(dir, 'missing.db'));
  });

  it('reports a file without a jobs table as unavailable', () => {
    const db = openWritable(dbPath);
    db.exec('CREATE TABLE other (id INTEGER)');
    db.close();

    expect(sqliteCatalogueOpener(dbPath)().ok).toBe(false);
  });

  it('replaces the previous table when seeding again', () => {
    seedCatalogue(dbPath, POSTINGS);
    seedCatalogue(dbPath, POSTINGS.slice(0, 1));

    const catalogue = open();
    expect(catalogue.allTitles()).toEqual(['Software Engineer']);
    catalogue.close();
  });

  it('serves the job market service from the bundled sample postings', () => {
    seedCatalogue(dbPath, loadSamplePostings());
    const service = new JobMarketService(sqliteCatalogueOpener(dbPath));

    expect(service.aggregate('Data Scientist')).toMatchObject({
      status: 'matched',
      matchedTitles: ['Data Scientist', 'Data Scientist', 'Senior Data Scientist', 'Data Analyst'],
      salary: { min: 80000, max: 225000, currency: 'USD' },
      matchCount: 4,
    });
  });

  it('degrades the job market service to an empty report without a file', () => {
    const service = new JobMarketService(sqliteCatalogueOpener(join(dir, 'missing.db')));

    expect(service.aggregate('Software Engineer')).toMatchObject({
      status: 'empty',
      reason: 'store-unavailable',
      matchCount: 0,
    });
  });
});

describe('loadSamplePostings', () => {
  it('loads and validates the bundled sample set', () => {
    const postings = loadSamplePostings();

    expect(postings).toHaveLength(30);
    expect(postings[0]).toEqual({
      title: 'Software Engineer',
      company: 'Northwind Labs',
      salaryRangeText: '$120k - $175k',
      description: 'Build and operate services behind the ordering platform. Review designs and pair with product on delivery.',
    });
  });
});

describe('InMemoryJobCatalogue', () => {
  it('mirrors the SQLite catalogue contract', () => {
    const catalogue = new InMemoryJobCatalogue(POSTINGS);

    expect(catalogue.allTitles()).toEqual(['Software Engineer', 'Data Scientist', 'Software Engineer']);
    expect(catalogue.postingsForTitles(new Set(['Data Scientist', 'Nope']))).toEqual([POSTINGS[1]]);
  });
});
