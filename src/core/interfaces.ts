/**
 * Core interfaces - seams between the matching services and their storage
 */

import type { JobPosting, MatchReport, Result } from './types.js';
import type { StoreUnavailableError } from './errors.js';

/**
 * Base interface for all services (no LLM - deterministic)
 */
export interface IService<TInput, TOutput> {
  execute(input: TInput): Promise<TOutput>;
}

/**
 * Read-only view over the job catalogue, scoped to a single aggregation.
 */
export interface JobCatalogue {
  /** Every posting title in storage order, duplicates included */
  allTitles(): string[];
  /** Postings whose title is in the set, in storage order */
  postingsForTitles(titles: ReadonlySet<string>): JobPosting[];
  close(): void;
}

/**
 * Opens a fresh catalogue handle. Called once per aggregation; the handle is
 * closed before the aggregation returns.
 */
export type CatalogueOpener = () => Result<JobCatalogue, StoreUnavailableError>;

/**
 * Market report for one career title. `deadlineAt` is an epoch-ms cut-off
 * past which the implementation should stop and report `timed-out`.
 */
export interface JobMarket {
  execute(queryTitle: string, deadlineAt?: number): Promise<MatchReport>;
}
