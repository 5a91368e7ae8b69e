/**
 * Core types - shared across the application
 */

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * One row of the job catalogue. Never mutated after load.
 */
export interface JobPosting {
  title: string;
  company: string;
  salaryRangeText: string;  // free-form, may be empty
  description: string;
}

export interface SimilarityQuery {
  queryTitle: string;
  threshold: number;        // 0..1
  maxCandidates: number;
}

export interface ScoredTitle {
  title: string;
  score: number;
}

export interface SalarySummary {
  min: number;
  max: number;
  currency: string;
}

export interface JobExample {
  jobTitle: string;
  company: string;
  description: string;     // truncated
  salaryRange: string;
}

export interface MatchResult {
  matchedTitles: string[];
  salary: SalarySummary;
  jobExamples: JobExample[];
  matchCount: number;      // uncapped, >= jobExamples.length
}

export type EmptyReason =
  | 'no-matches'
  | 'store-unavailable'
  | 'similarity-unavailable'
  | 'aggregation-failed'
  | 'timed-out';

export type MatchReport =
  | (MatchResult & { status: 'matched' })
  | (MatchResult & { status: 'empty'; reason: EmptyReason });

export interface MatchingOptions {
  threshold: number;
  maxCandidates: number;
  exampleLimit: number;
  descriptionLimit: number;
  currency: string;
}

export const DEFAULT_MATCHING_OPTIONS: MatchingOptions = {
  threshold: 0.2,
  maxCandidates: 10,
  exampleLimit: 5,
  descriptionLimit: 300,
  currency: 'USD',
};

export interface CareerMarket {
  id: string;
  title: string;
  market: MatchReport;
}

export interface MajorCareers {
  major: string;
  careers: CareerMarket[];
  count: number;
}
