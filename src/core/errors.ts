/**
 * Soft-failure taxonomy. These are carried inside Result values and logged;
 * none of them is thrown out of JobMarketService.
 */

export type MatchErrorCode =
  | 'STORE_UNAVAILABLE'
  | 'SIMILARITY_UNAVAILABLE'
  | 'MALFORMED_SALARY_TEXT'
  | 'POSTING_PROCESSING_FAILED';

export abstract class MatchEngineError extends Error {
  abstract readonly code: MatchErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class StoreUnavailableError extends MatchEngineError {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(readonly location: string, cause?: unknown) {
    super(`Job catalogue unavailable: ${location}`, { cause });
  }
}

export class SimilarityUnavailableError extends MatchEngineError {
  readonly code = 'SIMILARITY_UNAVAILABLE';
}

export class MalformedSalaryTextError extends MatchEngineError {
  readonly code = 'MALFORMED_SALARY_TEXT';

  constructor(readonly salaryText: string) {
    super(`No salary figures in "${salaryText}"`);
  }
}

export class PerPostingProcessingError extends MatchEngineError {
  readonly code = 'POSTING_PROCESSING_FAILED';

  constructor(readonly postingIndex: number, cause: unknown) {
    super(`Failed to process posting #${postingIndex}`, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
