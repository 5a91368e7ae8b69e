import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { CatalogueOpener, JobCatalogue, JobMarket } from '../core/interfaces.js';
import {
  MalformedSalaryTextError,
  PerPostingProcessingError,
  describeError,
} from '../core/errors.js';
import {
  DEFAULT_MATCHING_OPTIONS,
  err,
  ok,
  type EmptyReason,
  type JobExample,
  type JobPosting,
  type MatchReport,
  type MatchingOptions,
  type Result,
} from '../core/types.js';
import { createQueryLogger, type QueryLogger } from '../utils/logger.js';
import { addMatchStageBreadcrumb, addSoftFailureBreadcrumb } from '../utils/sentry.js';
import { findSimilarTitles } from './similarity.js';
import { parseSalary, summarizeSalaries } from './salary-parser.js';

export const ELLIPSIS = '...';

/**
 * Cut to `limit` characters (code points, so astral symbols count once).
 */
export function truncateDescription(description: string, limit: number): string {
  const chars = Array.from(description);
  return chars.length > limit ? `${chars.slice(0, limit).join('')}${ELLIPSIS}` : description;
}

export function emptyReport(reason: EmptyReason, currency: string): MatchReport {
  return {
    status: 'empty',
    reason,
    matchedTitles: [],
    salary: { min: 0, max: 0, currency },
    jobExamples: [],
    matchCount: 0,
  };
}

// Points where an async run may hand control back and check its deadline
type Checkpoint = 'titles' | 'similarity' | 'postings' | 'posting';

interface ProcessedPosting {
  salaryValues: number[];
  example: JobExample;
}

/**
 * JobMarketService - reconciles a free-form career title with the job
 * catalogue and summarises salaries and example postings.
 *
 * Never throws: every failure degrades to an empty report with a reason.
 * aggregate() runs the stages back to back. execute() yields to the event
 * loop between stages, so concurrent runs interleave, and gives up with a
 * `timed-out` report once `deadlineAt` (epoch ms) has passed.
 */
export class JobMarketService implements JobMarket {
  private readonly options: MatchingOptions;

  constructor(
    private readonly openCatalogue: CatalogueOpener,
    options: Partial<MatchingOptions> = {}
  ) {
    this.options = { ...DEFAULT_MATCHING_OPTIONS, ...options };
  }

  async execute(queryTitle: string, deadlineAt = Number.POSITIVE_INFINITY): Promise<MatchReport> {
    const stages = this.run(queryTitle);
    let step = stages.next();

    while (!step.done) {
      if (step.value !== 'posting') {
        await yieldToEventLoop();
      }
      if (Date.now() >= deadlineAt) {
        const report = emptyReport('timed-out', this.options.currency);
        createQueryLogger(queryTitle).warn('JobMarket', `Deadline passed at stage "${step.value}", returning empty report`);
        // return() runs the pending finally, which closes the catalogue
        stages.return(report);
        return report;
      }
      step = stages.next();
    }

    return step.value;
  }

  aggregate(queryTitle: string): MatchReport {
    const stages = this.run(queryTitle);
    let step = stages.next();
    while (!step.done) {
      step = stages.next();
    }
    return step.value;
  }

  private *run(queryTitle: string): Generator<Checkpoint, MatchReport, void> {
    const log = createQueryLogger(queryTitle);
    const { currency } = this.options;

    const opened = this.openCatalogue();
    if (!opened.ok) {
      log.warn('JobMarket', 'Catalogue unavailable, returning empty report', opened.error);
      addSoftFailureBreadcrumb(opened.error, { queryTitle });
      return emptyReport('store-unavailable', currency);
    }

    const catalogue = opened.value;
    try {
      return yield* this.aggregateFrom(catalogue, queryTitle, log);
    } catch (error) {
      log.error('JobMarket', 'Aggregation failed, returning empty report', error);
      return emptyReport('aggregation-failed', currency);
    } finally {
      this.closeQuietly(catalogue, log);
    }
  }

  private *aggregateFrom(
    catalogue: JobCatalogue,
    queryTitle: string,
    log: QueryLogger
  ): Generator<Checkpoint, MatchReport, void> {
    const { threshold, maxCandidates, exampleLimit, currency } = this.options;

    const titles = catalogue.allTitles();
    yield 'titles';

    addMatchStageBreadcrumb('similarity', queryTitle);
    const similar = findSimilarTitles({ queryTitle, threshold, maxCandidates }, titles);
    if (!similar.ok) {
      log.warn('JobMarket', similar.error.message);
      addSoftFailureBreadcrumb(similar.error, { queryTitle });
      return emptyReport('similarity-unavailable', currency);
    }

    const matchedTitles = similar.value;
    if (matchedTitles.length === 0) {
      log.info('JobMarket', 'No catalogue titles above threshold');
      return emptyReport('no-matches', currency);
    }
    log.debug('JobMarket', `Matched ${matchedTitles.length} titles`, matchedTitles);
    yield 'similarity';

    addMatchStageBreadcrumb('catalogue', queryTitle, { titles: matchedTitles.length });
    const postings = catalogue.postingsForTitles(new Set(matchedTitles));
    yield 'postings';

    addMatchStageBreadcrumb('aggregation', queryTitle, { postings: postings.length });
    const salaryPool: number[] = [];
    const jobExamples: JobExample[] = [];

    for (const [index, posting] of postings.entries()) {
      yield 'posting';

      const processed = this.processPosting(posting, index);
      if (!processed.ok) {
        log.warn('JobMarket', 'Skipping posting', processed.error);
        addSoftFailureBreadcrumb(processed.error, { queryTitle });
        continue;
      }

      const { salaryValues, example } = processed.value;
      if (salaryValues.length === 0) {
        const malformed = new MalformedSalaryTextError(example.salaryRange);
        log.debug('JobMarket', malformed.message);
        addSoftFailureBreadcrumb(malformed, { queryTitle, postingIndex: index });
      }
      salaryPool.push(...salaryValues);
      if (jobExamples.length < exampleLimit) {
        jobExamples.push(example);
      }
    }

    const salary = summarizeSalaries(salaryPool, currency);
    log.info(
      'JobMarket',
      `${postings.length} postings across ${matchedTitles.length} titles, salary ${salary.min}-${salary.max} ${currency}`
    );
    addMatchStageBreadcrumb('completed', queryTitle, { matchCount: postings.length });

    return {
      status: 'matched',
      matchedTitles,
      salary,
      jobExamples,
      matchCount: postings.length,
    };
  }

  private processPosting(
    posting: JobPosting,
    index: number
  ): Result<ProcessedPosting, PerPostingProcessingError> {
    try {
      return ok({
        salaryValues: parseSalary(posting.salaryRangeText),
        example: {
          jobTitle: posting.title,
          company: posting.company,
          description: truncateDescription(posting.description, this.options.descriptionLimit),
          salaryRange: posting.salaryRangeText,
        },
      });
    } catch (error) {
      return err(new PerPostingProcessingError(index, error));
    }
  }

  private closeQuietly(catalogue: JobCatalogue, log: QueryLogger): void {
    try {
      catalogue.close();
    } catch (error) {
      log.warn('JobMarket', `Failed to close catalogue: ${describeError(error)}`);
    }
  }
}
