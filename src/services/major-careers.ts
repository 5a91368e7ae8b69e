import pLimit from 'p-limit';
import type { IService, JobMarket } from '../core/interfaces.js';
import type { CareerMarket, MajorCareers } from '../core/types.js';
import { logger } from '../utils/logger.js';
import { withSentryScope } from '../utils/sentry.js';
import { careerId, careerTitlesForMajor } from './career-titles.js';
import { emptyReport } from './job-market.js';

export interface MajorCareersInput {
  major: string;
  careerTitles?: string[];  // falls back to the built-in table
}

export interface MajorCareersOptions {
  concurrency: number;
  timeoutMs: number;
  currency: string;
}

const TIMED_OUT = Symbol('timed-out');

/**
 * Resolve with the promise's value, or TIMED_OUT once the deadline passes.
 * The timer is cleared either way so nothing is left running.
 */
async function withDeadline<T>(promise: Promise<T>, ms: number): Promise<T | typeof TIMED_OUT> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * MajorCareersService - market reports for every career of a major.
 * Titles run in parallel up to `concurrency`, each under its own deadline,
 * interleaving at the stage boundaries of the job market service.
 */
export class MajorCareersService implements IService<MajorCareersInput, MajorCareers> {
  constructor(
    private readonly jobMarket: JobMarket,
    private readonly options: MajorCareersOptions
  ) {}

  async execute(input: MajorCareersInput): Promise<MajorCareers> {
    const { major } = input;
    const titles = input.careerTitles ?? careerTitlesForMajor(major);
    const limit = pLimit(this.options.concurrency);

    logger.info('MajorCareers', `Analyzing ${titles.length} careers for ${major}...`);

    const careers = await withSentryScope({ major }, () =>
      Promise.all(titles.map((title) => limit(() => this.analyzeCareer(title))))
    );

    const matched = careers.filter((career) => career.market.status === 'matched').length;
    logger.info('MajorCareers', `${major}: ${matched}/${careers.length} careers matched the catalogue`);

    return { major, careers, count: careers.length };
  }

  private async analyzeCareer(title: string): Promise<CareerMarket> {
    const { timeoutMs, currency } = this.options;
    // The service checks the deadline itself; the race bounds one that does not
    const outcome = await withDeadline(this.jobMarket.execute(title, Date.now() + timeoutMs), timeoutMs);
    const market = outcome === TIMED_OUT ? emptyReport('timed-out', currency) : outcome;

    if (market.status === 'empty' && market.reason === 'timed-out') {
      logger.warn('MajorCareers', `"${title}" exceeded ${timeoutMs}ms, using empty report`);
    }

    return { id: careerId(title), title, market };
  }
}
