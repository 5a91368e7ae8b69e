export type {
  CareerMarket,
  EmptyReason,
  JobExample,
  JobPosting,
  MajorCareers,
  MatchReport,
  MatchResult,
  MatchingOptions,
  Result,
  SalarySummary,
  ScoredTitle,
  SimilarityQuery,
} from './core/types.js';
export { DEFAULT_MATCHING_OPTIONS, err, ok } from './core/types.js';
export type { CatalogueOpener, IService, JobCatalogue, JobMarket } from './core/interfaces.js';
export {
  MalformedSalaryTextError,
  MatchEngineError,
  PerPostingProcessingError,
  SimilarityUnavailableError,
  StoreUnavailableError,
} from './core/errors.js';
export type { AppConfig } from './config.js';
export { loadConfig, loadConfigFromEnv, toMatchingOptions } from './config.js';
export {
  InMemoryJobCatalogue,
  SqliteJobCatalogue,
  inMemoryCatalogueOpener,
  sqliteCatalogueOpener,
} from './db/job-catalogue.js';
export type { SeedStats } from './db/seed.js';
export { loadSamplePostings, seedCatalogue } from './db/seed.js';
export { findSimilarTitles, scoreTitles, tokenizeTitle } from './services/similarity.js';
export { parseSalary, summarizeSalaries } from './services/salary-parser.js';
export { JobMarketService, emptyReport, truncateDescription } from './services/job-market.js';
export type { MajorCareersInput, MajorCareersOptions } from './services/major-careers.js';
export { MajorCareersService } from './services/major-careers.js';
export { careerId, careerTitlesForMajor } from './services/career-titles.js';
export { logger, setLogLevel } from './utils/logger.js';
