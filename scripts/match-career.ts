/**
 * Look up a career title (or every career of a major) against the catalogue.
 *
 * Usage: npx tsx scripts/match-career.ts "Software Engineer"
 *        npx tsx scripts/match-career.ts --major "Computer Science"
 */

import { parseArgs } from 'util';
import { loadConfigFromEnv, toMatchingOptions } from '../src/config.js';
import type { MatchReport } from '../src/core/types.js';
import { sqliteCatalogueOpener } from '../src/db/job-catalogue.js';
import { JobMarketService } from '../src/services/job-market.js';
import { MajorCareersService } from '../src/services/major-careers.js';
import { setLogLevel } from '../src/utils/logger.js';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    major: { type: 'string' },
  },
});

const loaded = loadConfigFromEnv();
if (!loaded.ok) {
  process.exit(1);
}
const config = loaded.value;
setLogLevel(config.LOG_LEVEL);

const options = toMatchingOptions(config);
const jobMarket = new JobMarketService(sqliteCatalogueOpener(config.JOB_CATALOGUE_PATH), options);

function formatMoney(value: number): string {
  return `$${Math.round(value).toLocaleString('en-US')}`;
}

function printReport(title: string, report: MatchReport): void {
  console.log(`\n🔍 ${title}`);
  if (report.status === 'empty') {
    console.log(`   No catalogue data (${report.reason})`);
    return;
  }
  console.log(`   Matched titles: ${report.matchedTitles.join(', ')}`);
  console.log(`   Postings:       ${report.matchCount}`);
  console.log(
    `   Salary:         ${formatMoney(report.salary.min)} - ${formatMoney(report.salary.max)} ${report.salary.currency}`
  );
  report.jobExamples.forEach((job, i) => {
    console.log(`\n   ${i + 1}. ${job.jobTitle} @ ${job.company} (${job.salaryRange || 'salary n/a'})`);
    console.log(`      ${job.description}`);
  });
}

async function main(): Promise<void> {
  if (values.major) {
    const service = new MajorCareersService(jobMarket, {
      concurrency: config.MATCH_CONCURRENCY,
      timeoutMs: config.MATCH_TIMEOUT_MS,
      currency: options.currency,
    });
    const result = await service.execute({ major: values.major });
    console.log(`\n🎓 ${result.major}: ${result.count} careers`);
    for (const career of result.careers) {
      printReport(career.title, career.market);
    }
    return;
  }

  const title = positionals.join(' ').trim();
  if (!title) {
    console.error('Usage: match-career "<career title>" | --major "<major>"');
    process.exit(1);
  }
  printReport(title, await jobMarket.execute(title));
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
