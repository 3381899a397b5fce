/**
 * Newsdesk — Run Pipeline Script
 *
 * Loads the configuration, fetches every feed, scores and selects
 * articles, and writes the HTML report.
 *
 * Usage:
 *   npm run pipeline                          # config/config.json
 *   npm run pipeline -- --config my.json      # Specific config
 *   npm run pipeline -- --verbose --dry-run   # Debug logs, no report file
 */

import 'dotenv/config';
import { CliUsageError, USAGE, parseArgs, type CliOptions } from '../src/cli/args';
import { loadConfig, resolveConfigPath } from '../src/config/loader';
import { prepareReportData, renderHtmlReport, saveReport, formatScore } from '../src/delivery';
import { ConfigurationError, ValidationError, errorMessage } from '../src/lib/errors';
import { createLogger } from '../src/lib/logger';
import { getKeywordStatistics, getScoreDistribution } from '../src/matching';
import { NewsPipeline, type AggregationResult } from '../src/pipeline';
import type { AppConfig } from '../src/types';

// ============================================================
// OUTPUT HELPERS
// ============================================================

function printSummary(result: AggregationResult): void {
  const { stats } = result;
  console.log('\n' + '='.repeat(60));
  console.log('SUMMARY');
  console.log('='.repeat(60));
  console.log(`  Feeds fetched:      ${stats.feedsSucceeded} of ${stats.feedsTotal}`);
  console.log(`  Articles found:     ${stats.articlesFetched}`);
  console.log(`  Matches:            ${stats.candidates}`);
  console.log(`  In report:          ${stats.selected}`);
  console.log(`  Duration:           ${(result.durationMs / 1000).toFixed(2)}s`);
  console.log('='.repeat(60) + '\n');

  for (const error of result.errors) {
    console.log(`  [${error.kind}] ${error.message}`);
  }
}

function printTopArticles(result: AggregationResult): void {
  if (result.articles.length === 0) return;

  console.log('Top 3 articles:');
  console.log('-'.repeat(60));
  result.articles.slice(0, 3).forEach((entry, idx) => {
    const { title, sourceName } = entry.article;
    const shortTitle = title.length > 50 ? `${title.slice(0, 50)}...` : title;
    console.log(`  ${idx + 1}. [${formatScore(entry.score)}] ${shortTitle}`);
    console.log(`     -> ${entry.interestName} | ${sourceName}`);
  });
  console.log('-'.repeat(60));
}

function printVerboseStatistics(result: AggregationResult, config: AppConfig): void {
  const keywords = getKeywordStatistics(result.candidates, config.interests).slice(0, 5);
  if (keywords.length > 0) {
    console.log('Top keywords:');
    for (const { keyword, articles } of keywords) {
      console.log(`  - ${keyword}: ${articles}x`);
    }
  }

  const distribution = getScoreDistribution(result.articles);
  console.log('Score distribution:');
  for (const [range, count] of Object.entries(distribution)) {
    if (count > 0) console.log(`  - ${range}: ${count}`);
  }
}

// ============================================================
// MAIN
// ============================================================

async function main(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const configPath = resolveConfigPath(options.configPath);

  let config: AppConfig;
  try {
    config = loadConfig(configPath);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[ERROR] Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logger = createLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    format: config.logging.format,
    file: config.logging.file,
  });
  const outputDir = options.outputDir ?? config.output.directory;

  logger.info('Newsdesk started', {
    config: configPath,
    feeds: config.feeds.length,
    interests: config.interests.length,
    dryRun: options.dryRun,
  });

  let pipeline: NewsPipeline;
  try {
    pipeline = new NewsPipeline({
      feeds: config.feeds,
      interests: config.interests,
      selection: config.selection,
      fetching: config.fetching,
      logger,
    });
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(`[ERROR] Invalid input (${error.field}): ${error.message}`);
      return 1;
    }
    throw error;
  }

  const result = await pipeline.run();

  if (result.stats.articlesFetched === 0) {
    console.warn('[WARNING] No articles fetched. Check the feed URLs.');
  }

  printSummary(result);
  if (options.verbose) {
    printVerboseStatistics(result, config);
  }
  printTopArticles(result);

  try {
    const html = renderHtmlReport(
      prepareReportData(result, { title: config.output.title, minScore: config.selection.minScore })
    );

    if (options.dryRun) {
      console.log(`\n[DRY-RUN] Report rendered (${html.length} characters), not saved`);
    } else {
      const path = saveReport(html, outputDir, config.output.filenamePrefix);
      console.log(`\nReport saved: ${path}`);
      console.log(`Open in a browser: file://${path}`);
    }
  } catch (error) {
    logger.error('Report generation failed', { error: errorMessage(error) });
    console.error(`\n[ERROR] Report could not be written: ${errorMessage(error)}`);
    return 1;
  }

  logger.info('Newsdesk finished', { durationMs: result.durationMs });
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('\nPipeline failed:', errorMessage(error));
    process.exitCode = 1;
  });
