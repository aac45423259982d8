#!/usr/bin/env node
import 'dotenv/config';
import { BatchExtractor } from './index.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';
import { loadConfig } from '../../config/index.js';
import { configureLogger, logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { DocumentRouter } from '../../services/routing/DocumentRouter.js';
import { createServices, closeServices, type Services } from '../../bootstrap.js';
import type { BatchResult } from './types.js';
import { parseArgs, type CliArgs } from './args.js';

const HELP = `
Batch Entity Extraction - Route and extract entities from every document in a folder

Usage:
  batch-extract --folder <path> [options]

Options:
  --folder <path>       Folder containing .txt and .md documents (required)
  --dry-run             Show routing decisions without calling any backend
  --strategy <name>     Force single_pass, three_wave, four_wave or three_wave_chunked
  --relationships       Request relationship extraction
  --deep                Maximum-recall processing with relationships
  --concurrency <n>     Documents processed at once (default: 2)
  --format <fmt>        Output format: table or json (default: table)
  --no-persist          Skip writing results to the extraction store
  --help                Show this help message

Examples:
  batch-extract --folder ./opinions --dry-run
  batch-extract --folder ./opinions --deep --format json
  batch-extract --folder ./opinions --strategy three_wave --concurrency 4
`;

const printTable = (result: BatchResult) => {
  const maxName = Math.max(20, ...[...result.files, ...result.unreadable].map((f) => f.name.length));
  const header = `${'File'.padEnd(maxName)} | Chars    | Strategy           | Est. cost | Entities | Status`;
  const separator = '-'.repeat(header.length);

  console.log(separator);
  console.log(header);
  console.log(separator);

  for (const file of result.files) {
    const document = result.documents.find((d) => d.documentId === file.documentId);
    const entities = document ? String(document.entityCount) : '-';
    const status = document ? document.status : 'planned';
    console.log(
      `${file.name.padEnd(maxName)} | ${String(file.chars).padStart(8)} | ${file.decision.strategy.padEnd(18)} | ${('$' + file.decision.estimatedCost.toFixed(4)).padStart(9)} | ${entities.padStart(8)} | ${status}`
    );
  }
  for (const file of result.unreadable) {
    console.log(`${file.name.padEnd(maxName)} | unreadable: ${file.error}`);
  }
  console.log(separator);
};

const printSummary = ({ summary, config, unreadable }: BatchResult) => {
  console.log('\nSummary:');
  console.log(`  Total:          ${summary.total}`);
  if (unreadable.length > 0) {
    console.log(`  Unreadable:     ${unreadable.length}`);
  }
  if (!config.dryRun) {
    console.log(`  Processed:      ${summary.processed}`);
    console.log(`  Failed:         ${summary.failed}`);
    console.log(`  Entities:       ${summary.entities}`);
    console.log(`  Relationships:  ${summary.relationships}`);
  }
  console.log(`  Estimated cost: $${summary.estimatedCost.toFixed(4)}`);
  console.log('\nBy Strategy:');
  for (const [strategy, count] of Object.entries(summary.byStrategy)) {
    console.log(`  ${strategy}: ${count}`);
  }
};

const main = async (): Promise<void> => {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    console.log(HELP);
    process.exit(1);
  }

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (!args.batch.folder) {
    console.error('Error: --folder is required');
    console.log(HELP);
    process.exit(1);
  }

  const { batch } = args;
  const config = loadConfig();
  configureLogger(config.server);
  const reporter = new ProgressReporter(batch.format !== 'json');

  let services: Services | null = null;
  try {
    let extractor: BatchExtractor;
    if (batch.dryRun) {
      extractor = new BatchExtractor({ router: new DocumentRouter(config.routing, config.chunking) });
    } else {
      services = await createServices(config, { withStore: batch.persist });
      extractor = new BatchExtractor(services);
    }

    logger.info({ folder: batch.folder, dryRun: batch.dryRun }, 'Starting batch extraction');
    const result = await extractor.run(batch, reporter);

    if (batch.format === 'json') {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(`\nRouting Results (${result.files.length} files):\n`);
      printTable(result);
      printSummary(result);
    }
  } catch (error) {
    logger.error({ error }, 'Batch extraction failed');
    console.error('Error:', errorMessage(error));
    process.exitCode = 1;
  } finally {
    if (services) {
      await closeServices(services);
    }
  }
};

main().catch((error: unknown) => {
  console.error('Fatal error:', errorMessage(error));
  process.exit(1);
});
