#!/usr/bin/env node
/**
 * Fleet inventory report
 *
 * Usage:
 *   npm run report
 *   npm run report -- --output ./reports --concurrency 4 --failure-policy abort
 */

import { JssClassicClient } from '../jss-client.js';
import { runInventory } from '../inventory/pipeline.js';
import { writeReport } from '../inventory/report-writer.js';
import { sortCounter } from '../inventory/counter.js';
import { loadDotenv } from '../utils/dotenv-loader.js';
import { EnvValidationError, InventoryConfig, loadConfig } from '../utils/env-validation.js';
import { logErrorWithContext } from '../utils/error-handler.js';
import { JssApiError } from '../utils/errors.js';
import { setLogLevel } from '../utils/logger.js';
import { getErrorMessage } from '../utils/type-guards.js';
import { formatFailure, print, printCounterRows, printError, printProgress, printWarn } from './output.js';

export interface CLIOptions {
  output?: string;
  concurrency?: number;
  failurePolicy?: 'skip' | 'abort';
  includeStale?: boolean;
  staleDays?: number;
  insecure?: boolean;
  help?: boolean;
}

export function showUsage(): void {
  print(`
Fleet Inventory Report
======================

Fetch every managed computer and patch title from the JSS Classic API and
write per-user tables, IP lookups and fleet-wide counters.

Usage:
  npm run report [-- options]

Options:
  --output <dir>            Output directory (default: CASPER_OUTPUT_DIR or ./output)
  --concurrency <n>         Parallel detail requests (default: 1)
  --failure-policy <p>      skip | abort when a detail fetch fails (default: skip)
  --include-stale           Keep computers that have not checked in recently
  --stale-days <n>          Days without check-in before a computer is stale (default: 30)
  --insecure                Do not verify the server TLS certificate
  --help                    Show this help message

Environment Variables Required:
  CASPER_USER               API account name
  CASPER_PASS               API account password
  CASPER_HOST               Server FQDN, e.g. casper.example.com
`);
}

const parsePositiveInt = (flag: string, value: string | undefined): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} expects a positive integer, got "${value ?? ''}"`);
  }
  return parsed;
};

export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--output':
      case '-o':
        options.output = args[++i];
        break;
      case '--concurrency':
      case '-c':
        options.concurrency = parsePositiveInt(arg, args[++i]);
        break;
      case '--failure-policy': {
        const policy = args[++i];
        if (policy !== 'skip' && policy !== 'abort') {
          throw new Error(`--failure-policy expects skip or abort, got "${policy ?? ''}"`);
        }
        options.failurePolicy = policy;
        break;
      }
      case '--include-stale':
        options.includeStale = true;
        break;
      case '--stale-days':
        options.staleDays = parsePositiveInt(arg, args[++i]);
        break;
      case '--insecure':
      case '-k':
        options.insecure = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/**
 * Command-line flags win over the environment
 */
export function applyCliOptions(config: InventoryConfig, options: CLIOptions): InventoryConfig {
  return {
    ...config,
    outputDir: options.output ?? config.outputDir,
    concurrency: options.concurrency ?? config.concurrency,
    failurePolicy: options.failurePolicy ?? config.failurePolicy,
    skipStale: options.includeStale ? false : config.skipStale,
    staleDays: options.staleDays ?? config.staleDays,
    rejectUnauthorized: options.insecure ? false : config.rejectUnauthorized,
  };
}

async function main(): Promise<void> {
  loadDotenv(__dirname);

  let options: CLIOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    printError(`❌ ${getErrorMessage(error)}`);
    showUsage();
    process.exit(2);
  }

  if (options.help) {
    showUsage();
    process.exit(0);
  }

  let config: InventoryConfig;
  try {
    config = applyCliOptions(loadConfig(process.env), options);
  } catch (error) {
    if (error instanceof EnvValidationError) {
      printError(`❌ ${error.format()}`);
      process.exit(1);
    }
    throw error;
  }
  setLogLevel(config.logLevel);

  if (!config.rejectUnauthorized) {
    printWarn('⚠️  TLS certificate verification is disabled.');
  }

  print(`📡 Connecting to ${config.baseUrl} ...`);
  const client = new JssClassicClient({
    baseUrl: config.baseUrl,
    username: config.username,
    password: config.password,
    timeoutMs: config.timeoutMs,
    rejectUnauthorized: config.rejectUnauthorized,
  });

  const report = await runInventory(client, {
    concurrency: config.concurrency,
    failurePolicy: config.failurePolicy,
    skipStale: config.skipStale,
    staleDays: config.staleDays,
    onProgress: (completed, total) => printProgress(`${completed}/${total} records fetched ...`),
  });
  printProgress('');

  const written = await writeReport(config.outputDir, report);

  print('\n✅ Report generated\n');
  print('📊 Summary:');
  print(`   Computers processed: ${report.computersProcessed}`);
  print(`   Stale computers skipped: ${report.stale.length}`);
  print(`   Patch titles: ${report.patchTitles.length}`);
  print(`   Users: ${written.summary.users}`);

  printCounterRows('Most common services', sortCounter(report.counters.services).slice(0, 5));
  printCounterRows('Most common Chrome extensions', sortCounter(report.counters.chromeExtensions).slice(0, 5));

  if (report.failures.length > 0) {
    printWarn(`\n⚠️  ${report.failures.length} detail records could not be fetched:`);
    report.failures.forEach((failure) => printWarn(`   - ${formatFailure(failure)}`));
  }

  print(`\n📁 ${written.files.length} files written to ${written.outputDir}\n`);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    const context = logErrorWithContext(error, 'Inventory report', 'cli');
    const detail = error instanceof JssApiError ? error.toDetailedString() : context.message;
    printError(`\n❌ Fatal error: ${detail}`);
    context.suggestions?.forEach((suggestion) => printError(`   - ${suggestion}`));
    process.exit(1);
  });
}
