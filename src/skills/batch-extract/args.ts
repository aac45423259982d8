import { isProcessingStrategy } from '../../services/routing/types.js';
import type { BatchConfig } from './types.js';

export interface CliArgs {
  help: boolean;
  batch: BatchConfig;
}

export class CliError extends Error {}

export const parseArgs = (argv: string[]): CliArgs => {
  let help = false;
  const parsed: BatchConfig = {
    folder: '',
    dryRun: false,
    format: 'table',
    concurrency: 2,
    persist: true,
    route: {},
  };

  const value = (i: number, flag: string): string => {
    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new CliError(`${flag} requires a value`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--folder':
        parsed.folder = value(i++, arg);
        break;
      case '--dry-run':
        parsed.dryRun = true;
        break;
      case '--strategy': {
        const strategy = value(i++, arg);
        if (!isProcessingStrategy(strategy)) {
          throw new CliError(`Unknown strategy: ${strategy}`);
        }
        parsed.route.strategyOverride = strategy;
        break;
      }
      case '--relationships':
        parsed.route.extractRelationships = true;
        break;
      case '--deep':
        parsed.route.deep = true;
        break;
      case '--concurrency': {
        const concurrency = parseInt(value(i++, arg), 10);
        if (!Number.isInteger(concurrency) || concurrency < 1) {
          throw new CliError('--concurrency must be a positive integer');
        }
        parsed.concurrency = concurrency;
        break;
      }
      case '--format': {
        const format = value(i++, arg);
        if (format !== 'table' && format !== 'json') {
          throw new CliError(`Unknown format: ${format}`);
        }
        parsed.format = format;
        break;
      }
      case '--no-persist':
        parsed.persist = false;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        throw new CliError(`Unknown option: ${arg}`);
    }
  }

  return { help, batch: parsed };
};
