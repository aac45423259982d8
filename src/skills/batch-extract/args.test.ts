import { describe, it, expect } from 'vitest';
import { CliError, parseArgs } from './args.js';

describe('parseArgs', () => {
  it('applies defaults', () => {
    expect(parseArgs(['--folder', './docs'])).toEqual({
      help: false,
      batch: { folder: './docs', dryRun: false, format: 'table', concurrency: 2, persist: true, route: {} },
    });
  });

  it('reads routing and output options', () => {
    const { batch } = parseArgs([
      '--folder', './docs', '--strategy', 'three_wave', '--relationships', '--deep',
      '--concurrency', '4', '--format', 'json', '--no-persist', '--dry-run',
    ]);

    expect(batch).toEqual({
      folder: './docs',
      dryRun: true,
      format: 'json',
      concurrency: 4,
      persist: false,
      route: { strategyOverride: 'three_wave', extractRelationships: true, deep: true },
    });
  });

  it('rejects unknown strategies, formats and options', () => {
    expect(() => parseArgs(['--strategy', 'five_wave'])).toThrow('Unknown strategy: five_wave');
    expect(() => parseArgs(['--format', 'csv'])).toThrow('Unknown format: csv');
    expect(() => parseArgs(['--verbose'])).toThrow(CliError);
  });

  it('requires values for value options', () => {
    expect(() => parseArgs(['--folder', '--dry-run'])).toThrow('--folder requires a value');
    expect(() => parseArgs(['--concurrency', '0'])).toThrow('--concurrency must be a positive integer');
  });

  it('recognizes help', () => {
    expect(parseArgs(['-h']).help).toBe(true);
  });
});
