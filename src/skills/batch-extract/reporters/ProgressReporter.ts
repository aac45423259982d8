import type { BatchProgress } from '../types.js';

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

const fmt = (color: keyof typeof COLORS, text: string): string => `${COLORS[color]}${text}${COLORS.reset}`;

const PHASE_LABELS: Record<BatchProgress['phase'], string> = {
  scanning: 'Scanning folder',
  routing: 'Routing documents',
  extracting: 'Extracting entities',
};

/** Single-line TTY progress; silent when output is piped or JSON. */
export class ProgressReporter {
  private enabled: boolean;
  private lastLineLength = 0;

  constructor(enabled = true) {
    this.enabled = enabled && process.stdout.isTTY === true;
  }

  update(progress: BatchProgress): void {
    if (!this.enabled) return;

    this.clearLine();
    const counter = fmt('cyan', `[${progress.current}/${progress.total}]`);
    const file = progress.currentFile ? fmt('dim', ` - ${progress.currentFile}`) : '';
    const line = `${counter} ${PHASE_LABELS[progress.phase]}${file}`;
    process.stdout.write(line);
    this.lastLineLength = line.length;
  }

  complete(message: string): void {
    this.print('green', '✓', message);
  }

  warn(message: string): void {
    this.print('yellow', '⚠', message);
  }

  error(message: string): void {
    this.print('red', '✗', message);
  }

  private print(color: keyof typeof COLORS, symbol: string, message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    process.stdout.write(`${fmt(color, symbol)} ${message}\n`);
  }

  private clearLine(): void {
    if (this.lastLineLength > 0) {
      process.stdout.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
      this.lastLineLength = 0;
    }
  }
}
