import { logger } from '../../utils/logger.js';
import { TelemetryError } from '../../utils/errors.js';
import { sleep } from '../../utils/retry.js';
import type { Config } from '../../config/index.js';
import type { TelemetrySource } from './TelemetrySource.js';

export interface AcceleratorStats {
  deviceIndex: number;
  memoryUsedMB: number;
  memoryTotalMB: number;
  memoryFreeMB: number;
  memoryUsedFraction: number;
  utilizationFraction: number;
}

export interface AcceleratorAlert {
  deviceIndex: number;
  memoryUsedFraction: number;
  utilizationFraction: number;
  threshold: number;
}

export type AcceleratorMonitorOptions = Pick<
  Config['accelerator'],
  'deviceIndex' | 'warningThreshold' | 'pollIntervalMs' | 'waitTimeoutSeconds'
> & {
  onAlert?: (alert: AcceleratorAlert) => void;
};

/**
 * Read-only view of one accelerator device. Crossing the warning threshold
 * is reported once per excursion through the logger and `onAlert`; it never
 * fails a caller.
 */
export class AcceleratorMonitor {
  private alerting = false;
  private last: AcceleratorStats | undefined;

  constructor(
    private readonly source: TelemetrySource,
    private readonly options: AcceleratorMonitorOptions
  ) {}

  get lastReading(): AcceleratorStats | undefined {
    return this.last;
  }

  async stats(): Promise<AcceleratorStats> {
    const devices = await this.source.read();
    const device = devices.find((candidate) => candidate.index === this.options.deviceIndex);
    if (!device) {
      throw new TelemetryError(`Accelerator device ${this.options.deviceIndex} not found`, {
        devices: devices.map((candidate) => candidate.index),
      });
    }

    const stats: AcceleratorStats = {
      deviceIndex: device.index,
      memoryUsedMB: device.memoryUsedMB,
      memoryTotalMB: device.memoryTotalMB,
      memoryFreeMB: device.memoryFreeMB,
      memoryUsedFraction: device.memoryTotalMB > 0 ? device.memoryUsedMB / device.memoryTotalMB : 0,
      utilizationFraction: device.utilizationPercent / 100,
    };

    this.last = stats;
    this.checkThreshold(stats);
    return stats;
  }

  async hasAvailableMemory(requiredGB: number): Promise<boolean> {
    const stats = await this.stats();
    return stats.memoryFreeMB / 1024 >= requiredGB;
  }

  /**
   * Polls until `requiredGB` is free. Resolves false once `timeoutSeconds`
   * elapse so the caller decides whether to fail or queue.
   */
  async waitForMemory(
    requiredGB: number,
    timeoutSeconds: number = this.options.waitTimeoutSeconds
  ): Promise<boolean> {
    const deadline = Date.now() + timeoutSeconds * 1000;

    for (;;) {
      if (await this.hasAvailableMemory(requiredGB)) {
        return true;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        logger.warn({ requiredGB, timeoutSeconds, freeMB: this.last?.memoryFreeMB }, 'Timed out waiting for accelerator memory');
        return false;
      }

      logger.debug({ requiredGB, freeMB: this.last?.memoryFreeMB }, 'Waiting for accelerator memory');
      await sleep(Math.min(this.options.pollIntervalMs, remaining));
    }
  }

  private checkThreshold(stats: AcceleratorStats): void {
    const threshold = this.options.warningThreshold;
    const over = stats.memoryUsedFraction >= threshold || stats.utilizationFraction >= threshold;

    if (over && !this.alerting) {
      this.alerting = true;
      const alert: AcceleratorAlert = {
        deviceIndex: stats.deviceIndex,
        memoryUsedFraction: stats.memoryUsedFraction,
        utilizationFraction: stats.utilizationFraction,
        threshold,
      };
      logger.warn(alert, 'Accelerator usage above warning threshold');
      this.options.onAlert?.(alert);
    } else if (!over && this.alerting) {
      this.alerting = false;
      logger.info({ deviceIndex: stats.deviceIndex }, 'Accelerator usage back below warning threshold');
    }
  }
}
