import { spawn } from 'child_process';
import { TelemetryError } from '../../utils/errors.js';

export interface DeviceTelemetry {
  index: number;
  memoryUsedMB: number;
  memoryTotalMB: number;
  memoryFreeMB: number;
  utilizationPercent: number;
}

export interface TelemetrySource {
  read(): Promise<DeviceTelemetry[]>;
}

export const NVIDIA_SMI_ARGS = [
  '--query-gpu=index,memory.used,memory.total,memory.free,utilization.gpu',
  '--format=csv,noheader,nounits',
];

/**
 * Parses `nvidia-smi` CSV rows (`index, used, total, free, utilization`).
 */
export function parseNvidiaSmiOutput(output: string): DeviceTelemetry[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const fields = line.split(',').map((field) => Number(field.trim()));
      if (fields.length !== 5 || fields.some((value) => !Number.isFinite(value))) {
        throw new TelemetryError('Unexpected nvidia-smi output', { line });
      }
      const [index, memoryUsedMB, memoryTotalMB, memoryFreeMB, utilizationPercent] = fields;
      return { index, memoryUsedMB, memoryTotalMB, memoryFreeMB, utilizationPercent };
    });
}

export class NvidiaSmiTelemetrySource implements TelemetrySource {
  constructor(
    private readonly command = 'nvidia-smi',
    private readonly timeoutMs = 10_000
  ) {}

  read(): Promise<DeviceTelemetry[]> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.command, NVIDIA_SMI_ARGS, { timeout: this.timeoutMs });

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data) => {
        stderr += data.toString();
      });

      proc.on('close', (code) => {
        if (code !== 0) {
          reject(new TelemetryError(`${this.command} exited with code ${code}`, { stderr }));
          return;
        }
        try {
          resolve(parseNvidiaSmiOutput(stdout));
        } catch (error) {
          reject(error);
        }
      });

      proc.on('error', (err) => {
        reject(new TelemetryError(`Failed to run ${this.command}`, err.message));
      });
    });
  }
}
