import { config } from "../config/index.js";
import { BaseSensor, type BaseSensorOptions } from "./base-sensor.js";
import { uniform } from "./reading-source.js";
import type { AlertLevel, SensorReading } from "./types.js";

export interface VibrationSensorOptions extends BaseSensorOptions {
  /** RMS acceleration above which the sensor breaches. */
  rmsLimit: number;
  /** Readings the RMS is computed over. */
  windowSize?: number;
  frequencyHz?: number;
}

export function rootMeanSquare(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v * v;
  return Math.sqrt(sum / values.length);
}

function vibrationIssues(opts: VibrationSensorOptions): string[] {
  const issues: string[] = [];
  if (!(opts.rmsLimit > 0) || !Number.isFinite(opts.rmsLimit)) issues.push("rmsLimit must be a positive number");
  if (opts.windowSize !== undefined && !(Number.isInteger(opts.windowSize) && opts.windowSize >= 1)) {
    issues.push("windowSize must be a positive integer");
  }
  if (opts.frequencyHz !== undefined && !(opts.frequencyHz > 0)) issues.push("frequencyHz must be positive");
  return issues;
}

/**
 * Keeps the last `windowSize` readings and breaches when their RMS
 * exceeds `rmsLimit`.
 */
export class VibrationSensor extends BaseSensor {
  readonly kind = "vibration" as const;
  readonly rmsLimit: number;
  readonly windowSize: number;
  readonly frequencyHz: number;

  private window: SensorReading[] = [];

  constructor(opts: VibrationSensorOptions) {
    super(opts, vibrationIssues(opts));
    this.rmsLimit = opts.rmsLimit;
    this.windowSize = opts.windowSize ?? config.monitoring.vibrationWindowSize;
    this.frequencyHz = opts.frequencyHz ?? 1000;
  }

  /** RMS over the buffered window; 0 before the first reading. */
  rms(): number {
    return rootMeanSquare(this.window.map((r) => r.value));
  }

  /**
   * The window under evaluation is the buffer when `reading` is its newest
   * entry, otherwise the newest `windowSize - 1` buffered readings plus `reading`.
   */
  evaluate(reading: SensorReading): AlertLevel {
    const newest = this.window[this.window.length - 1];
    const samples =
      newest === reading
        ? this.window
        : [...(this.windowSize > 1 ? this.window.slice(-(this.windowSize - 1)) : []), reading];
    const rms = rootMeanSquare(samples.map((r) => r.value));
    return this.levelFor(rms - this.rmsLimit, this.rmsLimit);
  }

  label(): string {
    return `Vibration @ ${this.frequencyHz}Hz`;
  }

  protected simulate(): number {
    return uniform(-1.5 * this.rmsLimit, 1.5 * this.rmsLimit);
  }

  protected onReading(reading: SensorReading): void {
    this.window.push(reading);
    if (this.window.length > this.windowSize) {
      this.window.splice(0, this.window.length - this.windowSize);
    }
  }
}
