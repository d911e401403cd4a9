import { InvalidConfigurationError, SensorReadError } from "../monitoring/errors.js";
import { AlertLevel, type ReadingSource, type Sensor, type SensorKind, type SensorReading } from "./types.js";

export const DEFAULT_LOCATION = "unspecified";
export const DEFAULT_CRITICAL_RATIO = 0.25;

export interface BaseSensorOptions {
  id: string;
  location?: string;
  /** Offset added to every raw value. */
  calibration?: number;
  /** Excess ratio at which a breach becomes critical. */
  criticalRatio?: number;
  /** Raw value supplier. Falls back to the sensor's own simulation. */
  source?: ReadingSource;
  now?: () => number;
}

/**
 * Amount by which `value` lies outside the open band (min, max).
 * Zero when inside the band or exactly on a boundary.
 */
export function bandExcess(value: number, min: number, max: number): number {
  if (value < min) return min - value;
  if (value > max) return value - max;
  return 0;
}

/** Collect the issues of a [min, max] threshold pair. */
export function bandIssues(min: number, max: number): string[] {
  const issues: string[] = [];
  if (!Number.isFinite(min)) issues.push("min must be a finite number");
  if (!Number.isFinite(max)) issues.push("max must be a finite number");
  if (issues.length === 0 && min >= max) issues.push(`min (${min}) must be less than max (${max})`);
  return issues;
}

/**
 * Shared reading lifecycle for every sensor kind: sampling, calibration,
 * last-reading bookkeeping and the linear severity scale.
 */
export abstract class BaseSensor implements Sensor {
  abstract readonly kind: SensorKind;

  readonly id: string;
  readonly location: string;
  readonly calibration: number;
  readonly criticalRatio: number;

  private readonly source: ReadingSource | null;
  private readonly now: () => number;
  private latest: SensorReading | null = null;

  protected constructor(opts: BaseSensorOptions, thresholdIssues: string[]) {
    const issues: string[] = [];
    if (opts.id.trim() === "") issues.push("id must not be empty");
    if (opts.calibration !== undefined && !Number.isFinite(opts.calibration)) {
      issues.push("calibration must be a finite number");
    }
    if (opts.criticalRatio !== undefined && !(opts.criticalRatio > 0)) {
      issues.push("criticalRatio must be positive");
    }
    issues.push(...thresholdIssues);
    if (issues.length > 0) {
      throw new InvalidConfigurationError(`sensor "${opts.id}"`, issues);
    }

    this.id = opts.id;
    this.location = opts.location ?? DEFAULT_LOCATION;
    this.calibration = opts.calibration ?? 0;
    this.criticalRatio = opts.criticalRatio ?? DEFAULT_CRITICAL_RATIO;
    this.source = opts.source ?? null;
    this.now = opts.now ?? Date.now;
  }

  get lastReading(): SensorReading | null {
    return this.latest;
  }

  produceReading(): SensorReading {
    let raw: number;
    try {
      raw = this.source ? this.source() : this.simulate();
    } catch (err) {
      throw new SensorReadError(this.id, err instanceof Error ? err.message : String(err));
    }
    return this.record(raw);
  }

  /** Store an externally measured raw value as the newest reading. */
  record(raw: number): SensorReading {
    if (!Number.isFinite(raw)) {
      throw new SensorReadError(this.id, `non-finite value ${raw}`);
    }
    const reading: SensorReading = Object.freeze({
      sensorId: this.id,
      value: raw + this.calibration,
      timestamp: this.now(),
    });
    this.latest = reading;
    this.onReading(reading);
    return reading;
  }

  abstract evaluate(reading: SensorReading): AlertLevel;

  describe(): string {
    const last = this.latest;
    const state = last && this.evaluate(last) !== AlertLevel.None ? "ALERT" : "NORMAL";
    const value = last ? last.value.toFixed(2) : "n/a";
    return `Sensor ${this.id} (${this.label()}) @ ${this.location}: ${state} - last=${value}`;
  }

  /** Human-readable kind, e.g. "Temperature (C)". */
  abstract label(): string;

  /** Raw value used when no source was injected. */
  protected abstract simulate(): number;

  protected onReading(_reading: SensorReading): void {}

  /** Linear severity: the excess relative to `scale` decides warning vs critical. */
  protected levelFor(excess: number, scale: number): AlertLevel {
    if (!(excess > 0)) return AlertLevel.None;
    return excess / scale >= this.criticalRatio ? AlertLevel.Critical : AlertLevel.Warning;
  }
}
