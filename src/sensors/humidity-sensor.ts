import { BaseSensor, type BaseSensorOptions, bandExcess, bandIssues } from "./base-sensor.js";
import { uniform } from "./reading-source.js";
import type { AlertLevel, SensorReading } from "./types.js";

export interface HumiditySensorOptions extends BaseSensorOptions {
  /** Relative humidity lower bound, percent. */
  min: number;
  /** Relative humidity upper bound, percent. */
  max: number;
  environment?: string;
}

function humidityIssues(min: number, max: number): string[] {
  const issues = bandIssues(min, max);
  if (min < 0) issues.push("min must be at least 0%");
  if (max > 100) issues.push("max must be at most 100%");
  return issues;
}

export class HumiditySensor extends BaseSensor {
  readonly kind = "humidity" as const;
  readonly min: number;
  readonly max: number;
  readonly environment: string;

  constructor(opts: HumiditySensorOptions) {
    super(opts, humidityIssues(opts.min, opts.max));
    this.min = opts.min;
    this.max = opts.max;
    this.environment = opts.environment ?? "indoor";
  }

  evaluate(reading: SensorReading): AlertLevel {
    return this.levelFor(bandExcess(reading.value, this.min, this.max), this.max - this.min);
  }

  label(): string {
    return `Humidity (${this.environment})`;
  }

  /**
   * Approximate dew point in °C for the last reading at the given air
   * temperature. Null before the first reading.
   */
  dewPoint(ambientC = 20): number | null {
    const last = this.lastReading;
    if (!last) return null;
    return ambientC - (100 - last.value) / 5;
  }

  protected simulate(): number {
    const margin = (this.max - this.min) * 0.25;
    return uniform(Math.max(0, this.min - margin), Math.min(100, this.max + margin));
  }
}
