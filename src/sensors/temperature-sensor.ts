import { BaseSensor, type BaseSensorOptions, bandExcess, bandIssues } from "./base-sensor.js";
import { uniform } from "./reading-source.js";
import type { AlertLevel, SensorReading } from "./types.js";

export type TemperatureUnit = "C" | "F";

export interface TemperatureSensorOptions extends BaseSensorOptions {
  min: number;
  max: number;
  unit?: TemperatureUnit;
}

/** Breaches when a reading leaves the open band (min, max). */
export class TemperatureSensor extends BaseSensor {
  readonly kind = "temperature" as const;
  readonly min: number;
  readonly max: number;
  readonly unit: TemperatureUnit;

  constructor(opts: TemperatureSensorOptions) {
    super(opts, bandIssues(opts.min, opts.max));
    this.min = opts.min;
    this.max = opts.max;
    this.unit = opts.unit ?? "C";
  }

  evaluate(reading: SensorReading): AlertLevel {
    return this.levelFor(bandExcess(reading.value, this.min, this.max), this.max - this.min);
  }

  label(): string {
    return `Temperature (${this.unit})`;
  }

  /** Last reading in Fahrenheit, or null before the first reading. */
  toFahrenheit(): number | null {
    const last = this.lastReading;
    if (!last) return null;
    return this.unit === "F" ? last.value : (last.value * 9) / 5 + 32;
  }

  protected simulate(): number {
    const margin = (this.max - this.min) * 0.25;
    return uniform(this.min - margin, this.max + margin);
  }
}
