export type SensorKind = "temperature" | "vibration" | "humidity";

export const SENSOR_KINDS: readonly SensorKind[] = ["temperature", "vibration", "humidity"] as const;

export const AlertLevel = {
  None: "none",
  Warning: "warning",
  Critical: "critical",
} as const;

export type AlertLevel = (typeof AlertLevel)[keyof typeof AlertLevel];

/** Ordering used to compare severities: none < warning < critical. */
export const ALERT_LEVEL_RANK: Record<AlertLevel, number> = {
  none: 0,
  warning: 1,
  critical: 2,
};

export interface SensorReading {
  readonly sensorId: string;
  readonly value: number;
  /** Epoch milliseconds. */
  readonly timestamp: number;
}

/** Supplies raw (uncalibrated) values to a sensor. May throw to simulate a faulty device. */
export type ReadingSource = () => number;

export interface Sensor {
  readonly id: string;
  readonly kind: SensorKind;
  readonly location: string;
  readonly lastReading: SensorReading | null;

  /** Sample the reading source and store the result as the last reading. */
  produceReading(): SensorReading;

  /** Compare a reading against this sensor's thresholds. Pure. */
  evaluate(reading: SensorReading): AlertLevel;

  /** One-line operator status. */
  describe(): string;
}
