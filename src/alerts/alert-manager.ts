import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { DuplicateSensorError } from "../monitoring/errors.js";
import type { DeliveryResult, NotificationChannel, Notifier } from "../notifiers/types.js";
import { AlertLevel, type Sensor, type SensorReading } from "../sensors/types.js";
import { type Alert, createAlert } from "./alert.js";

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_MAX_LOG_SIZE = 1000;

export type SensorOutcomeStatus = "ok" | "alert" | "failed";

export interface SensorOutcome {
  readonly sensorId: string;
  readonly status: SensorOutcomeStatus;
  readonly level: AlertLevel;
  readonly value?: number;
  readonly alertId?: string;
  /** True when the alert was logged but not dispatched because the hourly budget was spent. */
  readonly suppressed?: boolean;
  readonly error?: string;
}

export interface DeliveryRecord extends Readonly<DeliveryResult> {
  readonly alertId: string;
  readonly sensorId: string;
}

export interface NotifierTally {
  readonly notifier: string;
  readonly channel: NotificationChannel;
  readonly delivered: number;
  readonly failed: number;
}

/** Frozen record of one cycle; holders cannot alter the manager's state through it. */
export interface CycleSummary {
  readonly cycle: number;
  readonly startedAt: number;
  readonly completedAt: number;
  readonly alertsRaised: number;
  readonly suppressed: number;
  readonly sensors: readonly SensorOutcome[];
  readonly deliveries: readonly DeliveryRecord[];
  readonly notifiers: readonly NotifierTally[];
}

export interface AlertManagerOptions {
  /**
   * Opt-in cap on alerts dispatched per trailing hour. Falls back to the
   * configured value; when neither is set every alert is dispatched.
   */
  maxAlertsPerHour?: number;
  /** Alerts kept in the in-memory log; the oldest are dropped first. */
  maxLogSize?: number;
  now?: () => number;
}

type Sample = { ok: true; reading: SensorReading; level: AlertLevel } | { ok: false; error: string };

/**
 * Owns the sensors and notifiers of a monitoring system and runs evaluation
 * cycles over them. Sensor and notifier failures inside a cycle are folded
 * into the returned summary; only registration errors are thrown.
 */
export class AlertManager {
  private readonly sensors: Sensor[] = [];
  private readonly notifiers: Notifier[] = [];
  private readonly maxAlertsPerHour: number | undefined;
  private readonly maxLogSize: number;
  private readonly now: () => number;
  private alertLog: Alert[] = [];
  private dispatchTimes: number[] = [];
  private cycleCount = 0;

  constructor(opts: AlertManagerOptions = {}) {
    this.maxAlertsPerHour = opts.maxAlertsPerHour ?? config.monitoring.maxAlertsPerHour;
    this.maxLogSize = opts.maxLogSize ?? DEFAULT_MAX_LOG_SIZE;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Register a sensor at the end of the polling order.
   * @throws DuplicateSensorError if a sensor with the same id is registered
   */
  addSensor(sensor: Sensor): void {
    if (this.sensors.some((s) => s.id === sensor.id)) {
      throw new DuplicateSensorError(sensor.id);
    }
    this.sensors.push(sensor);
    logger.info(`Sensor ${sensor.id} registered`, { kind: sensor.kind, location: sensor.location });
  }

  /** Unregister a sensor. Returns false when no sensor has that id. */
  removeSensor(id: string): boolean {
    const index = this.sensors.findIndex((s) => s.id === id);
    if (index === -1) return false;
    this.sensors.splice(index, 1);
    logger.info(`Sensor ${id} removed`);
    return true;
  }

  /** Register a notifier at the end of the dispatch order. */
  addNotifier(notifier: Notifier): void {
    this.notifiers.push(notifier);
    logger.info(`Notifier ${notifier.name} registered`, { channel: notifier.channel });
  }

  getSensor(id: string): Sensor | undefined {
    return this.sensors.find((s) => s.id === id);
  }

  getSensors(): Sensor[] {
    return [...this.sensors];
  }

  getNotifiers(): Notifier[] {
    return [...this.notifiers];
  }

  /** Poll every sensor once and dispatch an alert for each breach. */
  runCycle(): CycleSummary {
    const cycle = ++this.cycleCount;
    const startedAt = this.now();
    const sensors: SensorOutcome[] = [];
    const deliveries: DeliveryRecord[] = [];
    const notifiers = [...this.notifiers];
    const delivered = notifiers.map(() => 0);
    const failed = notifiers.map(() => 0);
    let alertsRaised = 0;
    let suppressed = 0;

    for (const sensor of [...this.sensors]) {
      const sample = this.sample(sensor);
      if (!sample.ok) {
        logger.error(`Sensor ${sensor.id} failed during cycle ${cycle}`, { error: sample.error });
        sensors.push({ sensorId: sensor.id, status: "failed", level: AlertLevel.None, error: sample.error });
        continue;
      }

      const { reading, level } = sample;
      if (level === AlertLevel.None) {
        sensors.push({ sensorId: sensor.id, status: "ok", level, value: reading.value });
        continue;
      }

      const alert = createAlert(sensor, reading, level);
      this.appendToLog(alert);
      alertsRaised++;

      if (!this.consumeBudget(startedAt)) {
        suppressed++;
        logger.warn(`Alert suppressed: hourly budget of ${this.maxAlertsPerHour} reached`, {
          alertId: alert.id,
          sensorId: sensor.id,
        });
        sensors.push({
          sensorId: sensor.id,
          status: "alert",
          level,
          value: reading.value,
          alertId: alert.id,
          suppressed: true,
        });
        continue;
      }

      logger.warn(alert.message, { alertId: alert.id, sensorId: sensor.id, level, value: reading.value });
      notifiers.forEach((notifier, i) => {
        const result = this.deliver(notifier, alert);
        deliveries.push(Object.freeze({ ...result, alertId: alert.id, sensorId: sensor.id }));
        if (result.status === "delivered") delivered[i]++;
        else failed[i]++;
      });
      sensors.push({
        sensorId: sensor.id,
        status: "alert",
        level,
        value: reading.value,
        alertId: alert.id,
        suppressed: false,
      });
    }

    const tallies = notifiers.map(
      (n, i): NotifierTally =>
        Object.freeze({ notifier: n.name, channel: n.channel, delivered: delivered[i], failed: failed[i] }),
    );
    const summary: CycleSummary = Object.freeze({
      cycle,
      startedAt,
      completedAt: this.now(),
      alertsRaised,
      suppressed,
      sensors: Object.freeze(sensors.map((o) => Object.freeze(o))),
      deliveries: Object.freeze(deliveries),
      notifiers: Object.freeze(tallies),
    });
    logger.debug(`Cycle ${cycle} complete`, {
      sensors: sensors.length,
      alertsRaised,
      suppressed,
      failedDeliveries: deliveries.filter((d) => d.status === "failed").length,
    });
    return summary;
  }

  /** Alerts raised so far, oldest first. */
  getAlertLog(): Alert[] {
    return [...this.alertLog];
  }

  /** Empty the alert log. Returns how many alerts were dropped. */
  clearHistory(): number {
    const removed = this.alertLog.length;
    this.alertLog = [];
    logger.info(`Alert history cleared: ${removed} alerts removed`);
    return removed;
  }

  generateReport(): string {
    return [
      "=== SYSTEM REPORT ===",
      `Active sensors: ${this.sensors.length}`,
      `Notifiers: ${this.notifiers.length}`,
      `Alerts logged: ${this.alertLog.length}`,
      "",
      "Sensor status:",
      ...this.sensors.map((s) => `- ${s.describe()}`),
    ].join("\n");
  }

  private sample(sensor: Sensor): Sample {
    try {
      const reading = sensor.produceReading();
      return { ok: true, reading, level: sensor.evaluate(reading) };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  private deliver(notifier: Notifier, alert: Alert): DeliveryResult {
    try {
      return notifier.send(alert);
    } catch (err) {
      // Third-party notifiers may break the no-throw contract.
      const reason = err instanceof Error ? err.message : String(err);
      logger.error(`Notifier ${notifier.name} threw while sending`, { alertId: alert.id, reason });
      return { notifier: notifier.name, channel: notifier.channel, status: "failed", reason };
    }
  }

  private consumeBudget(now: number): boolean {
    const limit = this.maxAlertsPerHour;
    if (limit === undefined) return true;
    const cutoff = now - HOUR_MS;
    this.dispatchTimes = this.dispatchTimes.filter((t) => t > cutoff);
    if (this.dispatchTimes.length >= limit) return false;
    this.dispatchTimes.push(now);
    return true;
  }

  private appendToLog(alert: Alert): void {
    this.alertLog.push(alert);
    if (this.alertLog.length > this.maxLogSize) {
      this.alertLog.splice(0, this.alertLog.length - this.maxLogSize);
    }
  }
}
