import { randomUUID } from "node:crypto";
import type { AlertLevel, SensorKind, SensorReading } from "../sensors/types.js";

export type BreachLevel = Exclude<AlertLevel, "none">;

export interface Alert {
  readonly id: string;
  readonly sensorId: string;
  readonly sensorKind: SensorKind;
  readonly level: BreachLevel;
  readonly value: number;
  readonly message: string;
  /** Epoch milliseconds of the reading that breached. */
  readonly timestamp: number;
}

export function createAlert(
  sensor: { id: string; kind: SensorKind; location: string },
  reading: SensorReading,
  level: BreachLevel,
): Alert {
  return Object.freeze({
    id: randomUUID(),
    sensorId: sensor.id,
    sensorKind: sensor.kind,
    level,
    value: reading.value,
    message: `${level.toUpperCase()}: ${sensor.kind} sensor ${sensor.id} at ${sensor.location} breached its threshold (value=${reading.value.toFixed(2)})`,
    timestamp: reading.timestamp,
  });
}

export function alertToJson(alert: Alert): string {
  return JSON.stringify({
    timestamp: new Date(alert.timestamp).toISOString(),
    sensor_id: alert.sensorId,
    message: alert.message,
    level: alert.level,
    value: alert.value,
  });
}

/** `timestamp,sensorId,level,value,"message"` with quotes in the message doubled. */
export function alertToCsv(alert: Alert): string {
  const message = alert.message.replace(/"/g, '""');
  return `${new Date(alert.timestamp).toISOString()},${alert.sensorId},${alert.level},${alert.value},"${message}"`;
}
