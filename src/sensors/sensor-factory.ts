import { randomUUID } from "node:crypto";
import { z } from "zod";
import { InvalidConfigurationError, UnknownSensorTypeError } from "../monitoring/errors.js";
import { HumiditySensor } from "./humidity-sensor.js";
import { TemperatureSensor } from "./temperature-sensor.js";
import { type ReadingSource, SENSOR_KINDS, type SensorKind } from "./types.js";
import { VibrationSensor } from "./vibration-sensor.js";

export type AnySensor = TemperatureSensor | VibrationSensor | HumiditySensor;

/** Sensor parameters as they arrive from configuration. Unrecognized keys are ignored. */
export type SensorParams = Record<string, unknown>;

export interface SensorBuildOptions {
  source?: ReadingSource;
  now?: () => number;
}

const commonParams = {
  id: z.string().min(1).optional(),
  location: z.string().min(1).optional(),
  calibration: z.number().finite().optional(),
  criticalRatio: z.number().positive().optional(),
};

const bandMessage = { message: "min must be less than max", path: ["min"] };

export const temperatureParamsSchema = z
  .object({
    ...commonParams,
    min: z.number().finite(),
    max: z.number().finite(),
    unit: z.enum(["C", "F"]).optional(),
  })
  .refine((p) => p.min < p.max, bandMessage);

export const humidityParamsSchema = z
  .object({
    ...commonParams,
    min: z.number().min(0).max(100),
    max: z.number().min(0).max(100),
    environment: z.string().min(1).optional(),
  })
  .refine((p) => p.min < p.max, bandMessage);

export const vibrationParamsSchema = z.object({
  ...commonParams,
  rmsLimit: z.number().finite().positive(),
  windowSize: z.number().int().positive().optional(),
  frequencyHz: z.number().positive().optional(),
});

function normalizeType(type: string): SensorKind {
  const kind = SENSOR_KINDS.find((k) => k === type.trim().toLowerCase());
  if (!kind) throw new UnknownSensorTypeError(type);
  return kind;
}

function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, kind: SensorKind, params: SensorParams): T {
  const result = schema.safeParse(params);
  if (!result.success) {
    const issues = result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
    throw new InvalidConfigurationError(`${kind} sensor`, issues);
  }
  return result.data;
}

function defaultId(kind: SensorKind): string {
  return `${kind}-${randomUUID().slice(0, 8)}`;
}

/**
 * Build a sensor from a type tag and a parameter map.
 *
 * @throws UnknownSensorTypeError for a tag other than temperature, vibration or humidity
 * @throws InvalidConfigurationError when a required parameter is missing or out of domain
 */
export function createSensor(type: string, params: SensorParams, opts: SensorBuildOptions = {}): AnySensor {
  const kind = normalizeType(type);

  switch (kind) {
    case "temperature": {
      const p = parseParams(temperatureParamsSchema, kind, params);
      return new TemperatureSensor({ ...p, ...opts, id: p.id ?? defaultId(kind) });
    }
    case "vibration": {
      const p = parseParams(vibrationParamsSchema, kind, params);
      return new VibrationSensor({ ...p, ...opts, id: p.id ?? defaultId(kind) });
    }
    case "humidity": {
      const p = parseParams(humidityParamsSchema, kind, params);
      return new HumiditySensor({ ...p, ...opts, id: p.id ?? defaultId(kind) });
    }
  }
}

/** Build a sensor from a config entry that carries its own `type` key. */
export function sensorFromConfig(entry: SensorParams, opts: SensorBuildOptions = {}): AnySensor {
  const type = entry.type;
  if (typeof type !== "string") {
    throw new InvalidConfigurationError("sensor", ["type: Required"]);
  }
  return createSensor(type, entry, opts);
}

export const SensorFactory = {
  create: createSensor,
  fromConfig: sensorFromConfig,
} as const;
