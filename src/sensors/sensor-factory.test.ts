import { describe, expect, it } from "vitest";
import { InvalidConfigurationError, UnknownSensorTypeError } from "../monitoring/errors.js";
import { HumiditySensor } from "./humidity-sensor.js";
import { scriptedSource } from "./reading-source.js";
import { createSensor, SensorFactory, sensorFromConfig } from "./sensor-factory.js";
import { TemperatureSensor } from "./temperature-sensor.js";
import { SENSOR_KINDS } from "./types.js";
import { VibrationSensor } from "./vibration-sensor.js";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidConfigurationError) return err.issues;
    throw err;
  }
  throw new Error("expected InvalidConfigurationError");
}

describe("createSensor", () => {
  it("builds a temperature sensor from min/max", () => {
    const sensor = createSensor("temperature", { min: 10, max: 30 });
    expect(sensor).toBeInstanceOf(TemperatureSensor);
    expect(sensor.id).toMatch(/^temperature-[0-9a-f]{8}$/);
  });

  it("rejects an inverted band", () => {
    expect(() => createSensor("temperature", { min: 30, max: 10 })).toThrow(InvalidConfigurationError);
    expect(issuesOf(() => createSensor("temperature", { min: 30, max: 10 }))).toEqual([
      "min: min must be less than max",
    ]);
  });

  it("rejects an unknown type", () => {
    expect(() => createSensor("unknown", {})).toThrow(UnknownSensorTypeError);
    expect(() => createSensor("unknown", {})).toThrow('Unknown sensor type: "unknown"');
  });

  it("accepts every registered sensor kind", () => {
    const params = { min: 20, max: 80, rmsLimit: 2.5 };
    expect(SENSOR_KINDS.map((kind) => createSensor(kind, params).kind)).toEqual([...SENSOR_KINDS]);
  });

  it("matches the type tag case-insensitively", () => {
    expect(createSensor("Vibration", { rmsLimit: 2.5 })).toBeInstanceOf(VibrationSensor);
    expect(createSensor(" HUMIDITY ", { min: 20, max: 80 })).toBeInstanceOf(HumiditySensor);
  });

  it("reports missing required keys", () => {
    expect(issuesOf(() => createSensor("vibration", {}))).toEqual(["rmsLimit: Required"]);
    expect(issuesOf(() => createSensor("temperature", { min: 10 }))).toEqual(["max: Required"]);
  });

  it("rejects out-of-domain values", () => {
    expect(() => createSensor("vibration", { rmsLimit: -1 })).toThrow(InvalidConfigurationError);
    expect(() => createSensor("humidity", { min: 20, max: 120 })).toThrow(InvalidConfigurationError);
    expect(() => createSensor("temperature", { min: "10", max: 30 })).toThrow(InvalidConfigurationError);
  });

  it("ignores unrecognized keys and keeps the optional ones", () => {
    const sensor = createSensor("humidity", {
      id: "HUM_001",
      min: 20,
      max: 80,
      location: "Warehouse",
      environment: "storage",
      color: "blue",
    });
    expect(sensor).toBeInstanceOf(HumiditySensor);
    expect(sensor.id).toBe("HUM_001");
    expect(sensor.location).toBe("Warehouse");
    expect(sensor.label()).toBe("Humidity (storage)");
  });

  it("passes the reading source through", () => {
    const sensor = createSensor("temperature", { id: "T1", min: 0, max: 10 }, { source: scriptedSource([50]) });
    expect(sensor.produceReading().value).toBe(50);
  });
});

describe("sensorFromConfig", () => {
  it("reads the type from the entry", () => {
    const sensor = sensorFromConfig({ type: "vibration", id: "VIB_001", rmsLimit: 2.5, windowSize: 4 });
    expect(sensor).toBeInstanceOf(VibrationSensor);
    expect(sensor instanceof VibrationSensor && sensor.rmsLimit).toBe(2.5);
  });

  it("requires a type", () => {
    expect(issuesOf(() => sensorFromConfig({ min: 1, max: 2 }))).toEqual(["type: Required"]);
  });

  it("is exposed through SensorFactory", () => {
    expect(SensorFactory.create("temperature", { min: 10, max: 30 })).toBeInstanceOf(TemperatureSensor);
    expect(SensorFactory.fromConfig({ type: "humidity", min: 10, max: 90 })).toBeInstanceOf(HumiditySensor);
  });
});
