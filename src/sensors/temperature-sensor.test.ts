import { describe, expect, it } from "vitest";
import { InvalidConfigurationError, SensorReadError } from "../monitoring/errors.js";
import { scriptedSource } from "./reading-source.js";
import { TemperatureSensor } from "./temperature-sensor.js";
import { ALERT_LEVEL_RANK, AlertLevel } from "./types.js";

function makeSensor(overrides: Partial<ConstructorParameters<typeof TemperatureSensor>[0]> = {}) {
  return new TemperatureSensor({ id: "TEMP_001", min: 10, max: 30, ...overrides });
}

describe("TemperatureSensor", () => {
  describe("evaluate", () => {
    it("returns none for a reading strictly inside the band", () => {
      const sensor = makeSensor();
      expect(sensor.evaluate(sensor.record(20))).toBe(AlertLevel.None);
    });

    it("treats both boundaries as inside the band", () => {
      const sensor = makeSensor();
      expect(sensor.evaluate(sensor.record(10))).toBe(AlertLevel.None);
      expect(sensor.evaluate(sensor.record(30))).toBe(AlertLevel.None);
    });

    it("returns warning for a small excess above max", () => {
      const sensor = makeSensor();
      expect(sensor.evaluate(sensor.record(31))).toBe(AlertLevel.Warning);
      expect(sensor.evaluate(sensor.record(34.9))).toBe(AlertLevel.Warning);
    });

    it("returns critical once the excess reaches a quarter of the band", () => {
      const sensor = makeSensor();
      expect(sensor.evaluate(sensor.record(35))).toBe(AlertLevel.Critical);
    });

    it("applies the same scale below min", () => {
      const sensor = makeSensor();
      expect(sensor.evaluate(sensor.record(9))).toBe(AlertLevel.Warning);
      expect(sensor.evaluate(sensor.record(4))).toBe(AlertLevel.Critical);
    });

    it("never lowers severity as the distance from the threshold grows", () => {
      const sensor = makeSensor();
      const ranks = [30.5, 32, 34, 35, 40, 60].map((v) => ALERT_LEVEL_RANK[sensor.evaluate(sensor.record(v))]);
      for (let i = 1; i < ranks.length; i++) {
        expect(ranks[i]).toBeGreaterThanOrEqual(ranks[i - 1]);
      }
      expect(ranks[0]).toBe(1);
      expect(ranks[ranks.length - 1]).toBe(2);
    });

    it("honours a custom critical ratio", () => {
      const sensor = makeSensor({ criticalRatio: 0.5 });
      expect(sensor.evaluate(sensor.record(35))).toBe(AlertLevel.Warning);
      expect(sensor.evaluate(sensor.record(40))).toBe(AlertLevel.Critical);
    });
  });

  describe("readings", () => {
    it("draws values from the injected source and keeps the latest", () => {
      const sensor = makeSensor({ source: scriptedSource([12, 40]) });
      expect(sensor.lastReading).toBeNull();

      expect(sensor.produceReading().value).toBe(12);
      const second = sensor.produceReading();
      expect(second.value).toBe(40);
      expect(sensor.lastReading).toBe(second);
    });

    it("adds the calibration offset", () => {
      const sensor = makeSensor({ calibration: 1.5 });
      expect(sensor.record(20).value).toBe(21.5);
    });

    it("stamps readings with the injected clock and freezes them", () => {
      const sensor = makeSensor({ now: () => 1_000 });
      const reading = sensor.record(20);
      expect(reading).toEqual({ sensorId: "TEMP_001", value: 20, timestamp: 1_000 });
      expect(Object.isFrozen(reading)).toBe(true);
    });

    it("wraps a throwing source in SensorReadError", () => {
      const sensor = makeSensor({
        source: () => {
          throw new Error("probe disconnected");
        },
      });
      expect(() => sensor.produceReading()).toThrow(SensorReadError);
      expect(() => sensor.produceReading()).toThrow("Sensor TEMP_001 failed to produce a reading: probe disconnected");
      expect(sensor.lastReading).toBeNull();
    });

    it("rejects a non-finite value", () => {
      const sensor = makeSensor({ source: () => Number.NaN });
      expect(() => sensor.produceReading()).toThrow(SensorReadError);
    });

    it("simulates values within a quarter band of the thresholds", () => {
      const sensor = makeSensor();
      for (let i = 0; i < 100; i++) {
        const { value } = sensor.produceReading();
        expect(value).toBeGreaterThanOrEqual(5);
        expect(value).toBeLessThan(35);
      }
    });
  });

  describe("construction", () => {
    it("rejects min >= max", () => {
      expect(() => makeSensor({ min: 30, max: 10 })).toThrow(InvalidConfigurationError);
      expect(() => makeSensor({ min: 10, max: 10 })).toThrow(InvalidConfigurationError);
    });

    it("lists every issue", () => {
      try {
        makeSensor({ id: "", min: 30, max: 10 });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidConfigurationError);
        expect((err as InvalidConfigurationError).issues).toEqual([
          "id must not be empty",
          "min (30) must be less than max (10)",
        ]);
      }
    });

    it("rejects a non-positive critical ratio", () => {
      expect(() => makeSensor({ criticalRatio: 0 })).toThrow(InvalidConfigurationError);
    });
  });

  describe("extras", () => {
    it("converts the last reading to Fahrenheit", () => {
      const sensor = makeSensor();
      expect(sensor.toFahrenheit()).toBeNull();
      sensor.record(100);
      expect(sensor.toFahrenheit()).toBe(212);
    });

    it("returns the raw value when the unit is already Fahrenheit", () => {
      const sensor = makeSensor({ unit: "F", min: 50, max: 90 });
      sensor.record(70);
      expect(sensor.toFahrenheit()).toBe(70);
      expect(sensor.label()).toBe("Temperature (F)");
    });

    it("describes its state", () => {
      const sensor = makeSensor({ location: "Server room" });
      expect(sensor.describe()).toBe("Sensor TEMP_001 (Temperature (C)) @ Server room: NORMAL - last=n/a");
      sensor.record(35);
      expect(sensor.describe()).toBe("Sensor TEMP_001 (Temperature (C)) @ Server room: ALERT - last=35.00");
    });
  });
});
