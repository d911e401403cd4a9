export type { BaseSensorOptions } from "./base-sensor.js";
export { BaseSensor, bandExcess } from "./base-sensor.js";
export type { HumiditySensorOptions } from "./humidity-sensor.js";
export { HumiditySensor } from "./humidity-sensor.js";
export { scriptedSource, uniformSource } from "./reading-source.js";
export type { AnySensor, SensorBuildOptions, SensorParams } from "./sensor-factory.js";
export { createSensor, SensorFactory, sensorFromConfig } from "./sensor-factory.js";
export type { TemperatureSensorOptions, TemperatureUnit } from "./temperature-sensor.js";
export { TemperatureSensor } from "./temperature-sensor.js";
export type { ReadingSource, Sensor, SensorKind, SensorReading } from "./types.js";
export { ALERT_LEVEL_RANK, AlertLevel, SENSOR_KINDS } from "./types.js";
export type { VibrationSensorOptions } from "./vibration-sensor.js";
export { rootMeanSquare, VibrationSensor } from "./vibration-sensor.js";
