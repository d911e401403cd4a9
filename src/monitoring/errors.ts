export class InvalidConfigurationError extends Error {
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`Invalid configuration for ${subject}: ${issues.join("; ")}`);
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

export class UnknownSensorTypeError extends Error {
  readonly sensorType: string;

  constructor(sensorType: string) {
    super(`Unknown sensor type: "${sensorType}"`);
    this.name = "UnknownSensorTypeError";
    this.sensorType = sensorType;
  }
}

export class UnknownNotifierTypeError extends Error {
  readonly notifierType: string;

  constructor(notifierType: string) {
    super(`Unknown notifier type: "${notifierType}"`);
    this.name = "UnknownNotifierTypeError";
    this.notifierType = notifierType;
  }
}

export class DuplicateSensorError extends Error {
  readonly sensorId: string;

  constructor(sensorId: string) {
    super(`Sensor ${sensorId} is already registered`);
    this.name = "DuplicateSensorError";
    this.sensorId = sensorId;
  }
}

/** Raised by a sensor whose reading source failed or produced a non-finite value. */
export class SensorReadError extends Error {
  readonly sensorId: string;

  constructor(sensorId: string, reason: string) {
    super(`Sensor ${sensorId} failed to produce a reading: ${reason}`);
    this.name = "SensorReadError";
    this.sensorId = sensorId;
  }
}
