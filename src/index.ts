/**
 * sensor-watch: simulated sensor monitoring with threshold alerts and
 * pluggable notification channels.
 */

export * from "./alerts/index.js";
export type { Config, MonitoringConfig, NotificationConfig } from "./config/index.js";
export { config } from "./config/index.js";
export { logger } from "./config/logger.js";
export * from "./monitoring/index.js";
export * from "./notifiers/index.js";
export * from "./sensors/index.js";
