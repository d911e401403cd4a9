export { CONTROL_PANEL_COMMANDS, ControlPanel } from "./control-panel.js";
export {
  DuplicateSensorError,
  InvalidConfigurationError,
  SensorReadError,
  UnknownNotifierTypeError,
  UnknownSensorTypeError,
} from "./errors.js";
export type { MonitoringSystemOptions } from "./monitoring-system.js";
export { MonitoringSystem } from "./monitoring-system.js";
