export type { Alert, BreachLevel } from "./alert.js";
export { alertToCsv, alertToJson, createAlert } from "./alert.js";
export type {
  AlertManagerOptions,
  CycleSummary,
  DeliveryRecord,
  NotifierTally,
  SensorOutcome,
  SensorOutcomeStatus,
} from "./alert-manager.js";
export { AlertManager } from "./alert-manager.js";
