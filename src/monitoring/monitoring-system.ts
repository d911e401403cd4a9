import { AlertManager, type CycleSummary } from "../alerts/alert-manager.js";
import { config } from "../config/index.js";
import { logger } from "../config/logger.js";

export interface MonitoringSystemOptions {
  version?: string;
  /** Manager to aggregate. A fresh one is created when omitted. */
  alertManager?: AlertManager;
}

/**
 * Top-level aggregate: one AlertManager plus the summary of the last cycle.
 * Can drive cycles itself on an interval via start()/stop().
 */
export class MonitoringSystem {
  readonly name: string;
  readonly version: string;
  private readonly manager: AlertManager;
  private lastSummary: CycleSummary | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(name: string, opts: MonitoringSystemOptions = {}) {
    this.name = name;
    this.version = opts.version ?? "1.0.0";
    this.manager = opts.alertManager ?? new AlertManager();
  }

  get alertManager(): AlertManager {
    return this.manager;
  }

  initialize(): void {
    logger.info(`Initializing monitoring system ${this.name} v${this.version}`, {
      sensors: this.manager.getSensors().length,
      notifiers: this.manager.getNotifiers().length,
    });
  }

  runCycle(): CycleSummary {
    this.lastSummary = this.manager.runCycle();
    return this.lastSummary;
  }

  /** Summary of the most recent cycle, or null before the first one. */
  getLastSummary(): CycleSummary | null {
    return this.lastSummary;
  }

  getOverallStatus(): string {
    return this.manager.generateReport();
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Run a cycle every intervalMs (default: configured cycle interval). No-op if already running. */
  start(intervalMs = config.monitoring.cycleIntervalMs): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.runCycle();
    }, intervalMs);
    if (this.timer.unref) this.timer.unref();
    logger.info(`Monitoring system ${this.name} started`, { intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info(`Monitoring system ${this.name} stopped`);
    }
  }
}
