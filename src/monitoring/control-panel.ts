import type { CycleSummary } from "../alerts/alert-manager.js";
import type { MonitoringSystem } from "./monitoring-system.js";

export const CONTROL_PANEL_COMMANDS = [
  { key: "status", description: "Show system status" },
  { key: "report", description: "Generate report" },
  { key: "clear-history", description: "Clear alert history" },
  { key: "exit", description: "Exit" },
] as const;

const RULE = "=".repeat(50);

/** Read-only operator view over a monitoring system. */
export class ControlPanel {
  constructor(private readonly system: MonitoringSystem) {}

  getStatusSummary(): CycleSummary | null {
    return this.system.getLastSummary();
  }

  commands(): ReadonlyArray<{ key: string; description: string }> {
    return CONTROL_PANEL_COMMANDS;
  }

  renderDashboard(): string {
    const summary = this.system.getLastSummary();
    return [
      RULE,
      `  CONTROL PANEL - ${this.system.name}`,
      `  Version: ${this.system.version}`,
      RULE,
      this.system.getOverallStatus(),
      RULE,
      summary ? describeCycle(summary) : "No cycle has run yet",
    ].join("\n");
  }
}

function describeCycle(summary: CycleSummary): string {
  const failedSensors = summary.sensors.filter((s) => s.status === "failed").length;
  const failedDeliveries = summary.deliveries.filter((d) => d.status === "failed").length;
  return (
    `Last cycle #${summary.cycle}: ${summary.alertsRaised} alert(s), ${summary.suppressed} suppressed, ` +
    `${failedSensors} sensor failure(s), ${failedDeliveries} failed deliver${failedDeliveries === 1 ? "y" : "ies"}`
  );
}
