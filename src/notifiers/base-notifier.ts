import type { Alert } from "../alerts/alert.js";
import { logger } from "../config/logger.js";
import type { DeliveryResult, DeliverySink, Notifier, OutboundMessage } from "./types.js";

/** Default sink: the message goes to the log instead of a real transport. */
export function logSink(message: OutboundMessage): void {
  logger.info(`Notification dispatched via ${message.channel}`, { message });
}

/**
 * Render-then-deliver skeleton shared by all channels. Subclasses only
 * build their channel message; sink errors are turned into a failed result.
 */
export abstract class BaseNotifier<M extends OutboundMessage> implements Notifier {
  abstract readonly channel: M["channel"];
  abstract readonly name: string;

  private readonly sink: DeliverySink<M>;

  protected constructor(sink?: DeliverySink<M>) {
    this.sink = sink ?? logSink;
  }

  send(alert: Alert): DeliveryResult {
    try {
      this.sink(this.render(alert));
      return { notifier: this.name, channel: this.channel, status: "delivered" };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Notification via ${this.name} failed`, { alertId: alert.id, sensorId: alert.sensorId, reason });
      return { notifier: this.name, channel: this.channel, status: "failed", reason };
    }
  }

  protected abstract render(alert: Alert): M;
}
