import type { Alert } from "../alerts/alert.js";

export type NotificationChannel = "email" | "webhook" | "sms";

export type DeliveryStatus = "delivered" | "failed";

export interface DeliveryResult {
  /** Name of the notifier that attempted delivery. */
  notifier: string;
  channel: NotificationChannel;
  status: DeliveryStatus;
  reason?: string;
}

export interface EmailMessage {
  channel: "email";
  to: string;
  from: string;
  server: string;
  subject: string;
  body: string;
}

export interface WebhookMessage {
  channel: "webhook";
  url: string;
  payload: {
    type: "sensor_alert";
    alert_id: string;
    sensor_id: string;
    level: string;
    value: number;
    message: string;
    timestamp: string;
  };
}

export interface SmsMessage {
  channel: "sms";
  to: string;
  provider: string;
  body: string;
}

export type OutboundMessage = EmailMessage | WebhookMessage | SmsMessage;

/**
 * Where a notifier hands its rendered message. Throwing marks the
 * delivery as failed.
 */
export type DeliverySink<M extends OutboundMessage = OutboundMessage> = (message: M) => void;

export interface Notifier {
  readonly name: string;
  readonly channel: NotificationChannel;

  /** Attempt delivery once. Never throws; failures come back as `status: "failed"`. */
  send(alert: Alert): DeliveryResult;
}
