export { BaseNotifier, logSink } from "./base-notifier.js";
export type { EmailNotifierOptions } from "./email-notifier.js";
export { EmailNotifier, isValidEmail } from "./email-notifier.js";
export type { AnyNotifier } from "./notifier-factory.js";
export { createNotifier } from "./notifier-factory.js";
export type { SmsNotifierOptions } from "./sms-notifier.js";
export { formatPhoneNumber, SMS_MAX_LENGTH, SmsNotifier, truncateSms } from "./sms-notifier.js";
export type {
  DeliveryResult,
  DeliverySink,
  DeliveryStatus,
  EmailMessage,
  NotificationChannel,
  Notifier,
  OutboundMessage,
  SmsMessage,
  WebhookMessage,
} from "./types.js";
export type { WebhookNotifierOptions } from "./webhook-notifier.js";
export { isValidWebhookUrl, WebhookNotifier } from "./webhook-notifier.js";
