import type { Alert } from "../alerts/alert.js";
import { InvalidConfigurationError } from "../monitoring/errors.js";
import { BaseNotifier } from "./base-notifier.js";
import type { DeliverySink, WebhookMessage } from "./types.js";

export function isValidWebhookUrl(url: string): boolean {
  if (!URL.canParse(url)) return false;
  const { protocol } = new URL(url);
  return protocol === "http:" || protocol === "https:";
}

export interface WebhookNotifierOptions {
  url: string;
  sink?: DeliverySink<WebhookMessage>;
}

export class WebhookNotifier extends BaseNotifier<WebhookMessage> {
  readonly channel = "webhook" as const;
  readonly name: string;
  readonly url: string;

  constructor(opts: WebhookNotifierOptions) {
    super(opts.sink);
    if (!isValidWebhookUrl(opts.url)) {
      throw new InvalidConfigurationError("webhook notifier", [`"${opts.url}" is not an http(s) URL`]);
    }
    this.url = opts.url;
    this.name = `webhook:${this.url}`;
  }

  protected render(alert: Alert): WebhookMessage {
    return {
      channel: "webhook",
      url: this.url,
      payload: {
        type: "sensor_alert",
        alert_id: alert.id,
        sensor_id: alert.sensorId,
        level: alert.level,
        value: alert.value,
        message: alert.message,
        timestamp: new Date(alert.timestamp).toISOString(),
      },
    };
  }
}
