import type { Alert } from "../alerts/alert.js";
import { config } from "../config/index.js";
import { InvalidConfigurationError } from "../monitoring/errors.js";
import { BaseNotifier } from "./base-notifier.js";
import type { DeliverySink, EmailMessage } from "./types.js";

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export function isValidEmail(address: string): boolean {
  return EMAIL_PATTERN.test(address);
}

export interface EmailNotifierOptions {
  to: string;
  from?: string;
  /** SMTP relay label recorded on each message. */
  server?: string;
  sink?: DeliverySink<EmailMessage>;
}

export class EmailNotifier extends BaseNotifier<EmailMessage> {
  readonly channel = "email" as const;
  readonly name: string;
  readonly to: string;
  readonly from: string;
  readonly server: string;

  constructor(opts: EmailNotifierOptions) {
    super(opts.sink);
    const from = opts.from ?? config.notifications.emailFrom;
    const issues: string[] = [];
    if (!isValidEmail(opts.to)) issues.push(`"${opts.to}" is not a valid email address`);
    if (!isValidEmail(from)) issues.push(`sender "${from}" is not a valid email address`);
    if (issues.length > 0) throw new InvalidConfigurationError("email notifier", issues);

    this.to = opts.to;
    this.from = from;
    this.server = opts.server ?? config.notifications.smtpServer;
    this.name = `email:${this.to}`;
  }

  protected render(alert: Alert): EmailMessage {
    return {
      channel: "email",
      to: this.to,
      from: this.from,
      server: this.server,
      subject: `[${alert.level.toUpperCase()}] Sensor ${alert.sensorId} alert`,
      body: [
        alert.message,
        "",
        `Sensor: ${alert.sensorId} (${alert.sensorKind})`,
        `Value: ${alert.value}`,
        `Time: ${new Date(alert.timestamp).toISOString()}`,
        `Alert: ${alert.id}`,
      ].join("\n"),
    };
  }
}
