import type { Alert } from "../alerts/alert.js";
import { config } from "../config/index.js";
import { InvalidConfigurationError } from "../monitoring/errors.js";
import { BaseNotifier } from "./base-notifier.js";
import type { DeliverySink, SmsMessage } from "./types.js";

export const SMS_MAX_LENGTH = 160;

/**
 * Format the last ten digits as `+1-XXX-XXX-XXXX`. Returns null when the
 * input has fewer than ten digits.
 */
export function formatPhoneNumber(raw: string): string | null {
  const digits = raw.replace(/\D/g, "");
  if (digits.length < 10) return null;
  const last10 = digits.slice(-10);
  return `+1-${last10.slice(0, 3)}-${last10.slice(3, 6)}-${last10.slice(6)}`;
}

/** Cut `body` to at most `max` characters, counted by code point so surrogate pairs stay whole. */
export function truncateSms(body: string, max = SMS_MAX_LENGTH): string {
  const chars = Array.from(body);
  if (chars.length <= max) return body;
  return `${chars.slice(0, max - 1).join("")}…`;
}

export interface SmsNotifierOptions {
  number: string;
  provider?: string;
  sink?: DeliverySink<SmsMessage>;
}

export class SmsNotifier extends BaseNotifier<SmsMessage> {
  readonly channel = "sms" as const;
  readonly name: string;
  readonly number: string;
  readonly provider: string;

  constructor(opts: SmsNotifierOptions) {
    super(opts.sink);
    const formatted = formatPhoneNumber(opts.number);
    if (formatted === null) {
      throw new InvalidConfigurationError("sms notifier", [`"${opts.number}" has fewer than 10 digits`]);
    }
    this.number = formatted;
    this.provider = opts.provider ?? config.notifications.smsProvider;
    this.name = `sms:${this.number}`;
  }

  protected render(alert: Alert): SmsMessage {
    return {
      channel: "sms",
      to: this.number,
      provider: this.provider,
      body: truncateSms(`[${alert.level.toUpperCase()}] ${alert.message}`),
    };
  }
}
