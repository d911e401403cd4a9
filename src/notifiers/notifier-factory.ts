import { z } from "zod";
import { InvalidConfigurationError, UnknownNotifierTypeError } from "../monitoring/errors.js";
import { EmailNotifier } from "./email-notifier.js";
import { SmsNotifier } from "./sms-notifier.js";
import type { DeliverySink, NotificationChannel, OutboundMessage } from "./types.js";
import { WebhookNotifier } from "./webhook-notifier.js";

export type AnyNotifier = EmailNotifier | WebhookNotifier | SmsNotifier;

const notifierEntrySchema = z.object({
  type: z.string().min(1),
  /** Address, URL or phone number, depending on the channel. */
  target: z.string().min(1),
  from: z.string().min(1).optional(),
  server: z.string().min(1).optional(),
  provider: z.string().min(1).optional(),
});

function normalizeChannel(type: string): NotificationChannel {
  const channel = type.trim().toLowerCase();
  if (channel === "email" || channel === "webhook" || channel === "sms") return channel;
  throw new UnknownNotifierTypeError(type);
}

/**
 * Build a notifier from a `{ type, target }` config entry.
 * The optional sink receives every rendered message of the built notifier.
 */
export function createNotifier(entry: Record<string, unknown>, sink?: DeliverySink<OutboundMessage>): AnyNotifier {
  const parsed = notifierEntrySchema.safeParse(entry);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      "notifier",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const { type, target, from, server, provider } = parsed.data;

  switch (normalizeChannel(type)) {
    case "email":
      return new EmailNotifier({ to: target, from, server, sink });
    case "webhook":
      return new WebhookNotifier({ url: target, sink });
    case "sms":
      return new SmsNotifier({ number: target, provider, sink });
  }
}
