import { describe, expect, it, vi } from "vitest";
import type { Alert } from "../alerts/alert.js";
import { InvalidConfigurationError } from "../monitoring/errors.js";
import { formatPhoneNumber, SMS_MAX_LENGTH, SmsNotifier, truncateSms } from "./sms-notifier.js";

const alert: Alert = {
  id: "alert-3",
  sensorId: "HUM_001",
  sensorKind: "humidity",
  level: "critical",
  value: 95,
  message: "CRITICAL: humidity sensor HUM_001 at Warehouse breached its threshold (value=95.00)",
  timestamp: Date.UTC(2026, 0, 15, 13, 0, 0),
};

describe("formatPhoneNumber", () => {
  it("formats ten digits regardless of punctuation", () => {
    expect(formatPhoneNumber("555-123-4567")).toBe("+1-555-123-4567");
    expect(formatPhoneNumber("(555) 123 4567")).toBe("+1-555-123-4567");
  });

  it("keeps the last ten digits of a longer number", () => {
    expect(formatPhoneNumber("+1 555 123 4567")).toBe("+1-555-123-4567");
  });

  it("returns null for short numbers", () => {
    expect(formatPhoneNumber("12345")).toBeNull();
  });
});

describe("truncateSms", () => {
  it("leaves short bodies untouched", () => {
    expect(truncateSms("hello")).toBe("hello");
  });

  it("cuts long bodies to the SMS limit with an ellipsis", () => {
    const body = truncateSms("a".repeat(200));
    expect(body).toHaveLength(SMS_MAX_LENGTH);
    expect(body.endsWith("a…")).toBe(true);
  });

  it("never splits a surrogate pair at the cut", () => {
    const thermometer = "\u{1F321}";
    const body = truncateSms(`${"a".repeat(158)}${thermometer}\uFE0F rising`);
    expect(Array.from(body)).toHaveLength(SMS_MAX_LENGTH);
    expect(body).toBe(`${"a".repeat(158)}${thermometer}…`);
  });
});

describe("SmsNotifier", () => {
  it("sends a prefixed body to the formatted number", () => {
    const sink = vi.fn();
    const notifier = new SmsNotifier({ number: "555.123.4567", sink });

    expect(notifier.name).toBe("sms:+1-555-123-4567");
    expect(notifier.send(alert)).toEqual({ notifier: "sms:+1-555-123-4567", channel: "sms", status: "delivered" });
    expect(sink).toHaveBeenCalledWith({
      channel: "sms",
      to: "+1-555-123-4567",
      provider: "twilio",
      body: "[CRITICAL] CRITICAL: humidity sensor HUM_001 at Warehouse breached its threshold (value=95.00)",
    });
  });

  it("records the provider override", () => {
    const sink = vi.fn();
    new SmsNotifier({ number: "5551234567", provider: "vonage", sink }).send(alert);
    expect(sink.mock.calls[0][0].provider).toBe("vonage");
  });

  it("rejects numbers with fewer than ten digits", () => {
    expect(() => new SmsNotifier({ number: "555-1234" })).toThrow(InvalidConfigurationError);
  });
});
