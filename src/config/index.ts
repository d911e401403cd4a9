import { z } from "zod";

/** Cycle scheduling, alert budget and sensor window settings. */
export const monitoringConfigSchema = z.object({
  /** Milliseconds between cycles when the system runs on its own timer. */
  cycleIntervalMs: z.coerce.number().int().positive().default(10_000),
  /** Opt-in cap on alerts dispatched per trailing hour. Unset means every alert is dispatched. */
  maxAlertsPerHour: z.coerce.number().int().positive().optional(),
  /** Readings kept by a vibration sensor for its RMS. */
  vibrationWindowSize: z.coerce.number().int().min(1).max(100).default(5),
});

export type MonitoringConfig = z.infer<typeof monitoringConfigSchema>;

/** Defaults for the simulated delivery channels. */
export const notificationConfigSchema = z.object({
  smtpServer: z.string().min(1).default("smtp.localhost"),
  emailFrom: z.string().min(1).default("alerts@sensor-watch.local"),
  smsProvider: z.string().min(1).default("twilio"),
});

export type NotificationConfig = z.infer<typeof notificationConfigSchema>;

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  monitoring: monitoringConfigSchema.default({
    cycleIntervalMs: 10_000,
    vibrationWindowSize: 5,
  }),

  notifications: notificationConfigSchema.default({
    smtpServer: "smtp.localhost",
    emailFrom: "alerts@sensor-watch.local",
    smsProvider: "twilio",
  }),
});

export const config = configSchema.parse({
  nodeEnv: process.env.NODE_ENV,
  logLevel: process.env.LOG_LEVEL,
  monitoring: {
    cycleIntervalMs: process.env.MONITOR_CYCLE_INTERVAL_MS,
    maxAlertsPerHour: process.env.MONITOR_MAX_ALERTS_PER_HOUR,
    vibrationWindowSize: process.env.MONITOR_VIBRATION_WINDOW,
  },
  notifications: {
    smtpServer: process.env.NOTIFY_SMTP_SERVER,
    emailFrom: process.env.NOTIFY_EMAIL_FROM,
    smsProvider: process.env.NOTIFY_SMS_PROVIDER,
  },
});

export type Config = z.infer<typeof configSchema>;
