import * as winston from "winston";
import { config } from "./index.js";

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const devFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(ts)} [${level}]: ${String(stack ?? message)}${extra}`;
});

export const logger = winston.createLogger({
  level: config.logLevel,
  defaultMeta: { service: "sensor-watch" },
  silent: config.nodeEnv === "test",
  format:
    config.nodeEnv === "production"
      ? combine(errors({ stack: true }), timestamp(), json())
      : combine(errors({ stack: true }), timestamp({ format: "YYYY-MM-DD HH:mm:ss" }), colorize(), devFormat),
  transports: [new winston.transports.Console()],
});
