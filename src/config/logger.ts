import winston from "winston";
import { config } from "./index.js";

const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(timestamp)} ${level} ${String(message)}${rest}`;
  }),
);

const prodFormat = winston.format.combine(winston.format.timestamp(), winston.format.json());

/**
 * Process-wide logger. The Console transport writes synchronously, so a
 * message logged right before `process.exit` is not lost.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  format: config.nodeEnv === "production" ? prodFormat : devFormat,
  defaultMeta: { service: "node-registrar" },
  transports: [new winston.transports.Console()],
  silent: config.nodeEnv === "test",
});
