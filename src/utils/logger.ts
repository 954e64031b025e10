import winston from "winston";
import { config } from "../config";

const isProduction = config.nodeEnv === "production";

const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp(),
    winston.format.splat(),
    isProduction
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  transports: [new winston.transports.Console()],
  silent: process.env.VITEST === "true",
});

export default logger;
