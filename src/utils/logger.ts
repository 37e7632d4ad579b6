import winston from "winston";

const level = process.env.LOG_LEVEL || "info";

const consoleFormat = process.stdout.isTTY
  ? winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
        return `${timestamp} ${level}: ${message}${rest}`;
      }),
    )
  : winston.format.combine(winston.format.timestamp(), winston.format.json());

const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.splat(),
  ),
  transports: [new winston.transports.Console({ format: consoleFormat })],
  silent: process.env.NODE_ENV === "test",
});

export function setLogLevel(next: string): void {
  logger.level = next;
}

export default logger;
