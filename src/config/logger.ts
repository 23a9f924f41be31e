import winston from "winston";

const level = process.env.LOG_LEVEL || "info";

/**
 * Process-wide structured logger. JSON lines on stdout; the Console
 * transport writes synchronously, so fatal handlers can log then exit.
 */
export const logger = winston.createLogger({
  level,
  defaultMeta: { service: "promptplay-server" },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: [
    new winston.transports.Console({
      silent: process.env.NODE_ENV === "test" && !process.env.LOG_IN_TESTS,
    }),
  ],
});
