import { pino, type LoggerOptions } from "pino";

/**
 * Root logger settings from the environment. Read once, when this module
 * loads, so env files must be loaded before the first import.
 */
export function loggerOptions(env: NodeJS.ProcessEnv): LoggerOptions {
  // Pretty output for terminals; plain JSON lines for log shippers and tests
  const pretty = env.LOG_FORMAT !== "json" && !env.VITEST;
  return {
    ...(pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
          },
        }
      : {}),
    level: env.LOG_LEVEL || "info",
    redact: {
      paths: ["apiKey", "*.apiKey", "err.headers.authorization", "headers.authorization"],
      censor: "[redacted]",
    },
  };
}

export const logger = pino(loggerOptions(process.env));

export function createLogger(name: string) {
  return logger.child({ name });
}
