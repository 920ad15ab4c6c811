import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export type Logger = pino.Logger;

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const configured = env.LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  if (env.NODE_ENV === "test") {
    return "silent";
  }
  return env.NODE_ENV === "development" ? "debug" : "info";
}

const isDevelopment = process.env.NODE_ENV === "development";

export const logger: Logger = pino({
  name: "tierwise",
  level: resolveLogLevel(),
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    }
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(isDevelopment
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss Z",
            ignore: "pid,hostname"
          }
        }
      }
    : {
        serializers: {
          err: pino.stdSerializers.err
        }
      })
});

export function createLogger(context?: Record<string, unknown>): Logger {
  if (!context) {
    return logger;
  }

  return logger.child(context);
}
