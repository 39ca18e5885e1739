/**
 * Shared pino logger. Components take a child with a `component` binding.
 */
import pino, { type Logger } from "pino";
import { z } from "zod";

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export function createLogger(level: LogLevel = "info"): Logger {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
    base: { service: "eid-ingest" },
  });
}

const envLevel = LogLevelSchema.safeParse(process.env.LOG_LEVEL);

export const logger = createLogger(envLevel.success ? envLevel.data : "info");

export type { Logger };
