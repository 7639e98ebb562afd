import pino, { Logger } from "pino";

export type { Logger } from "pino";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// stdout carries plans and command output, so logs go to stderr
export const createLogger = (level: LogLevel = "warn", name = "pacwarden"): Logger =>
  pino({ name, level }, pino.destination({ dest: 2, sync: true }));

export const silentLogger = (): Logger => pino({ level: "silent" });
