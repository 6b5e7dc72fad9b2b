import pino, { type Logger } from "pino";
import type { LogLevel } from "../config/env.js";

export type { Logger };

export function createLogger(options: { level: LogLevel; file?: string }): Logger {
  // stdout belongs to the menu; logs go to stderr unless a file is configured.
  const destination = options.file ? pino.destination({ dest: options.file, mkdir: true, sync: true }) : pino.destination(2);
  return pino(
    {
      name: "hcloud-snapshots",
      level: options.level,
      // The bearer token must never reach a log line.
      redact: {
        paths: ["headers.authorization", 'headers["authorization"]', "headers.Authorization", 'headers["Authorization"]'],
        remove: true
      }
    },
    destination
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
