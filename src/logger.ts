import pino, { type Logger } from "pino";
import type { LogLevel } from "./config.js";

export function createLogger(level: LogLevel, pretty: boolean): Logger {
  if (!pretty) {
    return pino({ level });
  }
  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
        ignore: "pid,hostname",
        singleLine: false,
      },
    },
  });
}
