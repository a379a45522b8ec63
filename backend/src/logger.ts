import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config";

export type { Logger };

export function createLogger(config: Pick<AppConfig, "logLevel" | "logPretty">): Logger {
  return pino({
    level: config.logLevel,
    base: { service: "careguard" },
    redact: ["password", "new_password", "token", "refresh_token", "*.password", "*.token"],
    transport: config.logPretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname"
          }
        }
      : undefined
  });
}
