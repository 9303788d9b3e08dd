import pino from "pino";

import { env } from "../config/env.js";

export function resolveLogLevel(): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }

  if (env.NODE_ENV === "test") {
    return "silent";
  }

  return env.NODE_ENV === "production" ? "info" : "debug";
}

export const logger =
  env.NODE_ENV === "development"
    ? pino({
        level: resolveLogLevel(),
        transport: {
          target: "pino/file",
          options: {
            destination: 1
          }
        }
      })
    : pino({
        level: resolveLogLevel()
      });
