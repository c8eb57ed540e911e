import pino from "pino";
import { z } from "zod";

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

/** Unknown or missing levels fall back to "silent" instead of failing the import. */
export function resolveLogLevel(value: string | undefined) {
  const parsed = LogLevel.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : "silent";
}

// Silent by default: the algorithms are a library and must not print on their own.
export const logger = pino({
  name: "bound-search",
  level: resolveLogLevel(process.env.SEARCH_LOG_LEVEL),
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
});
