import * as z from "zod";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Keyword in DEBUG that turns on debug logs for this package */
export const DEBUG_KEYWORD = "structure";

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).optional().catch(undefined),
  DEBUG: z.string().optional(),
});

export interface EngineConfig {
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = envSchema.parse(env);
  if (parsed.DEBUG?.includes(DEBUG_KEYWORD)) {
    return { logLevel: "debug" };
  }
  return { logLevel: parsed.LOG_LEVEL ?? "info" };
}
