import { ConsoleTransport, LogLayer } from "loglayer";

import { loadConfig, type EngineConfig } from "@/config";

const LOGGER_PREFIX = "[STRUCTURE]";

export function createLogger(config: EngineConfig = loadConfig()): LogLayer {
  return new LogLayer({
    prefix: LOGGER_PREFIX,
    transport: new ConsoleTransport({
      logger: console,
      level: config.logLevel,
    }),
  });
}

/**
 * Package wide logger.
 *
 * Controlled via environment variables:
 * - DEBUG=structure (debug logs for this package)
 * - LOG_LEVEL=debug|info|warn|error
 */
export const logger = createLogger();
