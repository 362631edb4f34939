import type { AreaStorage } from "./types/index.js";
import type { AppConfig } from "./config.js";
import { AreaRepository } from "./area-store/area-repository.js";
import { AreaAnalyzer } from "./analysis/area-analyzer.js";
import { FileAreaStorage } from "./storage/file-area-storage.js";
import { createLogger, type Logger } from "./logger.js";

export interface AreaContext {
  config: AppConfig;
  logger: Logger;
  repository: AreaRepository;
  analyzer: AreaAnalyzer;
}

export interface AreaContextOverrides {
  storage?: AreaStorage;
  logger?: Logger;
}

/**
 * Wires the process-scoped services. Build it once at startup and pass it to
 * whatever transport sits on top; areas load lazily on first use and there
 * is no teardown.
 */
export function createAreaContext(
  config: AppConfig,
  overrides: AreaContextOverrides = {},
): AreaContext {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const storage = overrides.storage ?? new FileAreaStorage(config.areasFile);
  const repository = new AreaRepository({ storage, logger });
  const analyzer = new AreaAnalyzer(repository);
  return { config, logger, repository, analyzer };
}
