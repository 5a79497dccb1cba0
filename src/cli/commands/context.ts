import pc from "picocolors";
import { loadConfigOrDefaults, type MediaSelectConfig } from "../../config";
import { configureLogger, logger } from "../../logger";

export interface CommonOptions {
  config?: string;
  prefix?: string;
  out?: string;
}

/** Loads config for a command; prints the problems and sets a failing exit code otherwise. */
export function loadCommandConfig(configPath?: string): MediaSelectConfig | null {
  const result = loadConfigOrDefaults(configPath);
  if (!result.success || !result.config) {
    console.error(pc.red(`Invalid configuration: ${result.path}`));
    for (const error of result.errors ?? []) {
      console.error(pc.red(`  - ${error}`));
    }
    process.exitCode = 1;
    return null;
  }
  configureLogger(result.config.logging?.level);
  logger.debug({ path: result.path }, "Configuration loaded");
  return result.config;
}

export function resolvePrefix(
  options: CommonOptions,
  config: MediaSelectConfig,
): string | undefined {
  return options.prefix ?? config.storage?.folderPath;
}
