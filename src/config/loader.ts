import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { MediaSelectConfigSchema, type MediaSelectConfig } from "./schema";

export const CONFIG_ENV_VAR = "MEDIA_SELECT_CONFIG";
const DEFAULT_CONFIG_DIR = ".media-select";
const DEFAULT_CONFIG_FILE = "config.jsonc";

export interface ConfigLoadResult {
  success: boolean;
  config?: MediaSelectConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(customPath);
  }
  const envPath = process.env[CONFIG_ENV_VAR];
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.join(os.homedir(), DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
}

function withExpandedPath(section: unknown, key: string): unknown {
  if (!isRecord(section)) {
    return section;
  }
  const value = section[key];
  if (typeof value !== "string") {
    return section;
  }
  return { ...section, [key]: expandHomePath(value) };
}

export function applyConfigDefaults(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };

  if (Object.hasOwn(obj, "gallery")) {
    obj.gallery = withExpandedPath(obj.gallery, "dir");
  }
  if (Object.hasOwn(obj, "storage")) {
    obj.storage = withExpandedPath(obj.storage, "folderPath");
  }

  if (!Object.hasOwn(obj, "logging")) {
    obj.logging = { level: "info" };
  } else if (isRecord(obj.logging) && !Object.hasOwn(obj.logging, "level")) {
    obj.logging = { ...obj.logging, level: "info" };
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const configDir = path.dirname(resolvedPath);
  const envPath = path.join(configDir, ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false, quiet: true });
  if (result.error) {
    throw result.error;
  }
}

function parseConfig(raw: unknown, resolvedPath: string): ConfigLoadResult {
  const result = MediaSelectConfigSchema.safeParse(applyConfigDefaults(replaceEnvVars(raw)));
  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    return { success: false, errors, path: resolvedPath };
  }
  return { success: true, config: result.data, path: resolvedPath };
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const raw = fs.readFileSync(resolvedPath, "utf-8");
    return parseConfig(parseJsonc(raw), resolvedPath);
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}

/**
 * Like {@link loadConfig}, but an absent default config file is not an
 * error: the built-in defaults apply instead. A path given explicitly, or
 * through the environment, must exist.
 */
export function loadConfigOrDefaults(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  const explicit = Boolean(configPath || process.env[CONFIG_ENV_VAR]);
  if (!explicit && !fs.existsSync(resolvedPath)) {
    return parseConfig({}, resolvedPath);
  }
  return loadConfig(configPath);
}
