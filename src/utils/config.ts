import fs from "node:fs/promises";
import path from "node:path";
import type { ImportlensConfig } from "../types.js";

export const CONFIG_FILE_NAME = "importlens.config.json";

export const DEFAULT_EXCLUDED_DIRS = [
  ".git",
  "__pycache__",
  ".venv",
  "venv",
  "node_modules",
  "build",
  "dist",
  ".tox",
  ".mypy_cache",
];

export const DEFAULT_CONFIG: ImportlensConfig = {
  strict: false,
  maxDepth: 12,
  maxFiles: 5000,
  maxReadBytes: 1_000_000,
  excludeDirs: DEFAULT_EXCLUDED_DIRS,
};

export interface ConfigOverrides {
  strict?: boolean;
  maxDepth?: number;
  maxFiles?: number;
}

/**
 * Reads `importlens.config.json` from `cwd`, or the file at `configPath`.
 * A missing or unreadable file yields the defaults.
 */
export async function loadConfig(cwd: string, configPath?: string): Promise<ImportlensConfig> {
  const file = configPath ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILE_NAME);
  const text = await fs.readFile(file, "utf8").catch(() => "");
  if (!text) return cloneDefaults();

  try {
    const parsed: unknown = JSON.parse(text);
    return normalizeConfig(parsed);
  } catch {
    return cloneDefaults();
  }
}

export function normalizeConfig(input: unknown): ImportlensConfig {
  if (!isRecord(input)) {
    return cloneDefaults();
  }

  return {
    strict: typeof input.strict === "boolean" ? input.strict : DEFAULT_CONFIG.strict,
    maxDepth: positiveInt(input.maxDepth) ?? DEFAULT_CONFIG.maxDepth,
    maxFiles: positiveInt(input.maxFiles) ?? DEFAULT_CONFIG.maxFiles,
    maxReadBytes: positiveInt(input.maxReadBytes) ?? DEFAULT_CONFIG.maxReadBytes,
    excludeDirs: Array.isArray(input.excludeDirs)
      ? input.excludeDirs.filter((dir): dir is string => typeof dir === "string" && dir.length > 0)
      : [...DEFAULT_CONFIG.excludeDirs],
  };
}

export function applyOverrides(config: ImportlensConfig, overrides: ConfigOverrides): ImportlensConfig {
  return {
    ...config,
    strict: overrides.strict ?? config.strict,
    maxDepth: overrides.maxDepth ?? config.maxDepth,
    maxFiles: overrides.maxFiles ?? config.maxFiles,
  };
}

export function parseIntOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = /^\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

function cloneDefaults(): ImportlensConfig {
  return { ...DEFAULT_CONFIG, excludeDirs: [...DEFAULT_CONFIG.excludeDirs] };
}

function positiveInt(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
