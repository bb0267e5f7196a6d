/**
 * Per-scope configuration (`<scope-root>/config.json`).
 * Project settings override global ones key by key. Keys this package
 * does not read are dropped on load.
 */

import * as path from "path";
import { z } from "zod";
import { Logger, defaultLogger } from "./log";
import { readJsonFile, writeJsonFile } from "./utils";
import { toErrorMessage } from "./errors";

export const DEFAULT_REBUILD_THRESHOLD = 20;

export const IndexRebuildConfigSchema = z.object({
  /** "threshold" compacts after a save once the pending log reaches thresholdEntries */
  strategy: z.enum(["threshold", "manual"]).default("threshold"),
  thresholdEntries: z.number().int().min(1).default(DEFAULT_REBUILD_THRESHOLD),
});

export const ConfigSchema = z.object({
  memory: z
    .object({
      indexRebuild: IndexRebuildConfigSchema.default({}),
    })
    .default({}),
  sessions: z
    .object({
      /** Hours without activity before a session counts as stale */
      staleHours: z.number().positive().default(24),
    })
    .default({}),
  rebuild: z
    .object({
      /** Age after which another process's rebuild lock is taken over */
      lockStaleMinutes: z.number().positive().default(10),
    })
    .default({}),
  debug: z.boolean().default(false),
});
export type Config = z.infer<typeof ConfigSchema>;

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function configPath(scopeRoot: string): string {
  return path.join(scopeRoot, "config.json");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = out[key];
    out[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return out;
}

function readRawConfig(file: string, logger: Logger): Record<string, unknown> {
  try {
    const raw = readJsonFile(file);
    if (raw === undefined) return {};
    if (!isPlainObject(raw)) {
      logger.warn(`Ignoring ${file}: not a JSON object`);
      return {};
    }
    return raw;
  } catch (e) {
    logger.warn(`Ignoring ${file}: ${toErrorMessage(e)}`);
    return {};
  }
}

/**
 * Load the effective configuration. Unreadable or invalid files fall back
 * to defaults with a warning; configuration never blocks the store.
 */
export function loadConfig(
  globalRoot: string,
  projectRoot: string | null,
  logger: Logger = defaultLogger
): Config {
  let merged = readRawConfig(configPath(globalRoot), logger);
  if (projectRoot) {
    merged = deepMerge(merged, readRawConfig(configPath(projectRoot), logger));
  }

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    logger.warn(`Invalid configuration at ${issue?.path.join(".") || "<root>"}: ${issue?.message}; using defaults`);
    return defaultConfig();
  }
  return parsed.data;
}

/**
 * Turn debug output on or off in one scope's config file, keeping its
 * other keys. Throws when the existing file is not a JSON object.
 */
export function setDebugFlag(scopeRoot: string, enabled: boolean): void {
  const file = configPath(scopeRoot);
  const raw = readJsonFile(file) ?? {};
  if (!isPlainObject(raw)) throw new Error(`${file} is not a JSON object`);
  writeJsonFile(file, { ...raw, debug: enabled });
}
