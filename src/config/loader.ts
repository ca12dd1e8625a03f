import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema, locatorSetSchema } from '../schema/index.js';
import type { FileConfig, LocatorSet } from '../schema/index.js';

const DEFAULT_LOCATORS_URL = new URL('../../config/locators.yaml', import.meta.url);

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.portalsync.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');
  return fileConfigSchema.parse(parseDocument(configPath, raw) ?? {});
}

/** Like `loadConfigFile`, but a missing file yields an empty config. */
export async function loadOptionalConfigFile(configPath: string): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }
}

/** Load the shipped locator chains from `config/locators.yaml`. */
export async function loadDefaultLocators(
  source: URL | string = DEFAULT_LOCATORS_URL,
): Promise<LocatorSet> {
  const raw = await readFile(source, 'utf-8');
  return locatorSetSchema.parse(parseYaml(raw));
}

// ── Helpers ─────────────────────────────────────────────────

function parseDocument(configPath: string, raw: string): unknown {
  return configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
