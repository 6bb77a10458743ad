/**
 * Configuration loading: JSON file plus environment overrides.
 */

import * as fs from 'fs';
import { SyncConfig } from '../domain/config';
import { SyncError, configError } from '../domain/errors';
import { logger } from '../logger';
import { validateConfig } from './validator';

/** Environment variables that override file settings. */
export const ENV_OVERRIDES = {
  EDGE_SYNC_CACHE_PATH: 'cachePath',
  EDGE_SYNC_INTERVAL_MS: 'intervalMs',
  PORT: 'statusPort',
} as const;

const NUMERIC_OVERRIDES = new Set<string>(['intervalMs', 'statusPort']);

/** Return a copy of `raw` with environment overrides applied. */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Record<string, string | undefined> = process.env,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };
  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value === undefined || value === '') continue;
    result[key] = NUMERIC_OVERRIDES.has(key) ? Number(value) : value;
  }
  return result;
}

/**
 * Read, override and validate a JSON configuration file. Throws a SyncError
 * carrying the first CONFIG.INVALID error when the file cannot be used.
 */
export function loadConfigFile(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): Readonly<SyncConfig> {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new SyncError(configError(`Cannot read configuration file ${filePath}: ${err instanceof Error ? err.message : String(err)}`));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SyncError(configError(`Configuration file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`));
  }
  if (!isRecord(raw)) {
    throw new SyncError(configError(`Configuration file ${filePath} must contain a JSON object`));
  }

  const result = validateConfig(applyEnvOverrides(raw, env));
  for (const warning of result.warnings) {
    logger.warn('Configuration warning', { path: filePath, warning });
  }
  if (!result.valid || !result.config) {
    for (const error of result.errors) {
      logger.error('Configuration error', { path: filePath, field: error.details?.field, message: error.message });
    }
    throw new SyncError(result.errors[0] ?? configError(`Configuration file ${filePath} is invalid`));
  }
  return result.config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
