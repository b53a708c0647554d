/**
 * Configuration utilities
 * Reads pillar YAML files and looks up the three input trees
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ok, err, type Result } from '../types/result';
import { ConfigError, ErrorCode } from './errors';
import { DEFAULT_PILLAR_FILE, DEFAULT_PILLAR_KEYS, PILLAR_KEY_DELIMITER } from '../constants';

export type PillarData = Record<string, unknown>;

/**
 * Colon-separated pillar keys of the three trees
 */
export interface PillarKeys {
  providers: string;
  servers: string;
  defaults: string;
}

/**
 * Input trees as found in the pillar, not yet validated
 */
export interface RawCloudInputs {
  providers: unknown;
  servers: unknown;
  defaults: unknown;
}

export interface LoadOptions {
  pillar?: string[];
  keys?: Partial<PillarKeys>;
}

function isPlainObject(value: unknown): value is PillarData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge pillar data; later files win, lists are replaced
 */
export function mergePillars(base: PillarData, overlay: PillarData): PillarData {
  const merged: PillarData = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value)
      ? mergePillars(current, value)
      : value;
  }
  return merged;
}

/**
 * Look up a nested value by colon-separated key, like `pillar.get cloud:servers`
 */
export function pillarGet(data: PillarData, key: string, delimiter: string = PILLAR_KEY_DELIMITER): unknown {
  let current: unknown = data;
  for (const segment of key.split(delimiter)) {
    if (!isPlainObject(current) || !(segment in current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Read and merge pillar files in order
 */
export function loadPillar(paths: readonly string[]): Result<PillarData, ConfigError> {
  let pillar: PillarData = {};

  for (const path of paths) {
    const fullPath = resolve(path);
    if (!existsSync(fullPath)) {
      return err(new ConfigError(
        `Pillar file not found: ${fullPath}`,
        ErrorCode.PILLAR_NOT_FOUND,
        'Pass the pillar file with --pillar <file>'
      ));
    }

    let data: unknown;
    try {
      data = parseYaml(readFileSync(fullPath, 'utf-8'));
    } catch (error) {
      return err(new ConfigError(
        `Error reading ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.PILLAR_INVALID
      ));
    }

    // An empty file parses to null
    if (data === null || data === undefined) {
      continue;
    }
    if (!isPlainObject(data)) {
      return err(new ConfigError(`${fullPath} must contain a mapping at the top level`, ErrorCode.PILLAR_INVALID));
    }
    pillar = mergePillars(pillar, data);
  }

  return ok(pillar);
}

/**
 * Load the providers, servers and defaults trees from the pillar.
 * A missing defaults tree is allowed, the other two are required.
 */
export function loadCloudInputs(options: LoadOptions = {}): Result<RawCloudInputs, ConfigError> {
  const keys: PillarKeys = { ...DEFAULT_PILLAR_KEYS, ...options.keys };
  const pillar = loadPillar(options.pillar?.length ? options.pillar : [DEFAULT_PILLAR_FILE]);
  if (!pillar.success) {
    return pillar;
  }

  const providers = pillarGet(pillar.data, keys.providers);
  const servers = pillarGet(pillar.data, keys.servers);

  for (const [tree, value] of [['providers', providers], ['servers', servers]] as const) {
    if (value === undefined) {
      return err(new ConfigError(
        `Pillar key "${keys[tree]}" not found`,
        ErrorCode.PILLAR_KEY_NOT_FOUND,
        `Set the ${tree} key with --${tree}-key`
      ));
    }
  }

  return ok({
    providers,
    servers,
    defaults: pillarGet(pillar.data, keys.defaults) ?? {},
  });
}
