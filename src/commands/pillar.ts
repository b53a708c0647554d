/**
 * Pillar options - Shared by every command that reads the input trees
 */

import type { Command } from 'commander';
import { loadCloudInputs } from '../utils/config';
import { ValidationError } from '../utils/errors';
import { formatValidationErrors, validateCloudInputs } from '../schemas';
import type { CloudInputs } from '../types';
import { DEFAULT_PILLAR_FILE, DEFAULT_PILLAR_KEYS } from '../constants';

export interface PillarOptions {
  pillar: string[];
  providersKey: string;
  serversKey: string;
  defaultsKey: string;
}

/**
 * Register --pillar and the pillar key options on a command
 */
export function withPillarOptions(command: Command): Command {
  return command
    .option('-p, --pillar <files...>', 'Pillar YAML files, merged in order', [DEFAULT_PILLAR_FILE])
    .option('--providers-key <key>', 'Pillar key of the providers tree', DEFAULT_PILLAR_KEYS.providers)
    .option('--servers-key <key>', 'Pillar key of the servers tree', DEFAULT_PILLAR_KEYS.servers)
    .option('--defaults-key <key>', 'Pillar key of the defaults tree', DEFAULT_PILLAR_KEYS.defaults);
}

/**
 * Load and validate the input trees, throwing CLI errors on failure
 */
export function requireCloudInputs(options: PillarOptions): CloudInputs {
  const raw = loadCloudInputs({
    pillar: options.pillar,
    keys: {
      providers: options.providersKey,
      servers: options.serversKey,
      defaults: options.defaultsKey,
    },
  });
  if (!raw.success) {
    throw raw.error;
  }

  const inputs = validateCloudInputs(raw.data);
  if (!inputs.success) {
    console.error(formatValidationErrors(inputs.error));
    throw new ValidationError(
      `Pillar has ${inputs.error.length} validation issue${inputs.error.length === 1 ? '' : 's'}`,
      'Run "cloudmap validate" for a report per tree'
    );
  }

  return inputs.data;
}
