/**
 * Application-wide constants
 */

import packageJson from '../package.json';

export const CLOUDMAP_VERSION = packageJson.version;

/**
 * Pillar lookup
 */
export const DEFAULT_PILLAR_FILE = 'pillar.yml';
export const PILLAR_KEY_DELIMITER = ':';
export const DEFAULT_PILLAR_KEYS = {
  providers: 'providers',
  servers: 'servers',
  defaults: 'defaults',
} as const;

/**
 * salt-cloud configuration layout (relative to the conf dir)
 */
export const DEFAULT_CONF_DIR = '/etc/salt';
export const PROVIDERS_DIR = 'cloud.providers.d';
export const PROFILES_DIR = 'cloud.profiles.d';
export const MAPS_DIR = 'cloud.maps';
export const CONF_EXTENSION = '.conf';

/**
 * Permissions of generated files; they hold provider credentials
 */
export const DEFAULT_FILE_MODE = 0o600;
export const DEFAULT_DIR_MODE = 0o700;
