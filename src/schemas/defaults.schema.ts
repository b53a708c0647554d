/**
 * Schema validation for the defaults pillar tree
 * Uses Zod for runtime type checking and validation
 */

import { z } from 'zod';

/**
 * Defaults copied into every provider file
 */
export const ProviderDefaultsSchema = z.object({
  default_servers: z.number().int().min(0).optional().describe(
    'Instance count for roles without a servers override'
  ),
  rename_on_destroy: z.boolean().optional(),
  ssh_interface: z.enum(['private_ips', 'public_ips']).optional().describe(
    'Interface salt-cloud uses to reach new instances'
  ),
  ssh_username: z.string().min(1).optional(),
}).passthrough();

/**
 * Defaults copied into every profile
 */
export const ProfileDefaultsSchema = z.object({
  del_root_vol_on_destroy: z.boolean().optional(),
  del_all_vols_on_destroy: z.boolean().optional(),
  sync_after_install: z.string().optional(),
}).passthrough();

/**
 * Hostname settings: <role>NN.<environment>.<suffix>.<domain>
 */
export const HostnameSettingsSchema = z.object({
  domain: z.string()
    .min(1)
    .regex(/^[a-z0-9.-]+$/i, 'Domain must be a valid DNS name')
    .optional()
    .describe('Domain appended to every hostname (default: example.com)'),
  suffix: z.enum(['provider', 'location']).optional().describe(
    'Use the provider name or its location as the hostname suffix (default: provider)'
  ),
}).strict();

export const CloudDefaultsSchema = z.object({
  providers: ProviderDefaultsSchema.optional(),
  profiles: ProfileDefaultsSchema.optional(),
  mappings: z.record(z.string(), z.unknown()).optional().describe(
    'Attributes copied under every hostname in the map files'
  ),
  hostnames: HostnameSettingsSchema.optional(),
});

/**
 * Type inference from schema
 */
export type ProviderDefaults = z.infer<typeof ProviderDefaultsSchema>;
export type ProfileDefaults = z.infer<typeof ProfileDefaultsSchema>;
export type CloudDefaultsInput = z.infer<typeof CloudDefaultsSchema>;
