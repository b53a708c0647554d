/**
 * Schema validation for the servers pillar tree
 * Uses Zod for runtime type checking and validation
 */

import { z } from 'zod';
import { SecurityGroupsSchema, VolumeSchema } from './providers.schema';

const NAME_REGEX = /^[a-z0-9][a-z0-9_-]*$/i;

/**
 * Per-AZ interface override.
 * A plain string is read by shape (a hyphen means an interface id);
 * the object forms name the kind explicitly.
 */
export const InterfaceOverrideSchema = z.union([
  z.string().min(1),
  z.object({ interface_id: z.string().min(1) }).strict(),
  z.object({ private_ip: z.string().ip({ version: 'v4' }) }).strict(),
]);

/**
 * Extra network interface: an environment name, or a single-key
 * mapping of environment name to per-AZ overrides
 */
export const InterfaceRefSchema = z.union([
  z.string().min(1),
  z.record(z.string(), z.record(z.string(), InterfaceOverrideSchema)),
]);

/**
 * Per-instance overrides for a role in one environment
 */
export const RoleOverrideSchema = z.object({
  servers: z.number()
    .int()
    .min(0)
    .optional()
    .describe('Instance count (overrides default_servers)'),

  size: z.string().min(1).optional(),
  image: z.string().min(1).optional(),
  security_groups: SecurityGroupsSchema.optional(),
  volumes: z.array(VolumeSchema).optional(),

  interfaces: z.array(InterfaceRefSchema)
    .min(1, 'At least one interface is required when interfaces is set')
    .optional()
    .describe('Network interfaces, possibly in other environments'),

  iam_profile: z.string().min(1).optional(),
}).passthrough();

/**
 * A role entry: `web` or `{ db: { servers: 1 } }`
 */
export const RoleEntrySchema = z.union([
  z.string().regex(NAME_REGEX, 'Role name must be alphanumeric with hyphens or underscores'),
  z.record(z.string().regex(NAME_REGEX), RoleOverrideSchema.nullable()),
]);

export const EnvironmentRolesSchema = z.array(RoleEntrySchema)
  .describe('Roles running in the environment');

/**
 * Complete servers tree: provider -> environment -> roles
 */
export const ServersSchema = z.record(
  z.string().min(1, 'Provider name cannot be empty'),
  z.record(
    z.string().regex(NAME_REGEX, 'Environment name must be alphanumeric with hyphens or underscores'),
    EnvironmentRolesSchema
  )
);

/**
 * Type inference from schema
 */
export type InterfaceOverride = z.infer<typeof InterfaceOverrideSchema>;
export type InterfaceRef = z.infer<typeof InterfaceRefSchema>;
export type RoleOverride = z.infer<typeof RoleOverrideSchema>;
export type RoleEntry = z.infer<typeof RoleEntrySchema>;
export type ServersInput = z.infer<typeof ServersSchema>;
