/**
 * Schema validation for the providers pillar tree
 * Uses Zod for runtime type checking and validation
 */

import { z } from 'zod';

/**
 * Explicit subnet declaration: `{ zone: A, subnet: subnet-0a1b }`
 */
export const ZonePairSchema = z.object({
  zone: z.string().min(1, 'Zone label cannot be empty'),
  subnet: z.string().min(1, 'Subnet id cannot be empty'),
}).strict();

/**
 * Subnet declaration, either the tagged pair or the legacy
 * single-key mapping `{ A: subnet-0a1b }`.
 * Key count of the legacy form is checked by the environment builder,
 * so that a bad provider is skipped instead of failing the whole run.
 */
export const SubnetDeclarationSchema = z.union([
  ZonePairSchema,
  z.record(z.string(), z.string()),
]).describe('Availability zone and the subnet bound to it');

/**
 * Block device attached to every instance of a role
 */
export const VolumeSchema = z.object({
  size: z.number().int().positive('Volume size must be a positive number of GB'),
  device: z.string().min(1, 'Device path is required'),
  type: z.string().optional(),
  tags: z.record(z.string(), z.string()).optional(),
}).passthrough();

export const SecurityGroupsSchema = z.union([
  z.string().min(1),
  z.array(z.string().min(1)),
]).describe('Security group id or list of ids');

/**
 * A single provider (cloud account and region)
 * Identity fields are opaque and copied to the provider file as-is.
 */
export const ProviderSchema = z.object({
  id: z.string().optional(),
  key: z.string().optional(),
  keyname: z.string().optional(),
  private_key: z.string().optional(),
  provider: z.string().optional(),
  location: z.string().optional(),

  subnets: z.record(z.string(), z.array(SubnetDeclarationSchema))
    .describe('Subnet declarations keyed by environment name'),

  sizes: z.record(z.string(), z.string()).optional()
    .describe('Instance size keyed by role (default applies to every role)'),

  images: z.record(z.string(), z.string()).optional()
    .describe('Machine image keyed by role (default applies to every role)'),

  volumes: z.record(z.string(), z.array(VolumeSchema)).optional()
    .describe('Volumes keyed by role'),

  security_groups: z.record(z.string(), SecurityGroupsSchema).optional()
    .describe('Security groups keyed by role (common is added to every role)'),

  default_servers: z.number().int().min(0).optional()
    .describe('Instance count for roles without a servers override'),
}).passthrough();

export const ProvidersSchema = z.record(
  z.string()
    .min(1, 'Provider name cannot be empty')
    .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'Provider name must be alphanumeric with hyphens or underscores'),
  ProviderSchema
);

/**
 * Type inference from schema
 */
export type ZonePair = z.infer<typeof ZonePairSchema>;
export type SubnetDeclaration = z.infer<typeof SubnetDeclarationSchema>;
export type Volume = z.infer<typeof VolumeSchema>;
export type ProviderInput = z.infer<typeof ProviderSchema>;
export type ProvidersInput = z.infer<typeof ProvidersSchema>;
