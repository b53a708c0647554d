/**
 * Role resolver
 *
 * A role definition is built from layers, lowest precedence first:
 *
 *   1. global profile defaults (defaults.profiles)
 *   2. the provider's "default" role attributes
 *   3. the provider's attributes for the role
 *   4. the per-instance override from the servers list
 *
 * Each layer is a plain value; mergeLayers never mutates its input.
 */

import type { ProviderInput, Volume } from '../schemas/providers.schema';
import type { InterfaceRef, RoleOverride } from '../schemas/servers.schema';
import type { ProfileDefaults } from '../schemas/defaults.schema';
import type { AttributeBag } from '../types/cloud';
import { ok, err, type Result } from '../types/result';
import { DiagnosticCode, warning, type Diagnostic } from './diagnostics';

export const DEFAULT_ROLE = 'default';
export const COMMON_SECURITY_GROUP = 'common';

export type LayerSource = 'defaults' | 'provider-default' | 'provider' | 'override';

export interface RoleLayer {
  readonly source: LayerSource;
  readonly attributes: Readonly<AttributeBag>;
}

/**
 * A role after all layers are merged and validated
 */
export interface ResolvedRole {
  name: string;
  environment: string;
  size: string;
  image: string;
  /** Profile attributes (size, image, volumes, iam_profile, profile defaults...) */
  attributes: AttributeBag;
  /** Normalized security groups, common group last */
  securityGroups: string[];
  interfaces?: InterfaceRef[];
  servers?: number;
}

/**
 * Fields used while expanding that never reach a profile
 */
const WORKING_FIELDS = ['security_groups', 'servers', 'interfaces'] as const;

const REQUIRED_FIELDS = ['size', 'image', 'security_groups'] as const;

/**
 * Overlay layers in order. Later layers replace whole top-level keys.
 */
export function mergeLayers(layers: readonly RoleLayer[]): AttributeBag {
  const merged: AttributeBag = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer.attributes)) {
      if (value !== undefined) {
        merged[key] = structuredClone(value);
      }
    }
  }
  return merged;
}

/**
 * Attributes a provider declares for one role name
 */
function providerAttributes(provider: ProviderInput, role: string): AttributeBag {
  const attributes: AttributeBag = {};

  const size = provider.sizes?.[role];
  if (size !== undefined) attributes.size = size;

  const image = provider.images?.[role];
  if (image !== undefined) attributes.image = image;

  const volumes = provider.volumes?.[role];
  if (volumes !== undefined) attributes.volumes = volumes;

  const groups = provider.security_groups?.[role];
  if (groups !== undefined) attributes.security_groups = groups;

  return attributes;
}

/**
 * Build the ordered layer stack for a role
 */
export function buildRoleLayers(
  role: string,
  provider: ProviderInput,
  profileDefaults: ProfileDefaults | undefined,
  override: RoleOverride | null | undefined
): RoleLayer[] {
  const layers: RoleLayer[] = [
    { source: 'defaults', attributes: profileDefaults ?? {} },
    { source: 'provider-default', attributes: providerAttributes(provider, DEFAULT_ROLE) },
  ];

  if (role !== DEFAULT_ROLE) {
    layers.push({ source: 'provider', attributes: providerAttributes(provider, role) });
  }
  if (override) {
    layers.push({ source: 'override', attributes: override });
  }

  return layers;
}

/**
 * Normalize to a list and append the provider's common groups exactly once
 */
export function normalizeSecurityGroups(value: unknown, common: readonly string[] = []): string[] {
  let groups: string[];
  if (value === undefined || value === null) {
    groups = [];
  } else if (Array.isArray(value)) {
    groups = value.map(String);
  } else {
    groups = [String(value)];
  }

  return [...groups.filter(group => !common.includes(group)), ...common];
}

/**
 * The provider's common security group ids (usually one)
 */
export function commonSecurityGroups(provider: ProviderInput): string[] {
  const common = provider.security_groups?.[COMMON_SECURITY_GROUP];
  if (common === undefined) {
    return [];
  }
  return Array.isArray(common) ? [...common] : [common];
}

function isVolume(value: unknown): value is Volume {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tag every volume with Environment, Role and Service.
 * Tags the volume already carries take precedence; VolumeType follows the volume type.
 */
export function tagVolumes(volumes: unknown, environment: string, role: string): Volume[] {
  if (!Array.isArray(volumes)) {
    return [];
  }

  return volumes.filter(isVolume).map((volume) => {
    const tags: Record<string, string> = {
      Environment: environment,
      Role: role,
      Service: 'ebs',
      ...(volume.tags ?? {}),
    };
    if (typeof volume.type === 'string') {
      tags.VolumeType = volume.type;
    }
    return { ...volume, tags };
  });
}

function missingFields(attributes: AttributeBag, securityGroups: string[]): string[] {
  return REQUIRED_FIELDS.filter((field) => {
    if (field === 'security_groups') {
      return securityGroups.length === 0;
    }
    const value = attributes[field];
    return typeof value !== 'string' || value.length === 0;
  });
}

export interface RoleContext {
  provider: string;
  providerConfig: ProviderInput;
  environment: string;
  profileDefaults?: ProfileDefaults;
}

/**
 * Resolve a role for one provider/environment.
 * Returns an INCOMPLETE_ROLE warning when size, image or security groups are missing.
 */
export function resolveRole(
  role: string,
  override: RoleOverride | null | undefined,
  context: RoleContext
): Result<ResolvedRole, Diagnostic> {
  const { provider, providerConfig, environment, profileDefaults } = context;
  const merged = mergeLayers(buildRoleLayers(role, providerConfig, profileDefaults, override));

  const securityGroups = normalizeSecurityGroups(merged.security_groups, commonSecurityGroups(providerConfig));
  if ('volumes' in merged) {
    merged.volumes = tagVolumes(merged.volumes, environment, role);
  }

  const { size, image } = merged;
  const missing = missingFields(merged, securityGroups);
  if (missing.length > 0 || typeof size !== 'string' || typeof image !== 'string') {
    return err(warning(
      DiagnosticCode.INCOMPLETE_ROLE,
      `Role "${role}" does not have ${missing.join(', ')} defined, it only has ${Object.keys(merged).join(', ') || 'nothing'}`,
      { provider, environment, role },
      { missing, merged: { ...merged, security_groups: securityGroups } }
    ));
  }

  const resolved: ResolvedRole = {
    name: role,
    environment,
    size,
    image,
    attributes: stripWorkingFields(merged),
    securityGroups,
  };

  // Interfaces are only ever declared per instance
  if (override?.interfaces) {
    resolved.interfaces = structuredClone(override.interfaces);
  }
  if (typeof merged.servers === 'number') {
    resolved.servers = merged.servers;
  }

  return ok(resolved);
}

export function stripWorkingFields(attributes: AttributeBag): AttributeBag {
  const stripped: AttributeBag = { ...attributes };
  for (const field of WORKING_FIELDS) {
    delete stripped[field];
  }
  return stripped;
}
