/**
 * Output assembler
 *
 * Entry point of the expansion core. Walks every (provider, environment,
 * role) of the servers tree in a stable order and collects the provider,
 * profile and map trees together with the diagnostics of every stage.
 */

import type { ProviderInput, ProvidersInput } from '../schemas/providers.schema';
import type { RoleEntry, RoleOverride, ServersInput } from '../schemas/servers.schema';
import type { CloudDefaultsInput, ProviderDefaults } from '../schemas/defaults.schema';
import type { CloudConfig, EnvironmentIndex, ProviderConfig } from '../types/cloud';
import { ok, err, type Result } from '../types/result';
import { DiagnosticCode, error, warning, withScope, type Diagnostic } from './diagnostics';
import { buildEnvironments } from './environment-builder';
import { distributeHostnames, hostnameTemplate } from './hostname-distributor';
import { instanceCount, synthesizeProfiles } from './profile-synthesizer';
import { resolveRole } from './role-resolver';

export const DEFAULT_DOMAIN = 'example.com';

/**
 * Provider fields consumed while expanding; never written to provider files
 */
export const CONSUMED_PROVIDER_FIELDS = [
  'subnets',
  'sizes',
  'images',
  'volumes',
  'security_groups',
  'default_servers',
] as const;

interface RoleSelection {
  name: string;
  override: RoleOverride | null;
}

/**
 * Provider defaults overlaid with the declared provider, consumed fields removed
 */
export function buildProviderConfig(provider: ProviderInput, defaults?: ProviderDefaults): ProviderConfig {
  const config: ProviderConfig = { ...structuredClone(defaults ?? {}), ...structuredClone(provider) };
  for (const field of CONSUMED_PROVIDER_FIELDS) {
    delete config[field];
  }
  return config;
}

export function defaultServersFor(provider: ProviderInput, defaults?: ProviderDefaults): number | undefined {
  return provider.default_servers ?? defaults?.default_servers;
}

function selectRole(entry: RoleEntry): Result<RoleSelection, string> {
  if (typeof entry === 'string') {
    return ok({ name: entry, override: null });
  }

  const entries = Object.entries(entry);
  if (entries.length !== 1) {
    return err(`expected a role name or a single "<role>: { ... }" entry, got ${entries.length} keys`);
  }

  const [name, override] = entries[0];
  return ok({ name, override });
}

function sortedKeys(tree: object): string[] {
  return Object.keys(tree).sort();
}

class Assembly {
  readonly result: CloudConfig = { providers: {}, profiles: {}, maps: {}, diagnostics: [] };
  private readonly environments: Record<string, EnvironmentIndex> = {};

  constructor(
    private readonly providers: ProvidersInput,
    private readonly servers: ServersInput,
    private readonly defaults: CloudDefaultsInput
  ) {}

  run(): CloudConfig {
    for (const name of sortedKeys(this.providers)) {
      this.addProvider(name, this.providers[name]);
    }

    for (const provider of sortedKeys(this.servers)) {
      this.expandProvider(provider);
    }

    return this.result;
  }

  private report(diagnostic: Diagnostic): void {
    this.result.diagnostics.push(diagnostic);
  }

  private addProvider(name: string, provider: ProviderInput): void {
    const environments = buildEnvironments(name, provider.subnets ?? {});
    if (!environments.success) {
      this.report(environments.error);
      return;
    }

    this.environments[name] = environments.data;
    this.result.providers[name] = buildProviderConfig(provider, this.defaults.providers);
  }

  private expandProvider(provider: string): void {
    const providerConfig = this.providers[provider];
    const environments = this.environments[provider];

    if (!providerConfig) {
      this.report(warning(
        DiagnosticCode.UNKNOWN_PROVIDER,
        `No provider with name "${provider}" in ${sortedKeys(this.providers).join(', ') || '(none)'}`,
        { provider }
      ));
      return;
    }
    // Malformed providers were already reported
    if (!environments) {
      return;
    }

    const assignments = this.servers[provider];
    for (const environment of sortedKeys(assignments)) {
      if (!environments[environment]) {
        this.report(warning(
          DiagnosticCode.UNKNOWN_ENVIRONMENT,
          `No environment with name "${environment}" in provider "${provider}" (${sortedKeys(environments).join(', ') || 'none'})`,
          { provider, environment }
        ));
        continue;
      }

      for (const entry of assignments[environment]) {
        this.expandRole(provider, providerConfig, environments, environment, entry);
      }
    }
  }

  private expandRole(
    provider: string,
    providerConfig: ProviderInput,
    environments: EnvironmentIndex,
    environment: string,
    entry: RoleEntry
  ): void {
    const scope = { provider, environment };

    const selection = selectRole(entry);
    if (!selection.success) {
      this.report(error(DiagnosticCode.MALFORMED_ROLE_ENTRY, `Malformed role entry: ${selection.error}`, scope));
      return;
    }

    const { name, override } = selection.data;
    const role = resolveRole(name, override, {
      provider,
      providerConfig,
      environment,
      profileDefaults: this.defaults.profiles,
    });
    if (!role.success) {
      this.report(role.error);
      return;
    }

    const count = instanceCount(role.data, defaultServersFor(providerConfig, this.defaults.providers));
    if (count === undefined) {
      this.report(error(
        DiagnosticCode.MISSING_DEFAULT_SERVERS,
        `Role "${name}" has no servers count and provider "${provider}" has no default_servers`,
        { ...scope, role: name }
      ));
      return;
    }

    const synthesis = synthesizeProfiles(role.data, environments[environment], environments, provider);
    if (!synthesis.success) {
      this.report(withScope(synthesis.error, { ...scope, role: name }));
      return;
    }

    const profiles = this.result.profiles[environment] ?? {};
    const duplicate = synthesis.data.profiles.find(p => p.profile in profiles);
    if (duplicate) {
      this.report(error(
        DiagnosticCode.DUPLICATE_PROFILE,
        `Profile "${duplicate.profile}" is already defined, role "${name}" is listed twice`,
        { ...scope, role: name }
      ));
      return;
    }

    const settings = this.defaults.hostnames ?? {};
    const suffix = settings.suffix === 'location' ? (providerConfig.location ?? provider) : provider;
    const template = hostnameTemplate(name, environment, suffix, settings.domain ?? DEFAULT_DOMAIN);

    const hosts = distributeHostnames(synthesis.data.profiles, count, template, this.defaults.mappings ?? {});
    if (!hosts.success) {
      this.report(error(DiagnosticCode.MALFORMED_ROLE_ENTRY, hosts.error, { ...scope, role: name }));
      return;
    }

    // Hostnames are unique per map file, across providers
    const map = this.result.maps[environment] ?? {};
    const taken = new Set(Object.values(map).flatMap(existing => Object.keys(existing)));
    const collisions = Object.values(hosts.data).flatMap(h => Object.keys(h)).filter(host => taken.has(host));
    if (collisions.length > 0) {
      this.report(error(
        DiagnosticCode.DUPLICATE_HOSTNAME,
        `Role "${name}" would reuse hostnames already in environment "${environment}": ${[...collisions].sort().join(', ')}`,
        { ...scope, role: name },
        { hostnames: collisions }
      ));
      return;
    }

    for (const { profile, body } of synthesis.data.profiles) {
      profiles[profile] = body;
    }
    this.result.profiles[environment] = profiles;
    for (const diagnostic of synthesis.data.diagnostics) {
      this.report(diagnostic);
    }
    this.result.maps[environment] = Object.assign(map, hosts.data);
  }
}

/**
 * Expand providers, servers and defaults into provider, profile and map trees.
 * Never throws: every failure is returned as a diagnostic.
 */
export function consumeMap(
  providers: ProvidersInput,
  servers: ServersInput,
  defaults: CloudDefaultsInput = {}
): CloudConfig {
  try {
    return new Assembly(providers, servers, defaults).run();
  } catch (cause) {
    return {
      providers: {},
      profiles: {},
      maps: {},
      diagnostics: [error(
        DiagnosticCode.INTERNAL,
        `Expansion failed: ${cause instanceof Error ? cause.message : String(cause)}`,
        {},
        cause
      )],
    };
  }
}

export interface ConfigSummary {
  providers: number;
  environments: number;
  profiles: number;
  hosts: number;
  warnings: number;
  errors: number;
}

export function summarizeConfig(config: CloudConfig): ConfigSummary {
  const profileSets = Object.values(config.profiles);
  const hostMaps = Object.values(config.maps).flatMap(map => Object.values(map));

  return {
    providers: Object.keys(config.providers).length,
    environments: new Set([...Object.keys(config.profiles), ...Object.keys(config.maps)]).size,
    profiles: profileSets.reduce((total, set) => total + Object.keys(set).length, 0),
    hosts: hostMaps.reduce((total, hosts) => total + Object.keys(hosts).length, 0),
    warnings: config.diagnostics.filter(d => d.severity === 'warning').length,
    errors: config.diagnostics.filter(d => d.severity === 'error').length,
  };
}
