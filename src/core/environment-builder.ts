/**
 * Environment builder
 *
 * Turns a provider's subnet declarations into, per environment, the
 * ordered zone list and a zone -> subnet lookup. Zone order is the
 * declared order; it drives interface lookups and hostname distribution.
 */

import type { SubnetDeclaration, ZonePair } from '../schemas/providers.schema';
import type { Environment, EnvironmentIndex } from '../types/cloud';
import { ok, err, all, type Result } from '../types/result';
import { DiagnosticCode, error, type Diagnostic } from './diagnostics';

function isZonePair(declaration: SubnetDeclaration): declaration is ZonePair {
  const keys = Object.keys(declaration);
  return keys.length === 2 && keys.includes('zone') && keys.includes('subnet');
}

/**
 * Read a declaration as a zone/subnet pair.
 * Legacy mappings must hold exactly one key.
 */
export function toZonePair(declaration: SubnetDeclaration): Result<ZonePair, string> {
  if (isZonePair(declaration)) {
    return ok({ zone: declaration.zone, subnet: declaration.subnet });
  }

  const entries = Object.entries(declaration);
  if (entries.length !== 1) {
    return err(`expected a single "<zone>: <subnet>" entry, got ${entries.length} keys (${Object.keys(declaration).join(', ') || 'none'})`);
  }

  const [zone, subnet] = entries[0];
  return ok({ zone, subnet });
}

export function buildEnvironment(
  name: string,
  declarations: readonly SubnetDeclaration[]
): Result<Environment, string> {
  if (declarations.length === 0) {
    return err('no subnets are declared');
  }

  const pairs = all(declarations.map(toZonePair));
  if (!pairs.success) {
    return pairs;
  }

  const zones: string[] = [];
  const subnets: Record<string, string> = {};

  for (const { zone, subnet } of pairs.data) {
    if (zone in subnets) {
      return err(`zone "${zone}" is declared more than once`);
    }
    zones.push(zone);
    subnets[zone] = subnet;
  }

  return ok({ name, zones, subnets });
}

/**
 * Build every environment of a provider.
 * A single malformed declaration, or an environment without zones, fails the whole provider.
 */
export function buildEnvironments(
  provider: string,
  subnets: Readonly<Record<string, readonly SubnetDeclaration[]>>
): Result<EnvironmentIndex, Diagnostic> {
  const environments: EnvironmentIndex = {};

  for (const name of Object.keys(subnets).sort()) {
    const result = buildEnvironment(name, subnets[name]);
    if (!result.success) {
      return err(error(
        DiagnosticCode.MALFORMED_SUBNET,
        `Provider "${provider}" has a malformed subnet declaration in environment "${name}": ${result.error}`,
        { provider, environment: name }
      ));
    }
    environments[name] = result.data;
  }

  return ok(environments);
}
