/**
 * Network interface synthesis
 *
 * Without an `interfaces` list an instance gets one interface in its own
 * environment's subnet for the zone. With one, every entry becomes an
 * interface in the named environment's subnet for the same zone label,
 * optionally pinned to an existing interface or a static address.
 */

import type { InterfaceOverride, InterfaceRef } from '../schemas/servers.schema';
import type { EnvironmentIndex, NetworkInterface } from '../types/cloud';
import { ok, err, type Result } from '../types/result';
import { DiagnosticCode, error, warning, type Diagnostic, type DiagnosticScope } from './diagnostics';
import type { ResolvedRole } from './role-resolver';

const IPV4_REGEX = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;

type InterfacePin = Pick<NetworkInterface, 'NetworkInterfaceId' | 'PrivateIpAddress'>;

export interface ParsedInterfaceRef {
  environment: string;
  overrides?: Record<string, InterfaceOverride>;
}

export interface InterfaceSynthesis {
  interfaces: NetworkInterface[];
  diagnostics: Diagnostic[];
}

export function createNetworkInterface(
  index: number,
  subnetId: string,
  securityGroups: readonly string[],
  pin: InterfacePin = {}
): NetworkInterface {
  return {
    DeviceIndex: index,
    SubnetId: subnetId,
    SecurityGroupId: [...securityGroups],
    ...pin,
  };
}

export function parseInterfaceRef(ref: InterfaceRef): Result<ParsedInterfaceRef, string> {
  if (typeof ref === 'string') {
    return ok({ environment: ref });
  }

  const entries = Object.entries(ref);
  if (entries.length !== 1) {
    return err(`expected a single "<environment>: { <zone>: <override> }" entry, got ${entries.length} keys`);
  }

  const [environment, overrides] = entries[0];
  return ok({ environment, overrides });
}

/**
 * Turn a per-zone override into an interface id or a private address.
 * Plain strings containing a hyphen are interface ids (eni-0a1b...).
 */
export function resolveOverride(value: InterfaceOverride): Result<InterfacePin, string> {
  if (typeof value !== 'string') {
    if ('interface_id' in value) {
      return ok({ NetworkInterfaceId: value.interface_id });
    }
    return ok({ PrivateIpAddress: value.private_ip });
  }

  if (value.includes('-')) {
    return ok({ NetworkInterfaceId: value });
  }
  if (IPV4_REGEX.test(value)) {
    return ok({ PrivateIpAddress: value });
  }
  return err(`"${value}" is neither an interface id nor an IPv4 address`);
}

/**
 * Build the interface list of a role for one zone
 */
export function synthesizeInterfaces(
  role: ResolvedRole,
  zone: string,
  environments: EnvironmentIndex,
  scope: DiagnosticScope = {}
): Result<InterfaceSynthesis, Diagnostic> {
  const own = environments[role.environment];
  const where: DiagnosticScope = { ...scope, environment: role.environment, role: role.name };

  if (!role.interfaces) {
    const subnet = own?.subnets[zone];
    if (subnet === undefined) {
      return err(warning(
        DiagnosticCode.MISSING_ZONE_SUBNET,
        `Environment "${role.environment}" has no subnet for zone "${zone}"`,
        where
      ));
    }
    return ok({ interfaces: [createNetworkInterface(0, subnet, role.securityGroups)], diagnostics: [] });
  }

  const interfaces: NetworkInterface[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const [index, ref] of role.interfaces.entries()) {
    const parsed = parseInterfaceRef(ref);
    if (!parsed.success) {
      return err(error(
        DiagnosticCode.MALFORMED_INTERFACE,
        `Interface ${index} of role "${role.name}" is malformed: ${parsed.error}`,
        where
      ));
    }

    const { environment, overrides } = parsed.data;
    const target = environments[environment];
    if (!target) {
      return err(warning(
        DiagnosticCode.UNKNOWN_INTERFACE_ENVIRONMENT,
        `Interface ${index} of role "${role.name}" references unknown environment "${environment}"`,
        where,
        { known: Object.keys(environments) }
      ));
    }

    const subnet = target.subnets[zone];
    if (subnet === undefined) {
      return err(warning(
        DiagnosticCode.MISSING_ZONE_SUBNET,
        `Interface ${index} of role "${role.name}" needs zone "${zone}" in environment "${environment}", which only has ${target.zones.join(', ')}`,
        where
      ));
    }

    let pin: InterfacePin = {};
    if (overrides) {
      const override = overrides[zone];
      if (override === undefined) {
        diagnostics.push(warning(
          DiagnosticCode.MISSING_ZONE_OVERRIDE,
          `Interface ${index} of role "${role.name}" has no override for zone "${zone}", using a plain interface`,
          where
        ));
      } else {
        const resolved = resolveOverride(override);
        if (!resolved.success) {
          return err(error(
            DiagnosticCode.MALFORMED_INTERFACE,
            `Interface ${index} of role "${role.name}" in zone "${zone}": ${resolved.error}`,
            where
          ));
        }
        pin = resolved.data;
      }
    }

    interfaces.push(createNetworkInterface(index, subnet, role.securityGroups, pin));
  }

  return ok({ interfaces, diagnostics });
}
