/**
 * Profile synthesizer
 *
 * Expands one resolved role into a profile per zone of its environment.
 */

import type { Environment, EnvironmentIndex, Profile } from '../types/cloud';
import { ok, err, type Result } from '../types/result';
import type { Diagnostic } from './diagnostics';
import type { ZoneAssignment } from './hostname-distributor';
import { synthesizeInterfaces } from './network-interfaces';
import type { ResolvedRole } from './role-resolver';

export interface ZoneProfile extends ZoneAssignment {
  body: Profile;
}

export interface ProfileSynthesis {
  profiles: ZoneProfile[];
  diagnostics: Diagnostic[];
}

/**
 * <role>_<environment>_<provider><zone>, e.g. web_test_awsA
 */
export function profileName(role: string, environment: string, provider: string, zone: string): string {
  return `${role}_${environment}_${provider}${zone}`;
}

/**
 * Instances to create: the role's own count, else the provider's default
 */
export function instanceCount(role: ResolvedRole, defaultServers: number | undefined): number | undefined {
  return role.servers ?? defaultServers;
}

/**
 * Build every zone profile of a role.
 * Fails as a whole when any zone cannot get its interfaces.
 */
export function synthesizeProfiles(
  role: ResolvedRole,
  environment: Environment,
  environments: EnvironmentIndex,
  provider: string
): Result<ProfileSynthesis, Diagnostic> {
  const profiles: ZoneProfile[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const zone of environment.zones) {
    const network = synthesizeInterfaces(role, zone, environments, { provider });
    if (!network.success) {
      return err(network.error);
    }
    diagnostics.push(...network.data.diagnostics);

    const body: Profile = {
      ...structuredClone(role.attributes),
      size: role.size,
      image: role.image,
      provider,
      tag: { Environment: environment.name, Role: role.name },
      network_interfaces: network.data.interfaces,
    };

    profiles.push({
      zone,
      profile: profileName(role.name, environment.name, provider, zone),
      body,
    });
  }

  return ok({ profiles, diagnostics });
}
