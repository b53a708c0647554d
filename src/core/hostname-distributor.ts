/**
 * Hostname distributor
 *
 * Assigns hostnames 1..N round-robin across a role's zones. The zone that
 * starts the cycle is drawn from a generator seeded with the hostname
 * template, so regenerating with the same inputs never moves a host, while
 * different roles start in different zones.
 */

import seedrandom from 'seedrandom';
import type { AttributeBag, ProfileHostMap } from '../types/cloud';
import { ok, err, type Result } from '../types/result';

export const ORDINAL_PLACEHOLDER = '%02d';

/**
 * Profile built for one zone
 */
export interface ZoneAssignment {
  zone: string;
  profile: string;
}

export function hostnameTemplate(role: string, environment: string, suffix: string, domain: string): string {
  return `${role}${ORDINAL_PLACEHOLDER}.${environment}.${suffix}.${domain}`;
}

function countPlaceholders(template: string): number {
  return template.split(ORDINAL_PLACEHOLDER).length - 1;
}

/**
 * Zero-pad to two digits; ordinals of 100 and above print in full
 */
export function formatHostname(template: string, ordinal: number): string {
  return template.replace(ORDINAL_PLACEHOLDER, String(ordinal).padStart(2, '0'));
}

/**
 * Move one seeded, pseudo-randomly chosen item to the front
 */
export function rotateZones<T>(items: readonly T[], seed: string): T[] {
  if (items.length === 0) {
    return [];
  }

  const random = seedrandom(seed);
  const index = Math.floor(random() * items.length);
  return [items[index], ...items.slice(0, index), ...items.slice(index + 1)];
}

export function distributeHostnames(
  assignments: readonly ZoneAssignment[],
  count: number,
  template: string,
  hostDefaults: AttributeBag = {}
): Result<ProfileHostMap, string> {
  if (countPlaceholders(template) !== 1) {
    return err(`hostname template "${template}" must contain exactly one ${ORDINAL_PLACEHOLDER} placeholder`);
  }

  const hosts: ProfileHostMap = {};
  const cycle = rotateZones(assignments, template);
  if (cycle.length === 0) {
    return ok(hosts);
  }

  for (let ordinal = 1; ordinal <= count; ordinal++) {
    const { profile } = cycle[(ordinal - 1) % cycle.length];
    hosts[profile] ??= {};
    hosts[profile][formatHostname(template, ordinal)] = structuredClone(hostDefaults);
  }

  return ok(hosts);
}
