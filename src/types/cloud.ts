/**
 * Type definitions for the expanded salt-cloud configuration
 *
 * Three trees come out of the core:
 * - providers: one entry per provider file (cloud.providers.d/<provider>.conf)
 * - profiles:  environment -> profile name -> instance profile
 * - maps:      environment -> profile name -> hostname -> per-host attributes
 */

import type { Diagnostic } from '../core/diagnostics';
import type { ProvidersInput } from '../schemas/providers.schema';
import type { ServersInput } from '../schemas/servers.schema';
import type { CloudDefaultsInput } from '../schemas/defaults.schema';

/**
 * Free-form attributes passed through to salt-cloud
 */
export type AttributeBag = Record<string, unknown>;

/**
 * The three input trees, as read from the pillar
 */
export interface CloudInputs {
  providers: ProvidersInput;
  servers: ServersInput;
  defaults: CloudDefaultsInput;
}

/**
 * Availability zones and subnets of one environment within a provider
 */
export interface Environment {
  /** Environment name (test, prod, ...) */
  name: string;
  /** Zone labels in declared order */
  zones: string[];
  /** Zone label -> subnet id */
  subnets: Record<string, string>;
}

/**
 * Environments of one provider, keyed by name
 */
export type EnvironmentIndex = Record<string, Environment>;

/**
 * Network interface as salt-cloud's ec2 driver expects it
 */
export interface NetworkInterface {
  DeviceIndex: number;
  SubnetId: string;
  SecurityGroupId: string[];
  NetworkInterfaceId?: string;
  PrivateIpAddress?: string;
}

/**
 * Tags set on every instance
 */
export interface InstanceTags {
  Environment: string;
  Role: string;
}

/**
 * Fully expanded, AZ-specific instance profile
 */
export interface Profile extends AttributeBag {
  provider: string;
  size: string;
  image: string;
  tag: InstanceTags;
  network_interfaces: NetworkInterface[];
}

export type ProviderConfig = AttributeBag;

/** Profile name -> profile */
export type ProfileSet = Record<string, Profile>;

/** Hostname -> per-host attributes */
export type HostMap = Record<string, AttributeBag>;

/** Profile name -> hosts */
export type ProfileHostMap = Record<string, HostMap>;

/**
 * Output of a full expansion run
 */
export interface CloudConfig {
  providers: Record<string, ProviderConfig>;
  profiles: Record<string, ProfileSet>;
  maps: Record<string, ProfileHostMap>;
  diagnostics: Diagnostic[];
}
