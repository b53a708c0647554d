import { describe, it, expect } from 'vitest';
import {
  buildRoleLayers,
  commonSecurityGroups,
  mergeLayers,
  normalizeSecurityGroups,
  resolveRole,
  tagVolumes,
  type RoleContext,
} from './role-resolver';
import { DiagnosticCode } from './diagnostics';
import type { ProviderInput } from '../schemas/providers.schema';

const provider: ProviderInput = {
  provider: 'ec2',
  location: 'eu-west-1',
  subnets: { test: [{ A: 'subnet-a' }] },
  sizes: { default: 't3.small', db: 'r5.large' },
  images: { default: 'ami-default' },
  volumes: { db: [{ size: 50, device: '/dev/xvdf', type: 'gp2' }] },
  security_groups: { common: 'sg-common', web: 'sg-web', db: ['sg-db', 'sg-backup'] },
};

const context: RoleContext = {
  provider: 'p1',
  providerConfig: provider,
  environment: 'test',
  profileDefaults: { del_root_vol_on_destroy: true, sync_after_install: 'all' },
};

describe('mergeLayers', () => {
  it('applies later layers over earlier ones', () => {
    const merged = mergeLayers([
      { source: 'defaults', attributes: { size: 'small', image: 'ami-1', keep: true } },
      { source: 'provider', attributes: { size: 'large' } },
      { source: 'override', attributes: { image: 'ami-2', size: undefined } },
    ]);

    expect(merged).toEqual({ size: 'large', image: 'ami-2', keep: true });
  });

  it('does not share nested values with its layers', () => {
    const volumes = [{ size: 10, device: '/dev/xvdf' }];
    const merged = mergeLayers([{ source: 'provider', attributes: { volumes } }]);

    expect(merged.volumes).toEqual(volumes);
    expect(merged.volumes).not.toBe(volumes);
  });
});

describe('buildRoleLayers', () => {
  it('orders defaults, provider default, provider role, override', () => {
    const layers = buildRoleLayers('db', provider, { sync_after_install: 'all' }, { servers: 1 });

    expect(layers.map(l => l.source)).toEqual(['defaults', 'provider-default', 'provider', 'override']);
    expect(layers[1].attributes).toEqual({ size: 't3.small', image: 'ami-default' });
    expect(layers[2].attributes).toEqual({
      size: 'r5.large',
      volumes: [{ size: 50, device: '/dev/xvdf', type: 'gp2' }],
      security_groups: ['sg-db', 'sg-backup'],
    });
  });

  it('skips the override layer when there is none', () => {
    expect(buildRoleLayers('web', provider, undefined, null)).toHaveLength(3);
  });
});

describe('normalizeSecurityGroups', () => {
  it('starts from an empty list', () => {
    expect(normalizeSecurityGroups(undefined, ['sg-common'])).toEqual(['sg-common']);
  });

  it('wraps a single id', () => {
    expect(normalizeSecurityGroups('sg-web', ['sg-common'])).toEqual(['sg-web', 'sg-common']);
  });

  it('keeps the common group exactly once and last', () => {
    expect(normalizeSecurityGroups(['sg-common', 'sg-web'], ['sg-common'])).toEqual(['sg-web', 'sg-common']);
  });

  it('leaves the list alone without common groups', () => {
    expect(normalizeSecurityGroups(['sg-web'])).toEqual(['sg-web']);
  });
});

describe('commonSecurityGroups', () => {
  it('reads a single common id', () => {
    expect(commonSecurityGroups(provider)).toEqual(['sg-common']);
  });

  it('is empty when the provider declares none', () => {
    expect(commonSecurityGroups({ subnets: {} })).toEqual([]);
  });
});

describe('tagVolumes', () => {
  it('adds default tags and the volume type', () => {
    expect(tagVolumes([{ size: 100, device: '/dev/xvdf', type: 'gp3' }], 'test', 'db')).toEqual([
      {
        size: 100,
        device: '/dev/xvdf',
        type: 'gp3',
        tags: { Environment: 'test', Role: 'db', Service: 'ebs', VolumeType: 'gp3' },
      },
    ]);
  });

  it('keeps tags the volume already has', () => {
    const [volume] = tagVolumes([{ size: 10, device: '/dev/xvdg', tags: { Service: 'backup', Owner: 'ops' } }], 'prod', 'db');
    expect(volume.tags).toEqual({ Environment: 'prod', Role: 'db', Service: 'backup', Owner: 'ops' });
  });

  it('does not modify its input', () => {
    const volumes = [{ size: 10, device: '/dev/xvdg' }];
    tagVolumes(volumes, 'test', 'db');
    expect(volumes).toEqual([{ size: 10, device: '/dev/xvdg' }]);
  });
});

describe('resolveRole', () => {
  it('resolves a role from provider defaults', () => {
    const result = resolveRole('web', null, context);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        name: 'web',
        environment: 'test',
        size: 't3.small',
        image: 'ami-default',
        attributes: {
          del_root_vol_on_destroy: true,
          sync_after_install: 'all',
          size: 't3.small',
          image: 'ami-default',
        },
        securityGroups: ['sg-web', 'sg-common'],
      });
    }
  });

  it('applies the per-instance override last', () => {
    const result = resolveRole('db', {
      servers: 1,
      size: 'r5.xlarge',
      iam_profile: 'db-profile',
      volumes: [{ size: 100, device: '/dev/xvdf', type: 'gp3' }],
    }, context);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.size).toBe('r5.xlarge');
      expect(result.data.servers).toBe(1);
      expect(result.data.attributes.iam_profile).toBe('db-profile');
      expect(result.data.attributes.volumes).toEqual([
        {
          size: 100,
          device: '/dev/xvdf',
          type: 'gp3',
          tags: { Environment: 'test', Role: 'db', Service: 'ebs', VolumeType: 'gp3' },
        },
      ]);
      expect(result.data.securityGroups).toEqual(['sg-db', 'sg-backup', 'sg-common']);
    }
  });

  it('keeps working fields out of the attributes', () => {
    const result = resolveRole('web', { servers: 3, interfaces: ['test'], security_groups: 'sg-extra' }, context);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.attributes).not.toHaveProperty('servers');
      expect(result.data.attributes).not.toHaveProperty('interfaces');
      expect(result.data.attributes).not.toHaveProperty('security_groups');
      expect(result.data.interfaces).toEqual(['test']);
      expect(result.data.securityGroups).toEqual(['sg-extra', 'sg-common']);
    }
  });

  it('reports a role without an image', () => {
    const bare: ProviderInput = { subnets: {}, sizes: { web: 't3.small' }, security_groups: { common: 'sg-common' } };
    const result = resolveRole('web', null, { ...context, providerConfig: bare, profileDefaults: undefined });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({
        severity: 'warning',
        code: DiagnosticCode.INCOMPLETE_ROLE,
        provider: 'p1',
        environment: 'test',
        role: 'web',
        message: 'Role "web" does not have image defined, it only has size',
      });
    }
  });

  it('requires at least one security group', () => {
    const bare: ProviderInput = { subnets: {}, sizes: { web: 't3.small' }, images: { web: 'ami-1' } };
    const result = resolveRole('web', null, { ...context, providerConfig: bare });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.details).toMatchObject({ missing: ['security_groups'] });
    }
  });

  it('does not modify the provider input', () => {
    const snapshot = structuredClone(provider);
    resolveRole('db', { volumes: [{ size: 1, device: '/dev/xvdh' }] }, context);
    expect(provider).toEqual(snapshot);
  });
});
