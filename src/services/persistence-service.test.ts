import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, chownSync, existsSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parse } from 'yaml';
import { PersistenceService, renderYaml } from './persistence-service';
import { PersistenceError } from '../utils/errors';
import type { CloudConfig } from '../types/cloud';

function config(provider = 'ec2'): CloudConfig {
  return {
    providers: { p1: { provider, location: 'eu-west-1' } },
    profiles: {
      test: {
        web_test_p1A: {
          provider: 'p1',
          size: 't3.small',
          image: 'ami-base',
          tag: { Environment: 'test', Role: 'web' },
          network_interfaces: [{ DeviceIndex: 0, SubnetId: 'subnet-a', SecurityGroupId: ['sg-common'] }],
        },
      },
    },
    maps: { test: { web_test_p1A: { 'web01.test.p1.example.com': {} } } },
    diagnostics: [],
  };
}

function mode(path: string): number {
  return statSync(path).mode & 0o777;
}

describe('renderYaml', () => {
  it('writes block style without anchors', () => {
    const shared = ['sg-common'];
    expect(renderYaml({ a: { groups: shared }, b: { groups: shared } })).toBe(
      'a:\n  groups:\n    - sg-common\nb:\n  groups:\n    - sg-common\n'
    );
  });
});

describe('PersistenceService', () => {
  let confDir: string;

  beforeEach(() => {
    confDir = mkdtempSync(join(tmpdir(), 'cloudmap-conf-'));
  });

  afterEach(() => {
    rmSync(confDir, { recursive: true, force: true });
  });

  it('plans one file per provider and environment', () => {
    const files = new PersistenceService({ confDir }).plan(config());

    expect(files.map(f => [f.kind, f.path])).toEqual([
      ['provider', join(confDir, 'cloud.providers.d', 'p1.conf')],
      ['profile', join(confDir, 'cloud.profiles.d', 'test.conf')],
      ['map', join(confDir, 'cloud.maps', 'test')],
    ]);
    expect(files[0].contents).toBe('p1:\n  provider: ec2\n  location: eu-west-1\n');
    expect(parse(files[2].contents)).toEqual({ web_test_p1A: { 'web01.test.p1.example.com': {} } });
  });

  it('creates directories and files with restricted permissions', () => {
    const result = new PersistenceService({ confDir }).apply(config());

    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.data.directories).toEqual([
      join(confDir, 'cloud.providers.d'),
      join(confDir, 'cloud.profiles.d'),
      join(confDir, 'cloud.maps'),
    ]);
    expect(result.data.files.map(f => f.status)).toEqual(['created', 'created', 'created']);

    for (const dir of result.data.directories) {
      expect(mode(dir)).toBe(0o700);
    }
    for (const file of result.data.files) {
      expect(mode(file.path)).toBe(0o600);
    }
    expect(parse(readFileSync(join(confDir, 'cloud.profiles.d', 'test.conf'), 'utf-8'))).toEqual(config().profiles.test);
  });

  it('leaves identical files alone', () => {
    const service = new PersistenceService({ confDir });
    service.apply(config());
    const result = service.apply(config());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.directories).toEqual([]);
      expect(result.data.files.map(f => f.status)).toEqual(['unchanged', 'unchanged', 'unchanged']);
    }
  });

  it('reports a diff for updated contents', () => {
    const service = new PersistenceService({ confDir });
    service.apply(config());
    const result = service.apply(config('gce'));

    expect(result.success).toBe(true);
    if (!result.success) return;

    const [provider, profile] = result.data.files;
    expect(provider.status).toBe('updated');
    expect(provider.diff).toContain('-  provider: ec2');
    expect(provider.diff).toContain('+  provider: gce');
    expect(profile.status).toBe('unchanged');
    expect(readFileSync(provider.path, 'utf-8')).toBe('p1:\n  provider: gce\n  location: eu-west-1\n');
  });

  it('fixes permissions of unchanged files', () => {
    const service = new PersistenceService({ confDir });
    service.apply(config());
    const path = join(confDir, 'cloud.maps', 'test');
    chmodSync(path, 0o644);

    const result = service.apply(config());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.files[2]).toEqual({
        kind: 'map',
        name: 'test',
        path,
        status: 'updated',
        previousMode: 0o644,
      });
    }
    expect(mode(path)).toBe(0o600);
  });

  it('uses the configured modes', () => {
    const result = new PersistenceService({ confDir, fileMode: 0o640, dirMode: 0o750 }).apply(config());

    expect(result.success).toBe(true);
    expect(mode(join(confDir, 'cloud.maps'))).toBe(0o750);
    expect(mode(join(confDir, 'cloud.maps', 'test'))).toBe(0o640);
  });

  it('sets the configured owner and group', () => {
    const uid = process.getuid?.();
    const gid = process.getgid?.();
    const service = new PersistenceService({ confDir, uid, gid });

    const first = service.apply(config());
    expect(first.success).toBe(true);
    const path = join(confDir, 'cloud.providers.d', 'p1.conf');
    expect(statSync(path).uid).toBe(uid);
    expect(statSync(path).gid).toBe(gid);
    expect(statSync(join(confDir, 'cloud.maps')).uid).toBe(uid);

    const second = service.apply(config());
    expect(second.success).toBe(true);
    if (second.success) {
      expect(second.data.files.map(f => f.status)).toEqual(['unchanged', 'unchanged', 'unchanged']);
    }
  });

  it.skipIf(process.getuid?.() !== 0)('restores the owner of unchanged files', () => {
    const service = new PersistenceService({ confDir, uid: 0, gid: 0 });
    service.apply(config());
    const path = join(confDir, 'cloud.maps', 'test');
    chownSync(path, 4321, 4321);

    const result = service.apply(config());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.files[2]).toEqual({
        kind: 'map',
        name: 'test',
        path,
        status: 'updated',
        previousOwner: { uid: 4321, gid: 4321 },
      });
    }
    expect(statSync(path).uid).toBe(0);
    expect(statSync(path).gid).toBe(0);
  });

  it('writes nothing in dry-run mode', () => {
    const result = new PersistenceService({ confDir, dryRun: true }).apply(config());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.dryRun).toBe(true);
      expect(result.data.directories).toHaveLength(3);
      expect(result.data.files.map(f => f.status)).toEqual(['created', 'created', 'created']);
    }
    expect(existsSync(join(confDir, 'cloud.providers.d'))).toBe(false);
  });

  it('returns an error when the directory cannot be created', () => {
    const blocker = join(confDir, 'blocker');
    writeFileSync(blocker, '');

    const result = new PersistenceService({ confDir: join(blocker, 'salt') }).apply(config());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(PersistenceError);
      expect(result.error.path).toBe(join(blocker, 'salt', 'cloud.providers.d'));
    }
  });
});
