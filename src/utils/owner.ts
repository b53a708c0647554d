/**
 * Ownership utilities
 * Resolve --user/--group values to numeric ids
 */

import { spawnSync } from 'child_process';
import { ok, err, type Result } from '../types/result';
import { ConfigError, ErrorCode } from './errors';

export interface Ownership {
  uid?: number;
  gid?: number;
}

const NUMERIC_ID = /^\d+$/;

function parseId(value: string): number | undefined {
  const id = Number(value.trim());
  return Number.isInteger(id) && id >= 0 ? id : undefined;
}

/**
 * Look up a uid with `id -u <name>`
 */
export function lookupUserId(name: string): number | undefined {
  const result = spawnSync('id', ['-u', name], { encoding: 'utf-8' });
  if (result.status === 0 && result.stdout) {
    return parseId(result.stdout);
  }
  return undefined;
}

/**
 * Look up a gid with `getent group <name>` (name:x:gid:members)
 */
export function lookupGroupId(name: string): number | undefined {
  const result = spawnSync('getent', ['group', name], { encoding: 'utf-8' });
  if (result.status === 0 && result.stdout) {
    return parseId(result.stdout.split(':')[2] ?? '');
  }
  return undefined;
}

function resolveId(
  value: string,
  kind: 'user' | 'group',
  lookup: (name: string) => number | undefined
): Result<number, ConfigError> {
  const id = NUMERIC_ID.test(value) ? parseId(value) : lookup(value);
  if (id === undefined) {
    return err(new ConfigError(
      `Unknown ${kind}: ${value}`,
      ErrorCode.INVALID_ARGUMENT,
      `Pass an existing ${kind} name or a numeric id`
    ));
  }
  return ok(id);
}

/**
 * Resolve user and group names or numeric ids; absent values stay unset
 */
export function resolveOwnership(user?: string, group?: string): Result<Ownership, ConfigError> {
  const ownership: Ownership = {};

  if (user !== undefined) {
    const uid = resolveId(user, 'user', lookupUserId);
    if (!uid.success) {
      return uid;
    }
    ownership.uid = uid.data;
  }

  if (group !== undefined) {
    const gid = resolveId(group, 'group', lookupGroupId);
    if (!gid.success) {
      return gid;
    }
    ownership.gid = gid.data;
  }

  return ok(ownership);
}
