/**
 * Persistence Service
 *
 * Writes the expanded trees as salt-cloud configuration files:
 *
 *   <conf>/cloud.providers.d/<provider>.conf   { <provider>: config }
 *   <conf>/cloud.profiles.d/<environment>.conf  profiles of the environment
 *   <conf>/cloud.maps/<environment>             map of the environment
 *
 * Files are only rewritten when their contents or mode change, and each
 * run reports what changed. Owner and group are set when configured.
 * Dry-run mode reports without writing.
 */

import { chmodSync, chownSync, existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'fs';
import { join } from 'path';
import { stringify } from 'yaml';
import { createTwoFilesPatch } from 'diff';
import type { CloudConfig } from '../types/cloud';
import { ok, err, type Result } from '../types/result';
import { PersistenceError } from '../utils/errors';
import {
  CONF_EXTENSION,
  DEFAULT_DIR_MODE,
  DEFAULT_FILE_MODE,
  MAPS_DIR,
  PROFILES_DIR,
  PROVIDERS_DIR,
} from '../constants';

export type FileKind = 'provider' | 'profile' | 'map';

export type FileStatus = 'created' | 'updated' | 'unchanged';

export interface FileOwner {
  uid: number;
  gid: number;
}

export interface PlannedFile {
  kind: FileKind;
  /** Provider or environment name */
  name: string;
  path: string;
  contents: string;
}

export interface FileChange {
  kind: FileKind;
  name: string;
  path: string;
  status: FileStatus;
  /** Unified diff, for updated contents */
  diff?: string;
  /** Previous mode, when only permissions were fixed */
  previousMode?: number;
  /** Previous owner, when only ownership was fixed */
  previousOwner?: FileOwner;
}

export interface ApplyReport {
  dryRun: boolean;
  /** Directories created (or that would be) */
  directories: string[];
  files: FileChange[];
}

export interface PersistenceOptions {
  confDir: string;
  fileMode?: number;
  dirMode?: number;
  /** Owner of written directories and files; unset keeps the process owner */
  uid?: number;
  gid?: number;
  dryRun?: boolean;
}

/**
 * Render a tree as block-style YAML without anchors
 */
export function renderYaml(data: unknown): string {
  return stringify(data, { aliasDuplicateObjects: false, lineWidth: 0 });
}

function permissions(path: string): number {
  return statSync(path).mode & 0o777;
}

function ownerOf(path: string): FileOwner {
  const { uid, gid } = statSync(path);
  return { uid, gid };
}

export class PersistenceService {
  private readonly fileMode: number;
  private readonly dirMode: number;
  private readonly dryRun: boolean;

  private readonly uid?: number;
  private readonly gid?: number;

  constructor(private readonly options: PersistenceOptions) {
    this.fileMode = options.fileMode ?? DEFAULT_FILE_MODE;
    this.dirMode = options.dirMode ?? DEFAULT_DIR_MODE;
    this.dryRun = options.dryRun ?? false;
    this.uid = options.uid;
    this.gid = options.gid;
  }

  private ownedAsConfigured(owner: FileOwner): boolean {
    return (this.uid === undefined || owner.uid === this.uid)
      && (this.gid === undefined || owner.gid === this.gid);
  }

  private setOwner(path: string): void {
    if (this.uid === undefined && this.gid === undefined) {
      return;
    }
    const current = ownerOf(path);
    if (!this.ownedAsConfigured(current)) {
      chownSync(path, this.uid ?? current.uid, this.gid ?? current.gid);
    }
  }

  /**
   * Apply mode and owner to a file written by this service
   */
  private secure(path: string): void {
    chmodSync(path, this.fileMode);
    this.setOwner(path);
  }

  get directories(): string[] {
    return [PROVIDERS_DIR, PROFILES_DIR, MAPS_DIR].map(dir => join(this.options.confDir, dir));
  }

  /**
   * Render every file without touching the disk
   */
  plan(config: CloudConfig): PlannedFile[] {
    const [providersDir, profilesDir, mapsDir] = this.directories;
    const files: PlannedFile[] = [];

    for (const [name, provider] of Object.entries(config.providers)) {
      files.push({
        kind: 'provider',
        name,
        path: join(providersDir, `${name}${CONF_EXTENSION}`),
        contents: renderYaml({ [name]: provider }),
      });
    }

    for (const [name, profiles] of Object.entries(config.profiles)) {
      files.push({
        kind: 'profile',
        name,
        path: join(profilesDir, `${name}${CONF_EXTENSION}`),
        contents: renderYaml(profiles),
      });
    }

    for (const [name, map] of Object.entries(config.maps)) {
      files.push({
        kind: 'map',
        name,
        path: join(mapsDir, name),
        contents: renderYaml(map),
      });
    }

    return files;
  }

  /**
   * Create directories and write changed files
   */
  apply(config: CloudConfig): Result<ApplyReport, PersistenceError> {
    const report: ApplyReport = { dryRun: this.dryRun, directories: [], files: [] };

    for (const dir of this.directories) {
      const result = this.ensureDirectory(dir);
      if (!result.success) {
        return result;
      }
      if (result.data) {
        report.directories.push(dir);
      }
    }

    for (const file of this.plan(config)) {
      const result = this.writeFile(file);
      if (!result.success) {
        return result;
      }
      report.files.push(result.data);
    }

    return ok(report);
  }

  /**
   * Returns whether the directory was (or would be) created
   */
  private ensureDirectory(dir: string): Result<boolean, PersistenceError> {
    try {
      const exists = existsSync(dir);
      if (this.dryRun) {
        return ok(!exists);
      }
      if (!exists) {
        mkdirSync(dir, { recursive: true, mode: this.dirMode });
      }
      if (permissions(dir) !== this.dirMode) {
        chmodSync(dir, this.dirMode);
      }
      this.setOwner(dir);
      return ok(!exists);
    } catch (error) {
      return err(new PersistenceError(
        `Cannot create directory ${dir}`,
        dir,
        error instanceof Error ? error : undefined
      ));
    }
  }

  private writeFile(file: PlannedFile): Result<FileChange, PersistenceError> {
    const { kind, name, path, contents } = file;

    try {
      if (!existsSync(path)) {
        if (!this.dryRun) {
          writeFileSync(path, contents, { mode: this.fileMode });
          this.secure(path);
        }
        return ok({ kind, name, path, status: 'created' });
      }

      const previous = readFileSync(path, 'utf-8');
      const mode = permissions(path);
      const owner = ownerOf(path);

      if (previous === contents) {
        const modeChanged = mode !== this.fileMode;
        const ownerChanged = !this.ownedAsConfigured(owner);
        if (!modeChanged && !ownerChanged) {
          return ok({ kind, name, path, status: 'unchanged' });
        }
        if (!this.dryRun) {
          this.secure(path);
        }
        return ok({
          kind,
          name,
          path,
          status: 'updated',
          ...(modeChanged ? { previousMode: mode } : {}),
          ...(ownerChanged ? { previousOwner: owner } : {}),
        });
      }

      if (!this.dryRun) {
        writeFileSync(path, contents, { mode: this.fileMode });
        this.secure(path);
      }
      return ok({
        kind,
        name,
        path,
        status: 'updated',
        diff: createTwoFilesPatch(path, path, previous, contents),
      });
    } catch (error) {
      return err(new PersistenceError(
        `Cannot write ${path}`,
        path,
        error instanceof Error ? error : undefined
      ));
    }
  }
}
