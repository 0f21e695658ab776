/**
 * snapshots - Point-in-time copies of every tree a field modification may touch
 *
 * A snapshot records which roots were copied and which did not exist yet, so
 * a restore can also remove directories the failed run created.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globSync } from 'glob';
import { z } from 'zod';
import type { Logger } from '../../core/logger.js';
import { SnapshotError, errorMessage } from '../../core/errors.js';
import { formatCompactTimestamp } from '../../utils/dates.js';
import { snapshotRootsFor } from '../layout.js';
import type { SnapshotManifest } from '../types.js';

const MANIFEST_FILE = 'manifest.json';
const ID_PREFIX = 'field_modification_';

export const SnapshotManifestSchema = z.object({
  backup_id: z.string().min(1),
  service_name: z.string().min(1),
  timestamp: z.string().min(1),
  files_backed_up: z.array(z.string()),
  project_root: z.string().min(1),
  paths_absent: z.array(z.string()).default([]),
});

export interface SnapshotManagerOptions {
  projectRoot: string;
  snapshotDir: string;
  basePackage: string;
  logger: Logger;
  /** Clock used for snapshot ids and manifest timestamps */
  now?: () => Date;
}

function toAbsolute(root: string, relativePath: string): string {
  return path.join(root, ...relativePath.split('/'));
}

/**
 * Copy a file or a whole directory tree, empty directories included
 */
function copyTree(source: string, destination: string): void {
  if (!fs.statSync(source).isDirectory()) {
    fs.mkdirSync(path.dirname(destination), { recursive: true });
    fs.copyFileSync(source, destination);
    return;
  }

  fs.mkdirSync(destination, { recursive: true });
  const entries = globSync('**/*', { cwd: source, dot: true, posix: true }).sort();
  for (const entry of entries) {
    const from = toAbsolute(source, entry);
    const to = toAbsolute(destination, entry);
    if (fs.statSync(from).isDirectory()) {
      fs.mkdirSync(to, { recursive: true });
    } else {
      fs.mkdirSync(path.dirname(to), { recursive: true });
      fs.copyFileSync(from, to);
    }
  }
}

export class SnapshotManager {
  private readonly now: () => Date;

  constructor(private readonly options: SnapshotManagerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get snapshotDir(): string {
    return this.options.snapshotDir;
  }

  /**
   * Copy the service's source and test trees, the frontend API directory and
   * the migration directory. Throws SnapshotError after removing any partial copy.
   */
  createSnapshot(serviceName: string): string {
    const { projectRoot, basePackage, logger } = this.options;
    const date = this.now();
    const backupId = this.allocateId(serviceName, date);
    const backupDir = path.join(this.snapshotDir, backupId);

    logger.info(`Creating snapshot: ${backupId}`);

    try {
      fs.mkdirSync(backupDir, { recursive: true });

      const manifest: SnapshotManifest = {
        backup_id: backupId,
        service_name: serviceName,
        timestamp: date.toISOString(),
        files_backed_up: [],
        project_root: projectRoot,
        paths_absent: [],
      };

      for (const root of snapshotRootsFor(serviceName, basePackage)) {
        const source = toAbsolute(projectRoot, root);
        if (!fs.existsSync(source)) {
          manifest.paths_absent.push(root);
          continue;
        }
        copyTree(source, toAbsolute(backupDir, root));
        manifest.files_backed_up.push(root);
        logger.debug(`Captured ${root}`);
      }

      fs.writeFileSync(path.join(backupDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
      logger.success(`Snapshot created: ${backupId}`);
      return backupId;
    } catch (error) {
      logger.error(`Failed to create snapshot: ${errorMessage(error)}`);
      fs.rmSync(backupDir, { recursive: true, force: true });
      throw new SnapshotError(`Failed to create snapshot ${backupId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Put every captured root back and delete roots that did not exist when the
   * snapshot was taken. Reports failure through the return value and the log.
   */
  restoreSnapshot(backupId: string): boolean {
    const { logger } = this.options;

    if (backupId !== path.basename(backupId) || backupId.startsWith('.')) {
      logger.error(`Invalid snapshot id: ${backupId}`);
      return false;
    }

    const backupDir = path.join(this.snapshotDir, backupId);
    if (!fs.existsSync(backupDir)) {
      logger.error(`Snapshot not found: ${backupId}`);
      return false;
    }

    try {
      const manifest = this.readManifest(backupDir);
      logger.info(`Restoring snapshot: ${backupId}`);

      for (const root of manifest.files_backed_up) {
        const saved = toAbsolute(backupDir, root);
        const live = toAbsolute(manifest.project_root, root);
        if (!fs.existsSync(saved)) {
          throw new Error(`Snapshot is missing ${root}`);
        }
        fs.rmSync(live, { recursive: true, force: true });
        copyTree(saved, live);
        logger.debug(`Restored ${root}`);
      }

      for (const root of manifest.paths_absent) {
        fs.rmSync(toAbsolute(manifest.project_root, root), { recursive: true, force: true });
      }

      logger.success(`Snapshot restored: ${backupId}`);
      return true;
    } catch (error) {
      logger.error(`Failed to restore snapshot ${backupId}: ${errorMessage(error)}`);
      return false;
    }
  }

  /** Valid snapshots, newest first */
  listSnapshots(): SnapshotManifest[] {
    if (!fs.existsSync(this.snapshotDir)) return [];

    const manifests: SnapshotManifest[] = [];
    for (const entry of fs.readdirSync(this.snapshotDir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      try {
        manifests.push(this.readManifest(path.join(this.snapshotDir, entry.name)));
      } catch (error) {
        this.options.logger.debug(`Skipping ${entry.name}: ${errorMessage(error)}`);
      }
    }

    return manifests.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  }

  private readManifest(backupDir: string): SnapshotManifest {
    const manifestPath = path.join(backupDir, MANIFEST_FILE);
    if (!fs.existsSync(manifestPath)) {
      throw new Error(`No manifest in ${path.basename(backupDir)}`);
    }
    const parsed = SnapshotManifestSchema.safeParse(JSON.parse(fs.readFileSync(manifestPath, 'utf-8')));
    if (!parsed.success) {
      throw new Error(`Invalid manifest in ${path.basename(backupDir)}: ${parsed.error.issues[0]?.message}`);
    }
    return parsed.data;
  }

  /** Snapshot ids stay unique even when two runs share a millisecond */
  private allocateId(serviceName: string, date: Date): string {
    const base = `${ID_PREFIX}${serviceName}_${formatCompactTimestamp(date)}`;
    let candidate = base;
    for (let suffix = 1; fs.existsSync(path.join(this.snapshotDir, candidate)); suffix++) {
      candidate = `${base}_${suffix}`;
    }
    return candidate;
  }
}
