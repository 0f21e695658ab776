import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { createMemoryLogger } from '../../../src/core/logger.js';
import { SnapshotError } from '../../../src/core/errors.js';
import { SnapshotManager } from '../../../src/refactor/operations/snapshot.js';
import { MAIN, createProjectFixture, projectConfig, readSourceTree, writeProjectFile } from '../../helpers/project.js';

const FIXED = new Date(2024, 2, 5, 9, 7, 3, 42);

describe('SnapshotManager', () => {
  let root: string;
  let logger: ReturnType<typeof createMemoryLogger>;
  let clock: Date;

  function manager(): SnapshotManager {
    return new SnapshotManager({ ...projectConfig(root), logger, now: () => clock });
  }

  beforeEach(() => {
    root = createProjectFixture();
    logger = createMemoryLogger();
    clock = FIXED;
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('names snapshots after the service and the time', () => {
    const id = manager().createSnapshot('project');

    expect(id).toBe('field_modification_project_20240305_090703_042');
    expect(logger.entries).toContainEqual({ level: 'success', message: `Snapshot created: ${id}` });
  });

  it('keeps ids unique within the same millisecond', () => {
    const snapshots = manager();
    const first = snapshots.createSnapshot('project');
    const second = snapshots.createSnapshot('project');

    expect(second).toBe(`${first}_1`);
  });

  it('writes a manifest of the captured roots', () => {
    const id = manager().createSnapshot('project');
    const manifest = JSON.parse(
      fs.readFileSync(path.join(root, '.layerforge', 'snapshots', id, 'manifest.json'), 'utf-8')
    );

    expect(manifest).toEqual({
      backup_id: id,
      service_name: 'project',
      timestamp: FIXED.toISOString(),
      files_backed_up: [
        MAIN,
        'src/test/java/com/example/project',
        'src/main/resources/frontend/api',
        'src/main/resources/db/migration',
      ],
      project_root: root,
      paths_absent: [],
    });
  });

  it('restores the tree byte for byte', () => {
    const before = readSourceTree(root);
    const snapshots = manager();
    const id = snapshots.createSnapshot('project');

    writeProjectFile(root, `${MAIN}/model/Project.java`, 'broken');
    writeProjectFile(root, 'src/main/resources/db/migration/V2__Update_project_projects_fields.sql', '-- partial');
    fs.rmSync(path.join(root, 'src', 'test'), { recursive: true });

    expect(snapshots.restoreSnapshot(id)).toBe(true);
    expect(readSourceTree(root)).toEqual(before);
  });

  it('removes roots that did not exist when the snapshot was taken', () => {
    fs.rmSync(path.join(root, 'src', 'main', 'resources', 'frontend'), { recursive: true });
    const snapshots = manager();
    const id = snapshots.createSnapshot('project');

    writeProjectFile(root, 'src/main/resources/frontend/api/Project_interface_updates.txt', 'notes');

    expect(snapshots.restoreSnapshot(id)).toBe(true);
    expect(fs.existsSync(path.join(root, 'src', 'main', 'resources', 'frontend', 'api'))).toBe(false);
  });

  it('refuses ids that escape the snapshot directory', () => {
    expect(manager().restoreSnapshot('../outside')).toBe(false);
    expect(logger.entries).toContainEqual({ level: 'error', message: 'Invalid snapshot id: ../outside' });
  });

  it('reports unknown snapshots', () => {
    expect(manager().restoreSnapshot('field_modification_project_missing')).toBe(false);
    expect(logger.entries).toContainEqual({
      level: 'error',
      message: 'Snapshot not found: field_modification_project_missing',
    });
  });

  it('lists valid snapshots newest first', () => {
    const snapshots = manager();
    const older = snapshots.createSnapshot('project');
    clock = new Date(2024, 2, 6, 10, 0, 0, 0);
    const newer = snapshots.createSnapshot('project');
    fs.mkdirSync(path.join(root, '.layerforge', 'snapshots', 'stray'), { recursive: true });

    expect(snapshots.listSnapshots().map((s) => s.backup_id)).toEqual([newer, older]);
  });

  it('returns no snapshots before the first one is taken', () => {
    expect(manager().listSnapshots()).toEqual([]);
  });

  it('raises SnapshotError and removes the partial copy when copying fails', () => {
    fs.symlinkSync(path.join(root, 'missing-target'), path.join(root, ...MAIN.split('/'), 'dangling'));

    expect(() => manager().createSnapshot('project')).toThrow(SnapshotError);
    expect(
      fs.existsSync(path.join(root, '.layerforge', 'snapshots', 'field_modification_project_20240305_090703_042'))
    ).toBe(false);
  });
});
