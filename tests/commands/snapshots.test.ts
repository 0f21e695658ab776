import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';
import { createMemoryLogger } from '../../src/core/logger.js';
import { SnapshotManager } from '../../src/refactor/operations/snapshot.js';
import { MAIN, createProjectFixture, projectConfig, readProjectFile, writeProjectFile } from '../helpers/project.js';

vi.mock('conf', () => ({
  default: class MockConf {
    get(): undefined {
      return undefined;
    }
    set(): void {}
    delete(): void {}
  },
}));

const originalConsoleLog = console.log;
const originalConsoleError = console.error;

describe('snapshots commands', () => {
  let root: string;
  let configFile: string;
  let consoleLogs: string[];

  function takeSnapshot(date: Date): string {
    const manager = new SnapshotManager({ ...projectConfig(root), logger: createMemoryLogger(), now: () => date });
    return manager.createSnapshot('project');
  }

  beforeEach(() => {
    chalk.level = 0;
    consoleLogs = [];
    console.log = vi.fn((...args) => consoleLogs.push(args.join(' ')));
    console.error = vi.fn();
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });

    root = createProjectFixture();
    configFile = path.join(root, 'layerforge.config.json');
    fs.writeFileSync(configFile, JSON.stringify({ projectRoot: '.' }));
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    console.error = originalConsoleError;
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('snapshotsListCommand', () => {
    it('says so when there are no snapshots', async () => {
      const { snapshotsListCommand } = await import('../../src/commands/snapshots.js');
      await snapshotsListCommand({ config: configFile });

      expect(consoleLogs.join('\n')).toContain('No snapshots found.');
    });

    it('lists snapshots newest first', async () => {
      const older = takeSnapshot(new Date(2024, 2, 5, 9, 7, 3, 42));
      const newer = takeSnapshot(new Date(2024, 2, 6, 18, 30, 0, 0));

      const { snapshotsListCommand } = await import('../../src/commands/snapshots.js');
      await snapshotsListCommand({ config: configFile });

      const ids = consoleLogs.filter((line) => line.startsWith('  field_modification_')).map((line) => line.trim());
      expect(ids).toEqual([newer, older]);
      expect(consoleLogs).toContain('    Date: 2024-03-06 18:30:00');
      expect(consoleLogs).toContain('    Service: project');
      expect(consoleLogs).toContain('    Paths: 4');
    });

    it('prints manifests as JSON', async () => {
      const id = takeSnapshot(new Date(2024, 2, 5, 9, 7, 3, 42));

      const { snapshotsListCommand } = await import('../../src/commands/snapshots.js');
      await snapshotsListCommand({ config: configFile, json: true });

      const manifests = JSON.parse(consoleLogs.join('\n'));
      expect(manifests).toHaveLength(1);
      expect(manifests[0].backup_id).toBe(id);
    });
  });

  describe('snapshotsRestoreCommand', () => {
    it('restores the service tree', async () => {
      const original = readProjectFile(root, `${MAIN}/model/Project.java`);
      const id = takeSnapshot(new Date(2024, 2, 5, 9, 7, 3, 42));
      writeProjectFile(root, `${MAIN}/model/Project.java`, 'class Broken {}');

      const { snapshotsRestoreCommand } = await import('../../src/commands/snapshots.js');
      await snapshotsRestoreCommand(id, { config: configFile });

      expect(readProjectFile(root, `${MAIN}/model/Project.java`)).toBe(original);
      expect(consoleLogs.join('\n')).toContain('Successfully restored from snapshot.');
    });

    it('exits with code 1 for unknown snapshots', async () => {
      const { snapshotsRestoreCommand } = await import('../../src/commands/snapshots.js');

      await expect(snapshotsRestoreCommand('field_modification_project_missing', { config: configFile })).rejects.toThrow(
        'process.exit(1)'
      );
      expect(consoleLogs.join('\n')).toContain('Snapshot not found or restore failed.');
    });
  });
});
