import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { BUNDLED_TEMPLATES_DIR } from '../../../src/core/config.js';
import { createMemoryLogger } from '../../../src/core/logger.js';
import {
  MigrationGenerator,
  migrationFileName,
  nextMigrationVersion,
  operationsSummary,
} from '../../../src/refactor/operations/migration.js';
import { createServiceInfo } from '../../../src/refactor/layout.js';
import type { FieldOperation } from '../../../src/refactor/types.js';
import { MIGRATIONS, createProjectFixture, readProjectFile, writeProjectFile } from '../../helpers/project.js';

const service = createServiceInfo({ name: 'project', table: 'projects' });
const FIXED = new Date(2024, 2, 5, 9, 7, 3);

const discountRate: FieldOperation = {
  action: 'add',
  field: {
    name: 'discount_rate',
    type: 'DECIMAL(5,2)',
    javaType: 'BigDecimal',
    nullable: false,
    description: 'Discount rate percentage',
  },
};

describe('operationsSummary', () => {
  it('counts operations per action', () => {
    expect(operationsSummary([discountRate])).toBe('Add 1 field');
    expect(
      operationsSummary([
        discountRate,
        { action: 'remove', fieldName: 'legacy_code' },
        { action: 'remove', fieldName: 'notes' },
      ])
    ).toBe('Add 1 field, Remove 2 fields');
  });
});

describe('migration versions', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'layerforge-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts at 1', () => {
    expect(nextMigrationVersion(dir)).toBe(1);
    expect(nextMigrationVersion(path.join(dir, 'missing'))).toBe(1);
  });

  it('continues after the highest version, ignoring other files', () => {
    for (const name of ['V1__init.sql', 'V3__tasks.sql', 'V10_bad.sql', 'README.md']) {
      fs.writeFileSync(path.join(dir, name), '');
    }
    expect(nextMigrationVersion(dir)).toBe(4);
  });

  it('names the script after the service and table', () => {
    expect(migrationFileName(2, service)).toBe('V2__Update_project_projects_fields.sql');
  });
});

describe('MigrationGenerator', () => {
  let root: string;
  let logger: ReturnType<typeof createMemoryLogger>;

  beforeEach(() => {
    root = createProjectFixture();
    logger = createMemoryLogger();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function generator(templatesDir = BUNDLED_TEMPLATES_DIR): MigrationGenerator {
    return new MigrationGenerator({ projectRoot: root, templatesDir, logger, now: () => FIXED });
  }

  it('writes the next versioned script', () => {
    const result = generator().generate(service, [discountRate]);

    expect(result).toEqual({ file: `${MIGRATIONS}/V2__Update_project_projects_fields.sql`, version: 2 });
    expect(readProjectFile(root, `${MIGRATIONS}/V2__Update_project_projects_fields.sql`).startsWith(
      [
        '-- V2: Add 1 field',
        '-- Service: project (project service)',
        '-- Table: projects',
        '-- Generated: 2024-03-05 09:07:03',
        '',
        '-- Added fields',
        '-- discount_rate: Discount rate percentage',
        'ALTER TABLE projects ADD COLUMN discount_rate DECIMAL(5,2) NOT NULL;',
      ].join('\n')
    )).toBe(true);
    expect(logger.entries).toContainEqual({
      level: 'success',
      message: 'Migration file generated: V2__Update_project_projects_fields.sql',
    });
  });

  it('numbers after existing scripts', () => {
    writeProjectFile(root, `${MIGRATIONS}/V3__Create_tasks_table.sql`, '');
    expect(generator().generate(service, [discountRate])?.version).toBe(4);
  });

  it('groups updates and comments out drops', () => {
    const content = generator().render(
      service,
      [
        { action: 'update', fieldName: 'title', changes: { type: 'VARCHAR(300)', nullable: true } },
        { action: 'remove', fieldName: 'legacy_code' },
      ],
      7
    );

    expect(content).toContain(
      [
        '-- Updated fields',
        '-- title',
        'ALTER TABLE projects ALTER COLUMN title TYPE VARCHAR(300);',
        'ALTER TABLE projects ALTER COLUMN title DROP NOT NULL;',
      ].join('\n')
    );
    expect(content).toContain(
      [
        '-- Removed fields (review before enabling)',
        '-- ALTER TABLE projects DROP COLUMN legacy_code; -- REQUIRES MANUAL CONFIRMATION',
      ].join('\n')
    );
    expect(content).not.toContain('-- Added fields');
  });

  it('backfills updated_at when it is added', () => {
    const content = generator().render(
      service,
      [{ action: 'add', field: { name: 'updated_at', type: 'TIMESTAMP', javaType: 'LocalDateTime', updateOnModify: true } }],
      2
    );

    expect(content).toContain('UPDATE projects SET updated_at = CURRENT_TIMESTAMP WHERE updated_at IS NULL;');
  });

  it('skips generation without a template', () => {
    const emptyTemplates = fs.mkdtempSync(path.join(os.tmpdir(), 'layerforge-test-'));
    try {
      expect(generator(emptyTemplates).generate(service, [discountRate])).toBeUndefined();
      expect(logger.entries).toContainEqual({
        level: 'warn',
        message: 'Migration template not found, skipping migration generation',
      });
      expect(fs.readdirSync(path.join(root, ...MIGRATIONS.split('/')))).toEqual(['V1__Create_projects_table.sql']);
    } finally {
      fs.rmSync(emptyTemplates, { recursive: true, force: true });
    }
  });
});
