import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockPrompt } = vi.hoisted(() => ({ mockPrompt: vi.fn() }));

vi.mock('inquirer', () => ({
  default: {
    prompt: mockPrompt,
  },
}));

import chalk from 'chalk';
import {
  createInteractiveGate,
  renderDetailedAnalysis,
  renderImpactAnalysis,
} from '../../../src/refactor/operations/confirmation.js';
import { ImpactAnalyzer } from '../../../src/refactor/operations/impact.js';
import { createServiceInfo } from '../../../src/refactor/layout.js';
import type { ConfirmationContext } from '../../../src/refactor/types.js';

const service = createServiceInfo({ name: 'project', table: 'projects' });
const analysis = new ImpactAnalyzer('com.example').analyze(service, [{ action: 'remove', fieldName: 'legacy_code' }]);
const context: ConfirmationContext = {
  destructive: true,
  usages: [
    {
      fieldName: 'legacy_code',
      sourceFiles: ['Project.java'],
      testFiles: [],
      frontendFiles: [],
      migrationFiles: ['V1__Create_projects_table.sql'],
    },
  ],
};

describe('renderImpactAnalysis', () => {
  it('lists database changes, files and breaking changes', () => {
    const lines = renderImpactAnalysis(analysis);

    expect(lines.slice(0, 6)).toEqual([
      '='.repeat(60),
      'FIELD MODIFICATION IMPACT ANALYSIS',
      '='.repeat(60),
      'Service: project',
      'Table: projects',
      'Operations: 1',
    ]);
    expect(lines).toContain('DATABASE CHANGES (1):');
    expect(lines).toContain('  • DROP_COLUMN: legacy_code');
    expect(lines).toContain('FILES TO MODIFY (9):');
    expect(lines).toContain('BREAKING CHANGES (1):');
    expect(lines).not.toContain('POTENTIAL RISKS (0):');
    expect(lines[lines.length - 1]).toBe('='.repeat(60));
  });
});

describe('renderDetailedAnalysis', () => {
  it('shows validation results and dependency impacts', () => {
    expect(renderDetailedAnalysis(analysis, context)).toEqual([
      '',
      'DETAILED ANALYSIS:',
      '',
      'Validation Results:',
      '  • remove legacy_code: column drop left for manual confirmation',
      '',
      'Dependency Impacts:',
      '  • legacy_code: 1 source file(s) - Project.java',
      '  • legacy_code: 1 migration file(s) - V1__Create_projects_table.sql',
    ]);
  });
});

describe('createInteractiveGate', () => {
  let printed: string[];

  beforeEach(() => {
    chalk.level = 0;
    vi.clearAllMocks();
    printed = [];
  });

  it('proceeds on yes', async () => {
    mockPrompt.mockResolvedValueOnce({ choice: 'yes' });
    const gate = createInteractiveGate((line) => printed.push(line));

    await expect(gate(analysis, context)).resolves.toBe(true);
    expect(printed).toContain('\nWARNING: This operation includes potentially destructive changes!');
    expect(printed).toContain('\nThis will modify 9 files');
  });

  it('aborts on no', async () => {
    mockPrompt.mockResolvedValueOnce({ choice: 'no' });
    const gate = createInteractiveGate((line) => printed.push(line));

    await expect(gate(analysis, { destructive: false, usages: [] })).resolves.toBe(false);
    expect(printed.some((line) => line.includes('WARNING'))).toBe(false);
  });

  it('shows details and asks again', async () => {
    mockPrompt.mockResolvedValueOnce({ choice: 'details' }).mockResolvedValueOnce({ choice: 'yes' });
    const gate = createInteractiveGate((line) => printed.push(line));

    await expect(gate(analysis, context)).resolves.toBe(true);
    expect(mockPrompt).toHaveBeenCalledTimes(2);
    expect(printed).toContain('DETAILED ANALYSIS:');
  });
});
