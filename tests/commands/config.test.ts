import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

const { storage, mockPrompt } = vi.hoisted(() => ({
  storage: new Map<string, unknown>(),
  mockPrompt: vi.fn(),
}));

// Mock Conf before any imports
vi.mock('conf', () => ({
  default: class MockConf {
    get(key: string) {
      return storage.get(key);
    }
    set(key: string, value: unknown) {
      storage.set(key, value);
    }
    delete(key: string) {
      storage.delete(key);
    }
  },
}));

vi.mock('inquirer', () => ({
  default: {
    prompt: mockPrompt,
  },
}));

const originalConsoleLog = console.log;

describe('configCommand', () => {
  let consoleLogs: string[];
  let tempDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    storage.clear();
    consoleLogs = [];
    console.log = vi.fn((...args) => consoleLogs.push(args.join(' ')));
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'layerforge-test-'));
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('prompts for defaults when none exist', async () => {
    mockPrompt.mockResolvedValueOnce({ projectRoot: tempDir, basePackage: ' org.acme ' });

    const { configCommand } = await import('../../src/commands/config.js');
    await configCommand();

    expect(mockPrompt).toHaveBeenCalledTimes(1);
    expect(storage.get('projectRoot')).toBe(path.resolve(tempDir));
    expect(storage.get('basePackage')).toBe('org.acme');
    expect(consoleLogs.join('\n')).toContain('Defaults saved successfully!');
  });

  it('forgets the project root when left empty', async () => {
    storage.set('projectRoot', tempDir);
    mockPrompt
      .mockResolvedValueOnce({ action: 'update' })
      .mockResolvedValueOnce({ projectRoot: '', basePackage: 'com.example' });

    const { configCommand } = await import('../../src/commands/config.js');
    await configCommand();

    expect(storage.has('projectRoot')).toBe(false);
    expect(storage.get('basePackage')).toBe('com.example');
  });

  it('shows current defaults and can cancel', async () => {
    storage.set('basePackage', 'org.acme');
    mockPrompt.mockResolvedValueOnce({ action: 'cancel' });

    const { configCommand } = await import('../../src/commands/config.js');
    await configCommand();

    expect(mockPrompt).toHaveBeenCalledTimes(1);
    const output = consoleLogs.join('\n');
    expect(output).toContain('Current project root: (working directory)');
    expect(output).toContain('Current base package: org.acme');
    expect(storage.get('basePackage')).toBe('org.acme');
  });

  it('clears defaults', async () => {
    storage.set('projectRoot', tempDir);
    storage.set('basePackage', 'org.acme');
    mockPrompt.mockResolvedValueOnce({ action: 'clear' });

    const { configCommand } = await import('../../src/commands/config.js');
    await configCommand();

    expect(storage.size).toBe(0);
    expect(consoleLogs.join('\n')).toContain('Defaults cleared.');
  });
});

describe('prompt validation', () => {
  it('accepts empty or existing project roots', async () => {
    const { validateProjectRoot } = await import('../../src/commands/config.js');

    expect(validateProjectRoot('')).toBe(true);
    expect(validateProjectRoot(os.tmpdir())).toBe(true);
    expect(validateProjectRoot(path.join(os.tmpdir(), 'layerforge-missing-dir'))).toBe(
      'Please enter an existing directory'
    );
  });

  it('accepts dotted Java packages', async () => {
    const { validateBasePackage } = await import('../../src/commands/config.js');

    expect(validateBasePackage('com.example')).toBe(true);
    expect(validateBasePackage('com.')).toBe('Please enter a dotted Java package name, e.g. com.example');
  });
});

describe('getGlobalDefaults', () => {
  afterEach(() => {
    delete process.env.LAYERFORGE_BASE_PACKAGE;
    storage.clear();
  });

  it('prefers environment variables over stored defaults', async () => {
    storage.set('basePackage', 'org.stored');
    process.env.LAYERFORGE_BASE_PACKAGE = 'org.env';

    const { getGlobalDefaults } = await import('../../src/commands/config.js');

    expect(getGlobalDefaults().basePackage).toBe('org.env');
  });

  it('falls back to stored defaults', async () => {
    storage.set('basePackage', 'org.stored');

    const { getGlobalDefaults } = await import('../../src/commands/config.js');

    expect(getGlobalDefaults().basePackage).toBe('org.stored');
  });
});
