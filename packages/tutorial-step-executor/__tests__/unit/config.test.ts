import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { findConfigFile, loadConfig, parseBooleanEnv } from '../../src/config.js';
import { ConfigError } from '../../src/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'docdrift-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return defaults without a file or environment', () => {
    const config = loadConfig({ cwd: dir, env: {} });
    expect(config).toEqual({
      verbosity: 'normal',
      allowUnsafePaths: false,
      keepWorkspace: false,
      createParentDirs: false,
      vars: {},
      configPath: undefined,
    });
  });

  it('should read docdrift.yml from a parent directory', async () => {
    const configPath = join(dir, 'docdrift.yml');
    await writeFile(configPath, 'verbosity: verbose\ncreateParentDirs: true\nvars:\n  PORT: 8080\n  NAME: demo\n');
    const nested = join(dir, 'docs', 'guides');
    await mkdir(nested, { recursive: true });

    const config = loadConfig({ cwd: nested, env: {} });
    expect(config.verbosity).toBe('verbose');
    expect(config.createParentDirs).toBe(true);
    expect(config.vars).toEqual({ PORT: '8080', NAME: 'demo' });
    expect(config.configPath).toBe(configPath);
  });

  it('should let the environment override the file', async () => {
    await writeFile(join(dir, 'docdrift.yaml'), 'verbosity: verbose\nallowUnsafePaths: false\n');
    const config = loadConfig({
      cwd: dir,
      env: { DOCDRIFT_VERBOSITY: 'QUIET', DOCDRIFT_ALLOW_UNSAFE_PATHS: 'yes', DOCDRIFT_WORKSPACE_ROOT: '/var/tmp/dd' },
    });
    expect(config.verbosity).toBe('quiet');
    expect(config.allowUnsafePaths).toBe(true);
    expect(config.workspaceRoot).toBe('/var/tmp/dd');
  });

  it('should reject a non-boolean environment value', () => {
    expect(() => loadConfig({ cwd: dir, env: { DOCDRIFT_KEEP_WORKSPACE: 'maybe' } })).toThrow(
      'DOCDRIFT_KEEP_WORKSPACE must be a boolean (true/false), got "maybe"'
    );
  });

  it('should reject an unknown verbosity', () => {
    expect(() => loadConfig({ cwd: dir, env: { DOCDRIFT_VERBOSITY: 'loud' } })).toThrow(ConfigError);
  });

  it('should reject unknown keys', async () => {
    await writeFile(join(dir, 'docdrift.yml'), 'colour: red\n');
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/colour/);
  });

  it('should reject invalid variable names', async () => {
    await writeFile(join(dir, 'docdrift.yml'), 'vars:\n  1st: x\n');
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigError);
  });

  it('should wrap YAML syntax errors', async () => {
    await writeFile(join(dir, 'docdrift.yml'), 'vars: [\n');
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/^Failed to read config file /);
  });

  it('should require a mapping at the top level', async () => {
    const configPath = join(dir, 'docdrift.yml');
    await writeFile(configPath, '- a\n- b\n');
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(`Config file ${configPath} must contain a mapping`);
  });

  it('should treat an empty file as no settings', async () => {
    await writeFile(join(dir, 'docdrift.yml'), '');
    expect(loadConfig({ cwd: dir, env: {} }).verbosity).toBe('normal');
  });

  it('should load an explicit config path', async () => {
    await writeFile(join(dir, 'ci.yml'), 'keepWorkspace: true\n');
    const config = loadConfig({ cwd: dir, env: {}, configPath: 'ci.yml' });
    expect(config.keepWorkspace).toBe(true);
    expect(config.configPath).toBe(join(dir, 'ci.yml'));
  });

  it('should fail on a missing explicit config path', () => {
    expect(() => loadConfig({ cwd: dir, env: {}, configPath: 'nope.yml' })).toThrow(
      `Config file not found: ${join(dir, 'nope.yml')}`
    );
  });
});

describe('findConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'docdrift-find-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should prefer docdrift.yml over docdrift.yaml', async () => {
    await writeFile(join(dir, 'docdrift.yml'), '');
    await writeFile(join(dir, 'docdrift.yaml'), '');
    expect(findConfigFile(dir)).toBe(join(dir, 'docdrift.yml'));
  });
});

describe('parseBooleanEnv', () => {
  it('should accept common spellings', () => {
    expect(parseBooleanEnv('X', 'TRUE')).toBe(true);
    expect(parseBooleanEnv('X', '1')).toBe(true);
    expect(parseBooleanEnv('X', 'on')).toBe(true);
    expect(parseBooleanEnv('X', 'No')).toBe(false);
    expect(parseBooleanEnv('X', '0')).toBe(false);
  });
});
