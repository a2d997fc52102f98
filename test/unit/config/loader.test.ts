import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { loadConfig } from '../../../src/config/loader.js';
import { HarnessErrorCode } from '../../../src/shared/errors.js';

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'harness-config-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('returns defaults with no file and an empty environment', async () => {
    const config = await loadConfig({ env: {} });
    expect(config).toEqual({
      tool: 'bazel',
      startupArgs: [],
      workspaceBase: os.tmpdir(),
      env: {},
      logLevel: 'info',
    });
  });

  it('treats a missing config file as defaults', async () => {
    const config = await loadConfig({ path: path.join(tmpDir, 'absent.yaml'), env: {} });
    expect(config.tool).toBe('bazel');
  });

  it('reads a YAML file and lets the environment override it', async () => {
    const file = path.join(tmpDir, 'harness.yaml');
    await fs.writeFile(
      file,
      ['tool: /opt/tools/bazel', 'toolVersion: "6.4.0"', 'startupArgs: [--batch]', 'env:', '  CC: clang'].join('\n')
    );

    const config = await loadConfig({
      env: { HARNESS_CONFIG: file, HARNESS_TOOL_VERSION: '7.1.0', TEST_SRCDIR: '/runfiles' },
    });

    expect(config.tool).toBe('/opt/tools/bazel');
    expect(config.toolVersion).toBe('7.1.0');
    expect(config.startupArgs).toEqual(['--batch']);
    expect(config.env).toEqual({ CC: 'clang' });
    expect(config.runfilesDir).toBe('/runfiles');
  });

  it('prefers RUNFILES_DIR over TEST_SRCDIR', async () => {
    const config = await loadConfig({ env: { RUNFILES_DIR: '/a', TEST_SRCDIR: '/b', RUNFILES_MANIFEST_FILE: '/m' } });
    expect(config.runfilesDir).toBe('/a');
    expect(config.runfilesManifest).toBe('/m');
  });

  it('applies explicit overrides last', async () => {
    const config = await loadConfig({ env: { HARNESS_TOOL: 'from-env' }, overrides: { tool: 'from-override' } });
    expect(config.tool).toBe('from-override');
  });

  it('rejects malformed YAML with INVALID_CONFIG', async () => {
    const file = path.join(tmpDir, 'bad.yaml');
    await fs.writeFile(file, 'tool: [unclosed');
    await expect(loadConfig({ path: file, env: {} })).rejects.toMatchObject({ code: HarnessErrorCode.INVALID_CONFIG });
  });

  it('rejects a non-mapping document with INVALID_CONFIG', async () => {
    const file = path.join(tmpDir, 'list.yaml');
    await fs.writeFile(file, '- a\n- b\n');
    await expect(loadConfig({ path: file, env: {} })).rejects.toMatchObject({ code: HarnessErrorCode.INVALID_CONFIG });
  });

  it('rejects values that fail the schema with INVALID_CONFIG', async () => {
    await expect(loadConfig({ env: { HARNESS_LOG_LEVEL: 'loud' } })).rejects.toMatchObject({
      code: HarnessErrorCode.INVALID_CONFIG,
    });
    const file = path.join(tmpDir, 'wrong-type.yaml');
    await fs.writeFile(file, 'startupArgs: --batch\n');
    await expect(loadConfig({ path: file, env: {} })).rejects.toMatchObject({ code: HarnessErrorCode.INVALID_CONFIG });
  });
});
