// Config loader: reads an optional harness YAML file, then layers environment overrides on top.
// A missing file means defaults; a malformed file or a schema violation is a setup defect and throws.
// Config shape lives in HarnessConfigSchema below; add new fields there and in applyEnvOverrides().
import fs from 'fs/promises';
import os from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { HarnessError, HarnessErrorCode, describeError, errnoCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const HarnessConfigSchema = z.object({
  tool: z.string().min(1).default('bazel'),
  toolVersion: z.string().min(1).optional(),
  // Prepended to every tool() invocation, e.g. a wrapper script path or --batch.
  startupArgs: z.array(z.string()).default([]),
  workspaceBase: z.string().min(1).default(os.tmpdir()),
  runfilesDir: z.string().min(1).optional(),
  runfilesManifest: z.string().min(1).optional(),
  env: z.record(z.string()).default({}),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: HarnessConfigInput;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<HarnessConfig> {
  const env = options.env ?? process.env;
  const configPath = options.path ?? env['HARNESS_CONFIG'];

  const fromFile = configPath ? await readConfigFile(configPath) : {};
  const merged = { ...fromFile, ...applyEnvOverrides(env), ...(options.overrides ?? {}) };

  const parsed = HarnessConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `Invalid harness config: ${parsed.error.message}`, {
      configPath,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      logger.debug({ configPath }, 'No harness config file, using defaults');
      return {};
    }
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `Cannot read harness config: ${configPath}`, {
      cause: describeError(err),
    });
  }

  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (err) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `Invalid YAML in ${configPath}: ${describeError(err)}`);
  }

  if (doc === null || doc === undefined) return {};
  if (typeof doc !== 'object' || Array.isArray(doc)) {
    throw new HarnessError(HarnessErrorCode.INVALID_CONFIG, `Harness config must be a mapping: ${configPath}`);
  }
  return Object.fromEntries(Object.entries(doc));
}

function applyEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (env['HARNESS_TOOL']) out['tool'] = env['HARNESS_TOOL'];
  if (env['HARNESS_TOOL_VERSION']) out['toolVersion'] = env['HARNESS_TOOL_VERSION'];
  if (env['HARNESS_WORKSPACE_BASE']) out['workspaceBase'] = env['HARNESS_WORKSPACE_BASE'];
  const runfilesDir = env['RUNFILES_DIR'] ?? env['TEST_SRCDIR'];
  if (runfilesDir) out['runfilesDir'] = runfilesDir;
  if (env['RUNFILES_MANIFEST_FILE']) out['runfilesManifest'] = env['RUNFILES_MANIFEST_FILE'];
  if (env['HARNESS_LOG_LEVEL']) out['logLevel'] = env['HARNESS_LOG_LEVEL'];
  return out;
}
