// Runfiles: resources prepared before the test run (build outputs, rule sources), addressed by
// logical path "<root>/<segment>/...". Two layouts are supported and may be combined:
//   - a manifest file with one "<logical path> <real path>" entry per line (checked first)
//   - a runfiles directory where the logical path is a relative path under the directory
// Resolution never retries: a missing resource is a test-setup defect.
import fs from 'fs/promises';
import path from 'path';
import { HarnessError, HarnessErrorCode, describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';
import type { ScratchWorkspace } from './scratch.js';
import type { HarnessConfig } from '../config/loader.js';

export interface RunfilesOptions {
  runfilesDir?: string;
  manifest?: ReadonlyMap<string, string>;
  logger?: Logger;
}

export class RunfilesResolver {
  private constructor(
    readonly runfilesDir: string | undefined,
    private readonly manifest: ReadonlyMap<string, string>,
    private readonly log: Logger
  ) {}

  static create(options: RunfilesOptions): RunfilesResolver {
    return new RunfilesResolver(options.runfilesDir, options.manifest ?? new Map(), options.logger ?? logger);
  }

  static async fromConfig(
    config: Pick<HarnessConfig, 'runfilesDir' | 'runfilesManifest'>,
    log: Logger = logger
  ): Promise<RunfilesResolver> {
    if (!config.runfilesDir && !config.runfilesManifest) {
      throw new HarnessError(
        HarnessErrorCode.INVALID_CONFIG,
        'No runfiles configured: set RUNFILES_DIR, TEST_SRCDIR or RUNFILES_MANIFEST_FILE'
      );
    }
    const manifest = config.runfilesManifest ? await readManifest(config.runfilesManifest) : undefined;
    return RunfilesResolver.create({ runfilesDir: config.runfilesDir, manifest, logger: log });
  }

  /** Absolute path of an existing runfile, e.g. resolveRunfile('my_rules', 'tools', 'BUILD'). */
  async resolveRunfile(root: string, ...segments: string[]): Promise<string> {
    const logical = [root, ...segments].join('/');
    for (const candidate of this.candidates(logical)) {
      if (await exists(candidate)) {
        this.log.debug({ logical, resolved: candidate }, 'Runfile resolved');
        return candidate;
      }
    }
    throw new HarnessError(HarnessErrorCode.RESOURCE_NOT_FOUND, `Runfile not found: ${logical}`, {
      runfilesDir: this.runfilesDir,
      manifestEntries: this.manifest.size,
    });
  }

  /** Copies a runfile byte-for-byte to a workspace-relative destination. */
  async copyIntoWorkspace(
    workspace: ScratchWorkspace,
    logicalSourcePath: string,
    destinationRelativePath: string
  ): Promise<string> {
    const [root, ...segments] = logicalSourcePath.split('/').filter(s => s !== '' && s !== '.');
    if (root === undefined) {
      throw new HarnessError(HarnessErrorCode.RESOURCE_NOT_FOUND, `Empty runfile path: "${logicalSourcePath}"`);
    }
    const source = await this.resolveRunfile(root, ...segments);
    const target = workspace.resolve(destinationRelativePath);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(source, target);
    } catch (err) {
      throw new HarnessError(
        HarnessErrorCode.IO_FAILURE,
        `Cannot copy ${logicalSourcePath} to ${destinationRelativePath}`,
        { source, target, cause: describeError(err) }
      );
    }
    return target;
  }

  private candidates(logical: string): string[] {
    const out: string[] = [];
    const mapped = this.manifest.get(logical);
    if (mapped) out.push(mapped);
    if (this.runfilesDir) out.push(path.resolve(this.runfilesDir, ...logical.split('/')));
    return out;
  }
}

export function parseManifest(text: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    if (!line.trim()) continue;
    // Logical paths never contain spaces; real paths may.
    const sep = line.indexOf(' ');
    if (sep <= 0) continue;
    entries.set(line.slice(0, sep), line.slice(sep + 1));
  }
  return entries;
}

async function readManifest(manifestPath: string): Promise<Map<string, string>> {
  try {
    return parseManifest(await fs.readFile(manifestPath, 'utf-8'));
  } catch (err) {
    throw new HarnessError(HarnessErrorCode.RESOURCE_NOT_FOUND, `Runfiles manifest unreadable: ${manifestPath}`, {
      cause: describeError(err),
    });
  }
}

async function exists(p: string): Promise<boolean> {
  return fs.access(p).then(() => true).catch(() => false);
}
