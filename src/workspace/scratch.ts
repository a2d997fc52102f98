// Scratch workspace: one isolated directory tree per test case.
// Every generation gets its own directory: <base>/workspace-<n>.
// All caller paths are relative to the current root; anything absolute or escaping the root is rejected.
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { HarnessError, HarnessErrorCode, describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';

export type ScratchContent = string | readonly string[] | Uint8Array;

export interface ScratchWorkspaceOptions {
  baseDir?: string;
  prefix?: string;
  logger?: Logger;
}

const EXECUTABLE_MODE = 0o755;

export class ScratchWorkspace {
  private currentGeneration = 0;
  private currentRoot = '';
  private disposed = false;

  private constructor(
    readonly baseDir: string,
    private readonly log: Logger
  ) {}

  static async create(options: ScratchWorkspaceOptions = {}): Promise<ScratchWorkspace> {
    const parent = options.baseDir ?? os.tmpdir();
    let baseDir: string;
    try {
      await fs.mkdir(parent, { recursive: true });
      baseDir = await fs.mkdtemp(path.join(parent, options.prefix ?? 'harness-'));
    } catch (err) {
      throw new HarnessError(HarnessErrorCode.IO_FAILURE, `Cannot create workspace base under ${parent}`, {
        cause: describeError(err),
      });
    }
    const workspace = new ScratchWorkspace(baseDir, options.logger ?? logger);
    await workspace.newWorkspace();
    return workspace;
  }

  get root(): string {
    return this.currentRoot;
  }

  get generation(): number {
    return this.currentGeneration;
  }

  // Maps a workspace-relative path to an absolute one inside the current root.
  resolve(relativePath: string): string {
    this.assertActive();
    if (path.isAbsolute(relativePath)) {
      throw new HarnessError(HarnessErrorCode.IO_FAILURE, `Scratch paths must be relative: ${relativePath}`);
    }
    const target = path.resolve(this.currentRoot, relativePath);
    const rel = path.relative(this.currentRoot, target);
    if (rel === '' || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
      throw new HarnessError(HarnessErrorCode.IO_FAILURE, `Path escapes the workspace root: ${relativePath}`, {
        root: this.currentRoot,
      });
    }
    return target;
  }

  /** Writes lines joined with the platform newline. No lines gives an empty file. */
  async scratchFile(relativePath: string, ...content: string[]): Promise<string> {
    return this.write(relativePath, content);
  }

  async scratchBytes(relativePath: string, data: Uint8Array): Promise<string> {
    return this.write(relativePath, data);
  }

  async scratchExecutableFile(relativePath: string, ...content: string[]): Promise<string> {
    const target = await this.write(relativePath, content);
    try {
      await fs.chmod(target, EXECUTABLE_MODE);
    } catch (err) {
      throw new HarnessError(HarnessErrorCode.IO_FAILURE, `Cannot make ${relativePath} executable`, {
        cause: describeError(err),
      });
    }
    return target;
  }

  async write(relativePath: string, content: ScratchContent): Promise<string> {
    const target = this.resolve(relativePath);
    const data = typeof content === 'string' || content instanceof Uint8Array ? content : content.join(os.EOL);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, data);
    } catch (err) {
      throw new HarnessError(HarnessErrorCode.IO_FAILURE, `Cannot write scratch file ${relativePath}`, {
        target,
        cause: describeError(err),
      });
    }
    this.log.debug({ path: relativePath, generation: this.currentGeneration }, 'Scratch file written');
    return target;
  }

  /** Discards the current tree and starts an empty generation. Returns the new root. */
  async newWorkspace(): Promise<string> {
    this.assertNotDisposed();
    const previous = this.currentRoot;
    const next = path.join(this.baseDir, `workspace-${this.currentGeneration + 1}`);
    try {
      if (previous) await fs.rm(previous, { recursive: true, force: true });
      await fs.rm(next, { recursive: true, force: true });
      await fs.mkdir(next, { recursive: true });
    } catch (err) {
      // The previous root may already be gone; no generation is active until a reset succeeds.
      this.currentRoot = '';
      throw new HarnessError(HarnessErrorCode.IO_FAILURE, `Cannot reset workspace under ${this.baseDir}`, {
        cause: describeError(err),
      });
    }
    this.currentGeneration += 1;
    this.currentRoot = next;
    this.log.debug({ root: next, generation: this.currentGeneration }, 'Workspace created');
    return next;
  }

  /** Absolute paths of every file under the root, sorted. */
  async workspaceContents(): Promise<string[]> {
    const relative = await this.listRelative();
    return relative.map(rel => path.join(this.currentRoot, ...rel.split('/')));
  }

  /** Same listing as workspaceContents(), as POSIX paths relative to the root. */
  async listRelative(): Promise<string[]> {
    this.assertActive();
    const files: string[] = [];
    try {
      await walk(this.currentRoot, '', files);
    } catch (err) {
      throw new HarnessError(HarnessErrorCode.IO_FAILURE, `Cannot list workspace ${this.currentRoot}`, {
        cause: describeError(err),
      });
    }
    return files.sort();
  }

  async findPath(relativePath: string): Promise<string | undefined> {
    const wanted = path.posix.normalize(relativePath.split(path.sep).join('/'));
    const listing = await this.listRelative();
    const hit = listing.find(rel => rel === wanted);
    return hit === undefined ? undefined : path.join(this.currentRoot, ...hit.split('/'));
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await fs.rm(this.baseDir, { recursive: true, force: true });
    this.log.debug({ baseDir: this.baseDir }, 'Workspace disposed');
  }

  private assertActive(): void {
    this.assertNotDisposed();
    if (!this.currentRoot) {
      throw new HarnessError(
        HarnessErrorCode.IO_FAILURE,
        `No active workspace under ${this.baseDir}: the last reset failed, call newWorkspace() again`
      );
    }
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new HarnessError(HarnessErrorCode.IO_FAILURE, `Workspace has been disposed: ${this.baseDir}`);
    }
  }
}

async function walk(dir: string, prefix: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      await walk(path.join(dir, entry.name), rel, out);
    } else {
      out.push(rel);
    }
  }
}
