// Per-test-case harness: owns exactly one scratch workspace and, when configured, a runfiles
// resolver. Create it in beforeEach and dispose it in afterEach; nothing here is global.
import { loadConfig } from '../config/loader.js';
import type { HarnessConfig, LoadConfigOptions } from '../config/loader.js';
import { ScratchWorkspace } from '../workspace/scratch.js';
import { RunfilesResolver } from '../workspace/runfiles.js';
import { runCommand } from '../process/runner.js';
import type { CommandInvocation, CommandResult } from '../process/runner.js';
import { buildFailureReport, formatFailureReport } from '../diagnostics/report.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';

export class HarnessContext {
  private constructor(
    readonly config: HarnessConfig,
    readonly workspace: ScratchWorkspace,
    private readonly runfiles: RunfilesResolver | null,
    readonly log: Logger
  ) {}

  static async create(options: LoadConfigOptions = {}): Promise<HarnessContext> {
    const config = await loadConfig(options);
    // Level applies to this context only; the module logger is left alone.
    const log = logger.child({}, { level: config.logLevel });
    const runfiles =
      config.runfilesDir || config.runfilesManifest ? await RunfilesResolver.fromConfig(config, log) : null;
    const workspace = await ScratchWorkspace.create({ baseDir: config.workspaceBase, logger: log });
    return new HarnessContext(config, workspace, runfiles, log);
  }

  get toolVersion(): string | undefined {
    return this.config.toolVersion;
  }

  scratchFile(relativePath: string, ...content: string[]): Promise<string> {
    return this.workspace.scratchFile(relativePath, ...content);
  }

  scratchBytes(relativePath: string, data: Uint8Array): Promise<string> {
    return this.workspace.scratchBytes(relativePath, data);
  }

  scratchExecutableFile(relativePath: string, ...content: string[]): Promise<string> {
    return this.workspace.scratchExecutableFile(relativePath, ...content);
  }

  newWorkspace(): Promise<string> {
    return this.workspace.newWorkspace();
  }

  workspaceContents(): Promise<string[]> {
    return this.workspace.workspaceContents();
  }

  listRelative(): Promise<string[]> {
    return this.workspace.listRelative();
  }

  findPath(relativePath: string): Promise<string | undefined> {
    return this.workspace.findPath(relativePath);
  }

  async getRunfile(root: string, ...segments: string[]): Promise<string> {
    return this.requireRunfiles().resolveRunfile(root, ...segments);
  }

  async copyFromRunfiles(logicalSourcePath: string, destinationRelativePath: string): Promise<string> {
    return this.requireRunfiles().copyIntoWorkspace(this.workspace, logicalSourcePath, destinationRelativePath);
  }

  /** Invocation of the configured build tool; startup args come first. */
  tool(...args: string[]): CommandInvocation {
    return {
      command: this.config.tool,
      args: [...this.config.startupArgs, ...args],
      env: { ...this.config.env },
    };
  }

  run(invocation: CommandInvocation): Promise<CommandResult> {
    return runCommand({ ...invocation, cwd: invocation.cwd ?? this.workspace.root }, { logger: this.log });
  }

  /** Throws EXIT_CODE_MISMATCH carrying the full failure report when the exit code is unexpected. */
  async expectExitCode(result: CommandResult, expected = 0): Promise<void> {
    if (result.exitCode === expected) return;
    const report = await buildFailureReport(result, this.workspace, { expectedExitCode: expected, logger: this.log });
    throw new HarnessError(HarnessErrorCode.EXIT_CODE_MISMATCH, formatFailureReport(report), { report });
  }

  async dispose(): Promise<void> {
    await this.workspace.dispose();
  }

  private requireRunfiles(): RunfilesResolver {
    if (!this.runfiles) {
      throw new HarnessError(
        HarnessErrorCode.INVALID_CONFIG,
        'No runfiles configured: set RUNFILES_DIR, TEST_SRCDIR or RUNFILES_MANIFEST_FILE'
      );
    }
    return this.runfiles;
  }
}
