import os from 'os';
import execa from 'execa';
import { HarnessError, HarnessErrorCode, describeError, errnoCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';

export interface CommandInvocation {
  command: string;
  args: readonly string[];
  cwd?: string;
  // Merged over the inherited environment unless extendEnv is false.
  env?: Record<string, string>;
  extendEnv?: boolean;
  timeoutMs?: number;
}

export interface RunOptions {
  logger?: Logger;
}

export interface CommandResult {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly exitCode: number;
  readonly stdoutLines: readonly string[];
  readonly stderrLines: readonly string[];
  readonly signal?: string;
  readonly timedOut: boolean;
  readonly durationMs: number;
}

/**
 * Runs a command to completion and captures both streams as line sequences.
 *
 * execa drains stdout and stderr concurrently while waiting for exit, so a chatty child
 * can never block on a full pipe. A nonzero exit is a normal result; only a failure to
 * start the process throws (LAUNCH_FAILURE).
 */
export async function runCommand(invocation: CommandInvocation, options: RunOptions = {}): Promise<CommandResult> {
  const log = options.logger ?? logger;
  const cwd = invocation.cwd ?? process.cwd();
  const start = performance.now();
  log.debug({ command: invocation.command, args: invocation.args, cwd }, 'Spawning command');

  let result: execa.ExecaReturnValue;
  try {
    result = await execa(invocation.command, [...invocation.args], {
      cwd,
      env: invocation.env,
      extendEnv: invocation.extendEnv ?? true,
      timeout: invocation.timeoutMs,
      reject: false,
      stripFinalNewline: false,
      maxBuffer: Infinity,
    });
  } catch (err) {
    throw launchFailure(invocation, cwd, err);
  }

  // With reject:false a spawn error (ENOENT, EACCES) comes back as a failed result with no exit code.
  const spawnCode = errnoCode(result);
  if (result.failed && spawnCode !== undefined && typeof result.exitCode !== 'number' && !result.timedOut) {
    throw launchFailure(invocation, cwd, result);
  }

  const signal = result.signal ?? undefined;
  const commandResult: CommandResult = Object.freeze({
    command: invocation.command,
    args: Object.freeze([...invocation.args]),
    cwd,
    exitCode: exitCodeOf(result.exitCode, signal),
    stdoutLines: Object.freeze(splitLines(result.stdout)),
    stderrLines: Object.freeze(splitLines(result.stderr)),
    signal,
    timedOut: result.timedOut,
    durationMs: Math.round(performance.now() - start),
  });
  log.debug(
    { command: invocation.command, exitCode: commandResult.exitCode, signal, durationMs: commandResult.durationMs },
    'Command exited'
  );
  return commandResult;
}

export async function runOrThrow(invocation: CommandInvocation, options: RunOptions = {}): Promise<CommandResult> {
  const result = await runCommand(invocation, options);
  if (result.exitCode !== 0) {
    throw new HarnessError(
      HarnessErrorCode.COMMAND_FAILED,
      `Command exited with ${result.exitCode}: ${invocation.command}`,
      {
        stdout: result.stdoutLines.join('\n'),
        stderr: result.stderrLines.join('\n'),
      }
    );
  }
  return result;
}

/** A final newline terminates the last line; it does not start an empty one. */
export function splitLines(text: string | undefined): string[] {
  if (!text) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

// Shell convention for signal deaths: 128 + signal number.
function exitCodeOf(exitCode: number | undefined, signal: string | undefined): number {
  if (typeof exitCode === 'number') return exitCode;
  if (signal) {
    const signum: number | undefined = Object.entries(os.constants.signals).find(([name]) => name === signal)?.[1];
    return 128 + (signum ?? 0);
  }
  return 1;
}

function launchFailure(invocation: CommandInvocation, cwd: string, err: unknown): HarnessError {
  return new HarnessError(HarnessErrorCode.LAUNCH_FAILURE, `Command failed to spawn: ${invocation.command}`, {
    cwd,
    errno: errnoCode(err),
    cause: describeError(err),
  });
}
