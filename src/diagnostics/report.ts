import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Logger } from '../shared/logger.js';
import { splitLines } from '../process/runner.js';
import type { CommandResult } from '../process/runner.js';
import type { ScratchWorkspace } from '../workspace/scratch.js';
import { extractLogReferences } from './log-references.js';
import type { LogReference } from './log-references.js';

export type ReferencedLog =
  | { status: 'read'; reference: LogReference; resolvedPath: string; lines: string[] }
  | { status: 'unavailable'; reference: LogReference; resolvedPath: string; reason: string };

export interface DiagnosticReport {
  exitCode: number;
  expectedExitCode?: number;
  stderrLines: readonly string[];
  workspaceListing: string[];
  listingError?: string;
  logs: ReferencedLog[];
}

export interface FailureReportOptions {
  expectedExitCode?: number;
  logger?: Logger;
}

/**
 * Collects everything needed to explain an unexpected exit: raw stderr, the workspace
 * listing, and the contents of every log stderr points at.
 *
 * Never throws and never touches the workspace or the result. A log that cannot be read
 * is recorded as unavailable so the original failure stays visible.
 */
export async function buildFailureReport(
  result: CommandResult,
  workspace: ScratchWorkspace,
  options: FailureReportOptions = {}
): Promise<DiagnosticReport> {
  const log = options.logger ?? logger;
  let workspaceListing: string[] = [];
  let listingError: string | undefined;
  try {
    workspaceListing = await workspace.workspaceContents();
  } catch (err) {
    listingError = describeError(err);
    log.warn({ error: listingError }, 'Workspace listing unavailable for failure report');
  }

  const logs: ReferencedLog[] = [];
  for (const reference of extractLogReferences(result.stderrLines)) {
    const resolvedPath = path.resolve(result.cwd, reference.path);
    try {
      const text = await fs.readFile(resolvedPath, 'utf-8');
      logs.push({ status: 'read', reference, resolvedPath, lines: splitLines(text) });
    } catch (err) {
      const reason = describeError(err);
      log.warn({ path: resolvedPath, error: reason }, 'Referenced log unavailable');
      logs.push({ status: 'unavailable', reference, resolvedPath, reason });
    }
  }

  return {
    exitCode: result.exitCode,
    expectedExitCode: options.expectedExitCode,
    stderrLines: result.stderrLines,
    workspaceListing,
    listingError,
    logs,
  };
}

export function formatFailureReport(report: DiagnosticReport): string {
  const nl = os.EOL;
  const header =
    report.expectedExitCode === undefined
      ? ` exit code was ${report.exitCode}`
      : ` exit code was ${report.exitCode}, expected ${report.expectedExitCode}`;

  const lines: string[] = [header, 'Workspace contents:'];
  if (report.listingError) {
    lines.push(`Workspace listing unavailable: ${report.listingError}`);
  } else {
    lines.push(...report.workspaceListing);
  }
  lines.push('std-error:', ...report.stderrLines);

  if (report.logs.length > 0) {
    lines.push('Contents of internal test logs:', '*******************************');
    for (const log of report.logs) {
      lines.push('Log path:', log.resolvedPath);
      if (log.status === 'read') {
        lines.push('Log contents:', ...log.lines.map((text, i) => `${i + 1}: ${text}`));
      } else {
        lines.push(`Log unavailable: ${log.reason}`);
      }
    }
  }
  return lines.join(nl);
}
