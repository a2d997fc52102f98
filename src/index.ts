export { HarnessContext } from './harness/context.js';
export { ScratchWorkspace } from './workspace/scratch.js';
export type { ScratchContent, ScratchWorkspaceOptions } from './workspace/scratch.js';
export { RunfilesResolver, parseManifest } from './workspace/runfiles.js';
export type { RunfilesOptions } from './workspace/runfiles.js';
export { runCommand, runOrThrow, splitLines } from './process/runner.js';
export type { CommandInvocation, CommandResult, RunOptions } from './process/runner.js';
export { extractLogReferences, LOG_REFERENCE_MARKER } from './diagnostics/log-references.js';
export type { LogReference } from './diagnostics/log-references.js';
export { buildFailureReport, formatFailureReport } from './diagnostics/report.js';
export type { DiagnosticReport, ReferencedLog, FailureReportOptions } from './diagnostics/report.js';
export { loadConfig, HarnessConfigSchema } from './config/loader.js';
export type { HarnessConfig, HarnessConfigInput, LoadConfigOptions } from './config/loader.js';
export { HarnessError, HarnessErrorCode } from './shared/errors.js';
export { logger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';
