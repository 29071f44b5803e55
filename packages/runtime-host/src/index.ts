/**
 * @confgate/runtime-host
 *
 * Side-effectful wiring around the kernel: state and log I/O, the file
 * audit sink, home and configuration resolution, and the process runtime.
 *
 * The kernel defines interfaces; this package provides implementations.
 * No kernel code imports from this package.
 */

// StateIO
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Home and configuration
export type { ResolveHomeOptions } from './home.js';
export { getOsConfigPath, readHomeFromOsConfig, resolveHome, writeHomeToOsConfig } from './home.js';
export type { ConfigIssue, RuntimeConfig } from './config.js';
export { CONFIG_FILE, RuntimeConfigError, loadRuntimeConfig, runtimeConfigSchema, saveRuntimeConfig } from './config.js';

// Audit logging
export { AUDIT_LOG, FileAuditSink } from './logging/file-audit-sink.js';
export { decodeTime, ulid } from './logging/ulid.js';
export type { LogEvent, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readLog } from './logging/log-reader.js';

// Runtime
export type { RuntimeOptions } from './runtime.js';
export { Runtime, RuntimeAlreadyInitializedError, currentRuntime, initRuntime, shutdown } from './runtime.js';
