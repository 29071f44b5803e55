/**
 * Confgate Runtime Host: Runtime Configuration
 *
 * Read from `state/config.json` through StateIO, overlaid with environment
 * variables, then validated with zod. An absent file means all defaults.
 *
 *   CONFGATE_CALLBACK_TIMEOUT_MS   overrides callback_timeout_ms
 *   CONFGATE_UNCONSTRAINED         overrides unconstrained (audit | reject)
 */

import { z } from 'zod';
import { MAX_CALLBACK_TIMEOUT_MS } from '@confgate/kernel';
import type { StateIO } from './state/state-io.js';

export const CONFIG_FILE = 'config.json';

export const runtimeConfigSchema = z
  .object({
    callback_timeout_ms: z.number().int().positive().max(MAX_CALLBACK_TIMEOUT_MS).default(5000),
    unconstrained: z.enum(['audit', 'reject']).default('audit'),
    schema_path: z.string().min(1).optional(),
    policy_path: z.string().min(1).optional(),
  })
  .strict();

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/** Thrown when the configuration file or an override is invalid. */
export class RuntimeConfigError extends Error {
  constructor(readonly issues: ReadonlyArray<ConfigIssue>) {
    super(`Invalid runtime configuration:\n${issues.map((i) => `  ${i.path}: ${i.message}`).join('\n')}`);
    this.name = 'RuntimeConfigError';
  }
}

/**
 * Load the effective configuration.
 *
 * @throws {RuntimeConfigError} on a malformed file or an invalid value
 */
export function loadRuntimeConfig(stateIO: StateIO, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  let stored: unknown;
  try {
    stored = stateIO.readJson(CONFIG_FILE) ?? {};
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      throw new RuntimeConfigError([{ path: CONFIG_FILE, message: `invalid JSON: ${err.message}` }]);
    }
    throw err;
  }
  if (typeof stored !== 'object' || stored === null || Array.isArray(stored)) {
    throw new RuntimeConfigError([{ path: CONFIG_FILE, message: 'expected a JSON object' }]);
  }

  const merged: Record<string, unknown> = { ...stored };
  const timeout = env['CONFGATE_CALLBACK_TIMEOUT_MS'];
  if (timeout !== undefined && timeout !== '') {
    merged['callback_timeout_ms'] = Number(timeout);
  }
  const unconstrained = env['CONFGATE_UNCONSTRAINED'];
  if (unconstrained !== undefined && unconstrained !== '') {
    merged['unconstrained'] = unconstrained;
  }

  const result = runtimeConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new RuntimeConfigError(
      result.error.issues.map((issue) => ({ path: issue.path.join('.') || CONFIG_FILE, message: issue.message })),
    );
  }
  return result.data;
}

/** Persist a configuration. Only explicitly set fields are written. */
export function saveRuntimeConfig(stateIO: StateIO, config: Partial<RuntimeConfig>): void {
  stateIO.writeJson(CONFIG_FILE, runtimeConfigSchema.partial().parse(config));
}
