/**
 * Confgate Runtime Host: Home Directory Resolution
 *
 * Precedence:
 *
 *   1. Explicit `home` option (the CLI's --home flag)
 *   2. CONFGATE_HOME environment variable
 *   3. OS application config file (the last home persisted with --home)
 *   4. Default: ~/.confgate
 *
 * Layout under the resolved home:
 *
 *   <home>/
 *     state/config.json   runtime configuration
 *     logs/audit.jsonl    audit trail
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir, platform } from 'node:os';
import { z } from 'zod';

/**
 * Platform-specific location of the file remembering the last explicit home.
 *
 *   macOS:   ~/Library/Preferences/confgate/config.json
 *   Windows: %APPDATA%\confgate\config.json
 *   Linux:   $XDG_CONFIG_HOME/confgate/config.json, else ~/.config/confgate/config.json
 */
export function getOsConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'confgate', 'config.json');
    case 'win32':
      return join(env['APPDATA'] ?? join(home, 'AppData', 'Roaming'), 'confgate', 'config.json');
    default: {
      const xdg = env['XDG_CONFIG_HOME'];
      return join(xdg !== undefined && xdg !== '' ? xdg : join(home, '.config'), 'confgate', 'config.json');
    }
  }
}

const osConfigSchema = z.object({ home: z.string().min(1) });

/** The persisted home, or null when there is none or the file is unusable. */
export function readHomeFromOsConfig(configPath: string = getOsConfigPath()): string | null {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch {
    return null;
  }
  const parsed = osConfigSchema.safeParse(raw);
  return parsed.success ? parsed.data.home : null;
}

export function writeHomeToOsConfig(home: string, configPath: string = getOsConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ home }, null, 2), 'utf-8');
}

export interface ResolveHomeOptions {
  readonly home?: string | undefined;
  /** Remember an explicit `home` in the OS config file. */
  readonly persist?: boolean | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Overrides getOsConfigPath(). */
  readonly osConfigPath?: string | undefined;
}

/**
 * Resolve the confgate home directory, creating it if needed.
 */
export function resolveHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const osConfigPath = opts.osConfigPath ?? getOsConfigPath(env);
  const fromEnv = env['CONFGATE_HOME'];

  let home: string;
  if (opts.home !== undefined && opts.home !== '') {
    home = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = readHomeFromOsConfig(osConfigPath) ?? join(homedir(), '.confgate');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  if (opts.persist === true && opts.home !== undefined && opts.home !== '') {
    writeHomeToOsConfig(home, osConfigPath);
  }
  return home;
}
