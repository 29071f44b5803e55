/**
 * Confgate Runtime Host: StateIO
 *
 * An injectable I/O abstraction for the runtime's JSON state files and
 * append-only JSONL logs.
 *
 * Two implementations:
 *   - FileStateIO   durable file I/O under a confgate home directory
 *   - MemoryStateIO in-memory I/O for tests and embedded use
 *
 * The kernel never touches this interface; the runtime host wires its
 * implementations into the kernel's sink interfaces.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Reads and writes files addressed by bare filename.
 *
 * - readJson and writeJson address `<home>/state/`
 * - appendLine and readLogRaw address `<home>/logs/`
 */
export interface StateIO {
  /**
   * Read and parse a JSON state file.
   *
   * Returns undefined when the file is absent. Callers validate the
   * parsed value; nothing about its shape is assumed here.
   *
   * @throws {SyntaxError} if the file exists but is not JSON
   */
  readJson(filename: string): unknown;

  /** Serialize `value` as JSON, creating the state directory if needed. */
  writeJson(filename: string, value: unknown): void;

  /** Append one line (a newline is added) to a log file. */
  appendLine(logfilename: string, line: string): void;

  /** Raw text of a log file, or '' when the file does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * File-system StateIO rooted at a confgate home directory.
 *
 * Synchronous: an audit line is on disk before the dispatch that produced
 * it returns. Directories are created on first write. ENOENT on read maps
 * to "absent"; every other I/O error is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.homeDir, 'state', filename);
    let raw: string;
    try {
      raw = readFileSync(filePath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return undefined;
      throw err;
    }
    return JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    const stateDir = join(this.homeDir, 'state');
    mkdirSync(stateDir, { recursive: true });
    writeFileSync(join(stateDir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return '';
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Instances share nothing.
 *
 * State round-trips through JSON text so that tests see the same
 * serialization effects as FileStateIO (undefined members dropped, bigint
 * rejected).
 */
export class MemoryStateIO implements StateIO {
  private readonly files = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson(filename: string): unknown {
    const text = this.files.get(filename);
    return text === undefined ? undefined : JSON.parse(text);
  }

  writeJson(filename: string, value: unknown): void {
    this.files.set(filename, JSON.stringify(value));
  }

  /** Store raw text as a state file, valid JSON or not. Test setup only. */
  writeRaw(filename: string, text: string): void {
    this.files.set(filename, text);
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Every line appended to a log file, in order. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    return lines.length === 0 ? '' : lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
