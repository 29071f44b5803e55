/**
 * Confgate Runtime Host: Log Reader
 *
 * Reads JSONL audit text with dedupe-on-read. No I/O: callers get the raw
 * text from StateIO.readLogRaw().
 *
 * - Lines that are not JSON objects with a string `event_id` are dropped
 *   and counted in `malformed`.
 * - The first line with a given event_id wins; later copies are counted
 *   in `duplicates`.
 * - Text that does not end in '\n' has a partial last line. It is dropped
 *   and `partialTrailingLine` is set.
 * - Events come back sorted by (timestamp, event_id).
 */

export interface LogEvent {
  readonly event_id: string;
  readonly timestamp?: string | undefined;
  readonly [field: string]: unknown;
}

export interface LogReadStats {
  /** Non-empty complete lines seen. */
  readonly totalLines: number;
  readonly parsedEvents: number;
  readonly duplicates: number;
  readonly malformed: number;
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly events: ReadonlyArray<LogEvent>;
  readonly stats: LogReadStats;
}

export function readLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const lines = rawContent.split('\n');
  // The element after the last '\n' is either '' or a partial line.
  lines.pop();
  const complete = lines.filter((l) => l.trim().length > 0);

  const seen = new Set<string>();
  const events: LogEvent[] = [];
  let duplicates = 0;
  let malformed = 0;

  for (const line of complete) {
    const event = parseEvent(line);
    if (event === null) {
      malformed++;
    } else if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.add(event.event_id);
      events.push(event);
    }
  }

  events.sort(compareEvents);
  return {
    events,
    stats: {
      totalLines: complete.length,
      parsedEvents: events.length,
      duplicates,
      malformed,
      partialTrailingLine,
    },
  };
}

function parseEvent(line: string): LogEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
  const fields: Readonly<Record<string, unknown>> = { ...parsed };
  const id = fields['event_id'];
  if (typeof id !== 'string' || id === '') return null;
  const timestamp = fields['timestamp'];
  return { ...fields, event_id: id, timestamp: typeof timestamp === 'string' ? timestamp : undefined };
}

function compareEvents(a: LogEvent, b: LogEvent): number {
  const ta = a.timestamp ?? '';
  const tb = b.timestamp ?? '';
  if (ta !== tb) return ta < tb ? -1 : 1;
  if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
  return 0;
}
