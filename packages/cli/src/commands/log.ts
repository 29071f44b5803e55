/**
 * confgate log: Query the audit trail
 *
 * Reads <home>/logs/audit.jsonl. Malformed lines are skipped and counted;
 * a partial trailing line (a write still in progress) is reported.
 */

import { Command } from 'commander';
import { AUDIT_LOG, FileStateIO, readLog, resolveHome } from '@confgate/runtime-host';
import { formatLogEvent, selectEvents } from '../output/format.js';
import { t } from '../output/theme.js';
import { fail, print } from './shared.js';

export const logCommand = new Command('log')
  .description('Query the audit log')
  .option('--status <status>', 'Filter by response status (OK, NOT_FOUND, VALIDATION_FAILED, ACCESS_DENIED, CALLBACK_ERROR)')
  .option('--limit <n>', 'Show only the most recent n entries')
  .option('--json', 'Output as JSON lines')
  .option('--home <dir>', 'Confgate home directory')
  .action((options: { status?: string; limit?: string; json?: boolean; home?: string }) => {
    let limit: number | undefined;
    if (options.limit !== undefined) {
      limit = Number(options.limit);
      if (!Number.isInteger(limit) || limit < 0) {
        fail(`--limit must be a non-negative integer, got "${options.limit}"`);
        return;
      }
    }

    const stateIO = new FileStateIO(resolveHome({ home: options.home }));
    const { events, stats } = readLog(stateIO.readLogRaw(AUDIT_LOG));
    const selected = selectEvents(events, { status: options.status, limit });

    if (options.json === true) {
      for (const event of selected) print(JSON.stringify(event));
      return;
    }

    if (selected.length === 0) {
      print(t.muted('(no entries)'));
    }
    for (const event of selected) print(formatLogEvent(event));

    const notes: string[] = [];
    if (stats.malformed > 0) notes.push(`${stats.malformed} malformed line(s) skipped`);
    if (stats.duplicates > 0) notes.push(`${stats.duplicates} duplicate event(s) dropped`);
    if (stats.partialTrailingLine) notes.push('last line is incomplete');
    if (notes.length > 0) print(t.amber(notes.join('; ')));
  });
