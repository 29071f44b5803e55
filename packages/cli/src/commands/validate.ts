/**
 * confgate validate: Validate a JSON payload against the node at a path
 *
 * A path ending in a keyed list entry (`list[k='v']`) validates one entry
 * and checks the payload's keys against the predicates. An rpc path
 * validates the rpc input.
 */

import { Command } from 'commander';
import { Validator } from '@confgate/kernel';
import type { ValidationOutcome } from '@confgate/kernel';
import { NodeKind } from '@confgate/schema';
import { formatOutcome } from '../output/format.js';
import { fail, loadTree, parseJsonArg, print } from './shared.js';

export const validateCommand = new Command('validate')
  .description('Validate a JSON payload against the schema node at a data path')
  .argument('<schema>', 'Path to the compiled schema artifact (JSON)')
  .argument('<path>', 'Data path of the target node')
  .argument('<json>', 'Payload as JSON text')
  .option('--merge', 'Treat the payload as a partial update (no mandatory or default handling)')
  .action((schema: string, path: string, json: string, options: { merge?: boolean }) => {
    const tree = loadTree(schema);
    if (tree === null) return;
    const resolved = tree.resolve(path);
    if (!resolved.ok) {
      fail(`Not found (${resolved.reason}): ${resolved.detail}`);
      return;
    }
    const payload = parseJsonArg('Payload', json);
    if (!payload.ok) return;

    const validator = new Validator(tree);
    const validateOptions = { partial: options.merge === true, path: resolved.instancePath };
    const target = resolved.node;
    const keyed = (resolved.segments[resolved.segments.length - 1]?.keys.length ?? 0) > 0;

    let outcome: ValidationOutcome;
    if (target.kind === NodeKind.List && keyed) {
      outcome = validator.validateEntry(target, payload.value, validateOptions);
    } else {
      outcome = validator.validate(target, payload.value, validateOptions);
    }
    print(formatOutcome(outcome));
    if (!outcome.ok) process.exitCode = 1;
  });
