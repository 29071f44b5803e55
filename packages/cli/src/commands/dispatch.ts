/**
 * confgate dispatch: Run one request through the full kernel pipeline
 *
 * Every top-level schema node is served by an echo handler. Writes and
 * notifications echo their validated payload; reads and rpcs answer with
 * the --response JSON when one is given. Each call is audited to
 * <home>/logs/audit.jsonl. With --no-audit the home directory is never
 * resolved or read, and the configuration is defaults plus environment.
 */

import { Command } from 'commander';
import { EditMode, HandlerRegistry, MemoryAuditSink, RequestKind, ResponseStatus } from '@confgate/kernel';
import type { Handler, HandlerCall, HandlerResult } from '@confgate/kernel';
import { MemoryStateIO, initRuntime, shutdown } from '@confgate/runtime-host';
import type { ConstraintTree } from '@confgate/schema';
import { formatEnvelope } from '../output/format.js';
import { errorMessage, fail, loadPolicy, loadTree, parseJsonArg, print } from './shared.js';

const KINDS: ReadonlyArray<string> = Object.values(RequestKind);
const EDITS: ReadonlyArray<string> = Object.values(EditMode);

function isKind(value: string): value is RequestKind {
  return KINDS.includes(value);
}

function isEdit(value: string): value is EditMode {
  return EDITS.includes(value);
}

/** A handler answering every call with `response`, or with the call's own value. */
export function echoHandler(response?: unknown): Handler {
  return {
    async handle(call: HandlerCall): Promise<HandlerResult> {
      return { ok: true, payload: response !== undefined ? response : call.value };
    },
  };
}

/** Register `handler` on every top-level node of the tree. */
export function registerEverywhere(tree: ConstraintTree, handler: Handler): HandlerRegistry {
  const registry = new HandlerRegistry();
  for (const root of tree.roots()) registry.register(root.path, handler);
  return registry;
}

interface DispatchOptions {
  kind: string;
  payload?: string;
  edit: string;
  class: string;
  principal: string;
  response?: string;
  timeout?: string;
  home?: string;
  audit: boolean;
}

export const dispatchCommand = new Command('dispatch')
  .description('Resolve, validate, authorize and invoke one request against an echo handler')
  .argument('<schema>', 'Path to the compiled schema artifact (JSON)')
  .argument('<policy>', 'Path to the policy document (JSON)')
  .argument('<path>', 'Data path of the target node')
  .option('--kind <kind>', `Request kind: ${KINDS.join(', ')}`, RequestKind.Read)
  .option('--payload <json>', 'Request payload as JSON text')
  .option('--edit <mode>', `Write mode: ${EDITS.join(', ')}`, EditMode.Replace)
  .requiredOption('--class <class>', 'Principal class of the caller')
  .option('--principal <id>', 'Principal id of the caller', 'cli')
  .option('--response <json>', 'Payload the echo handler answers reads and rpcs with')
  .option('--timeout <ms>', 'Callback timeout in milliseconds')
  .option('--home <dir>', 'Confgate home directory (audit log location)')
  .option('--no-audit', 'Do not write the call to the audit log')
  .action(async (schema: string, policyPath: string, path: string, options: DispatchOptions) => {
    if (!isKind(options.kind)) {
      fail(`Unknown request kind "${options.kind}". Expected one of: ${KINDS.join(', ')}`);
      return;
    }
    if (!isEdit(options.edit)) {
      fail(`Unknown edit mode "${options.edit}". Expected one of: ${EDITS.join(', ')}`);
      return;
    }
    const tree = loadTree(schema);
    if (tree === null) return;
    const policy = loadPolicy(policyPath, tree);
    if (policy === null) return;

    let value: unknown;
    if (options.payload !== undefined) {
      const parsed = parseJsonArg('Payload', options.payload);
      if (!parsed.ok) return;
      value = parsed.value;
    }
    let response: unknown;
    if (options.response !== undefined) {
      const parsed = parseJsonArg('Response', options.response);
      if (!parsed.ok) return;
      response = parsed.value;
    }

    const env: NodeJS.ProcessEnv = { ...process.env };
    if (options.timeout !== undefined) env['CONFGATE_CALLBACK_TIMEOUT_MS'] = options.timeout;

    try {
      const runtime = initRuntime({
        home: options.home,
        stateIO: options.audit ? undefined : new MemoryStateIO(),
        tree,
        policy,
        env,
        handlers: registerEverywhere(tree, echoHandler(response)),
        auditSink: options.audit ? undefined : new MemoryAuditSink(),
      });
      const session = runtime.openSession({ id: options.principal, principal_class: options.class });
      const envelope = await runtime.dispatcher.dispatch(session, {
        kind: options.kind,
        path,
        value,
        edit: options.kind === RequestKind.Write ? options.edit : undefined,
      });
      print(formatEnvelope(envelope));
      if (envelope.status !== ResponseStatus.Ok) process.exitCode = 1;
    } catch (err: unknown) {
      fail(errorMessage(err));
    } finally {
      shutdown();
    }
  });
