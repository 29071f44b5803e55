/**
 * Shared kernel test fixtures: a compiled tree, a policy and a recording
 * handler. No I/O.
 */

import { buildConstraintTree } from '@confgate/schema';
import type { SchemaArtifact } from '@confgate/schema';
import { Operation, PolicyStore, Session } from '../src/index.js';
import type { Handler, HandlerCall, HandlerResult, PolicyEntry } from '../src/index.js';

export const FIXED_CLOCK = (): string => '2026-01-01T00:00:00.000Z';

export const ARTIFACT: SchemaArtifact = {
  identities: [
    { name: 'command-type', module: 'system' },
    { name: 'shutdown', module: 'system', bases: ['command-type'] },
    { name: 'restart', module: 'system', bases: ['command-type'] },
    { name: 'interface-type', module: 'interfaces' },
    { name: 'ethernet', module: 'interfaces', bases: ['interface-type'] },
  ],
  modules: [
    {
      name: 'system',
      nodes: [
        {
          kind: 'container',
          name: 'system',
          children: [
            { kind: 'leaf', name: 'hostname', type: { type: 'string', length: { min: 1, max: 63 } } },
            { kind: 'leaf', name: 'contact', type: { type: 'string' } },
            { kind: 'leaf', name: 'load', type: { type: 'numeric', width: 'uint8' }, config: false },
            {
              kind: 'container',
              name: 'clock',
              children: [
                {
                  kind: 'leaf',
                  name: 'timezone',
                  type: { type: 'enumeration', tokens: ['UTC', 'CET'] },
                  default: 'UTC',
                },
              ],
            },
          ],
        },
        {
          kind: 'rpc',
          name: 'run-command',
          input: [
            {
              kind: 'leaf',
              name: 'command',
              type: { type: 'identityref', base: 'command-type' },
              mandatory: true,
            },
            { kind: 'leaf', name: 'delay', type: { type: 'numeric', width: 'uint16', max: 3600 } },
          ],
          output: [
            { kind: 'leaf', name: 'exit-code', type: { type: 'numeric', width: 'int32' }, mandatory: true },
          ],
        },
        { kind: 'rpc', name: 'reboot' },
        {
          kind: 'notification',
          name: 'command-finished',
          children: [
            { kind: 'leaf', name: 'command', type: { type: 'identityref', base: 'command-type' } },
          ],
        },
      ],
    },
    {
      name: 'interfaces',
      nodes: [
        {
          kind: 'container',
          name: 'interfaces',
          children: [
            {
              kind: 'list',
              name: 'interface',
              keys: ['name'],
              children: [
                { kind: 'leaf', name: 'name', type: { type: 'string', patterns: ['[a-z]+[0-9]+'] } },
                { kind: 'leaf', name: 'mtu', type: { type: 'numeric', width: 'uint16', min: 68, max: 9000 } },
                { kind: 'leaf', name: 'mac', type: { type: 'string', patterns: ['[0-9a-fA-F]*'] } },
                { kind: 'leaf', name: 'priority', type: { type: 'numeric', width: 'uint8', min: 0, max: 100 } },
                { kind: 'leaf', name: 'enabled', type: { type: 'boolean' }, default: true },
                {
                  kind: 'leaf-list',
                  name: 'tags',
                  type: { type: 'string', length: { max: 16 } },
                  max_elements: 4,
                },
                {
                  kind: 'container',
                  name: 'statistics',
                  config: false,
                  children: [{ kind: 'leaf', name: 'in-octets', type: { type: 'numeric', width: 'uint64' } }],
                },
              ],
            },
          ],
        },
      ],
    },
  ],
};

export const TREE = buildConstraintTree(ARTIFACT);

/**
 * operator: execute on system only.
 * monitor:  read on system only.
 * admin:    everything on both modules.
 */
export const POLICY: ReadonlyArray<PolicyEntry> = [
  { module_name: 'system', principal_class: 'operator', operations: [Operation.Execute] },
  { module_name: 'system', principal_class: 'monitor', operations: [Operation.Read] },
  {
    module_name: 'system',
    principal_class: 'admin',
    operations: [Operation.Read, Operation.Write, Operation.Execute],
  },
  { module_name: 'interfaces', principal_class: 'admin', operations: [Operation.Read, Operation.Write] },
];

export function sessionFor(policies: PolicyStore, principalClass: string): Session {
  return new Session({
    principal: { id: `${principalClass}-1`, principal_class: principalClass },
    policies,
    id: `session-${principalClass}`,
  });
}

/** Records every call and answers with `respond`. */
export class RecordingHandler implements Handler {
  readonly calls: HandlerCall[] = [];

  constructor(
    private readonly respond: (call: HandlerCall) => Promise<HandlerResult> | HandlerResult = () => ({ ok: true }),
  ) {}

  async handle(call: HandlerCall): Promise<HandlerResult> {
    this.calls.push(call);
    return this.respond(call);
  }
}
