/**
 * Shared schema fixtures for the schema package tests.
 *
 * Two modules: `system` (a container, an rpc and a notification) and
 * `interfaces` (a keyed list). No I/O.
 */

import type { SchemaArtifact } from '../src/index.js';

export const TEST_ARTIFACT: SchemaArtifact = {
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
            { kind: 'leaf', name: 'uptime', type: { type: 'numeric', width: 'uint64' }, config: false },
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
          ],
          output: [{ kind: 'leaf', name: 'exit-code', type: { type: 'numeric', width: 'int32' } }],
        },
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
                { kind: 'leaf', name: 'type', type: { type: 'identityref', base: 'interface-type' } },
                { kind: 'leaf', name: 'enabled', type: { type: 'boolean' }, default: true },
                {
                  kind: 'leaf-list',
                  name: 'tags',
                  type: { type: 'string', length: { max: 16 } },
                  max_elements: 4,
                },
              ],
            },
          ],
        },
      ],
    },
  ],
};
