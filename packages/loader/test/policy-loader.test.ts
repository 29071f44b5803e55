/**
 * Confgate Loader: Policy Loader Tests
 *
 * Both document shapes, shape errors with their paths, and the cross-check
 * against the tree's module names.
 */

import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Operation, compilePolicy } from '@confgate/kernel';
import { PolicyLoadError, parsePolicyDocument, readPolicyFile, readSchemaFile } from '../src/index.js';

const fixtures = join(fileURLToPath(new URL('.', import.meta.url)), 'fixtures');
const tree = readSchemaFile(join(fixtures, 'schema.json'));

const OPERATOR = { module_name: 'system', principal_class: 'operator', operations: ['execute'] };

function loadError(fn: () => unknown): PolicyLoadError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof PolicyLoadError) return err;
    throw err;
  }
  throw new Error('expected a PolicyLoadError');
}

describe('parsePolicyDocument', () => {
  it('accepts the entries document', () => {
    expect(parsePolicyDocument({ entries: [OPERATOR] }, tree)).toEqual([
      { module_name: 'system', principal_class: 'operator', operations: [Operation.Execute] },
    ]);
  });

  it('accepts a bare array of entries', () => {
    expect(parsePolicyDocument([OPERATOR], tree)).toEqual(parsePolicyDocument({ entries: [OPERATOR] }, tree));
  });

  it('accepts an empty policy', () => {
    expect(parsePolicyDocument({ entries: [] })).toEqual([]);
  });

  it('rejects an unknown operation', () => {
    const err = loadError(() =>
      parsePolicyDocument({ entries: [{ ...OPERATOR, operations: ['delete'] }] }),
    );
    expect(err.issues).toEqual([
      {
        path: 'entries[0].operations[0]',
        message: "Invalid enum value. Expected 'read' | 'write' | 'execute', received 'delete'",
      },
    ]);
  });

  it('reports a missing field with a readable message', () => {
    const err = loadError(() => parsePolicyDocument({ entries: [{ module_name: 'system', operations: [] }] }));
    expect(err.issues).toEqual([{ path: 'entries[0].principal_class', message: 'Required' }]);
    expect(err.message).toBe('Policy document rejected with 1 issue(s):\n  entries[0].principal_class: Required');
  });

  it('rejects every entry naming a module the tree does not define', () => {
    const err = loadError(() =>
      parsePolicyDocument(
        {
          entries: [
            OPERATOR,
            { module_name: 'routing', principal_class: 'admin', operations: ['read'] },
            { module_name: 'ntp', principal_class: 'admin', operations: ['write'] },
          ],
        },
        tree,
      ),
    );
    expect(err.issues).toEqual([
      { path: 'entries[1].module_name', message: 'unknown module "routing"' },
      { path: 'entries[2].module_name', message: 'unknown module "ntp"' },
    ]);
  });

  it('uses array paths for a bare document', () => {
    const err = loadError(() =>
      parsePolicyDocument([{ module_name: 'routing', principal_class: 'admin', operations: [] }], tree),
    );
    expect(err.issues).toEqual([{ path: '[0].module_name', message: 'unknown module "routing"' }]);
  });

  it('skips the module check without a tree', () => {
    const entries = parsePolicyDocument([{ module_name: 'routing', principal_class: 'admin', operations: [] }]);
    expect(entries).toHaveLength(1);
  });
});

describe('readPolicyFile', () => {
  it('reads a document that compiles into grants', () => {
    const policy = compilePolicy(readPolicyFile(join(fixtures, 'policy.json'), tree));
    expect(policy.grants.get('system')?.get('monitor')).toEqual(new Set([Operation.Read]));
    expect(policy.grants.get('system')?.get('operator')).toEqual(new Set([Operation.Execute]));
  });

  it('names the file in a JSON error', () => {
    const file = join(fixtures, 'truncated.json');
    const err = loadError(() => readPolicyFile(file));
    expect(err.issues[0]?.path).toBe('(root)');
    expect(err.message.startsWith(`Policy ${file} rejected with 1 issue(s):`)).toBe(true);
  });
});
