/**
 * Confgate Kernel: Handler Registry
 *
 * Maps schema paths to handlers. A data node with no handler of its own is
 * served by the handler of its nearest registered ancestor, so one handler
 * on `/interfaces` covers every node below it. RPCs and notifications are
 * top-level, so for them the lookup is exact.
 */

import type { SchemaNode, SchemaPath } from '@confgate/schema';
import type { Handler } from '../types/dispatch.js';

export class HandlerRegistry {
  private readonly handlers = new Map<SchemaPath, Handler>();

  /** Register `handler` at a schema path. A later registration replaces an earlier one. */
  register(schemaPath: SchemaPath, handler: Handler): this {
    this.handlers.set(schemaPath, handler);
    return this;
  }

  unregister(schemaPath: SchemaPath): boolean {
    return this.handlers.delete(schemaPath);
  }

  /** The handler serving `node`, or undefined if none covers it. */
  lookup(node: SchemaNode): Handler | undefined {
    let path = node.path;
    while (path !== '') {
      const handler = this.handlers.get(path);
      if (handler !== undefined) return handler;
      path = path.slice(0, path.lastIndexOf('/'));
    }
    return undefined;
  }

  paths(): ReadonlyArray<SchemaPath> {
    return [...this.handlers.keys()].sort();
  }
}
