/**
 * Confgate CLI: Output Formatting
 *
 * Pure functions from kernel and schema values to printable text. Commands
 * print what these return; tests assert on it with ANSI codes stripped.
 */

import { NodeKind } from '@confgate/schema';
import type { BuildIssue, SchemaNode, TypeConstraint } from '@confgate/schema';
import type { AccessDecision, Envelope, ValidationOutcome } from '@confgate/kernel';
import { ResponseStatus } from '@confgate/kernel';
import type { LogEvent } from '@confgate/runtime-host';
import { statusColor, t } from './theme.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export function describeType(type: TypeConstraint): string {
  switch (type.kind) {
    case 'string': {
      const parts: string[] = [];
      if (type.length !== null) parts.push(`length ${type.length.min}..${type.length.max ?? 'max'}`);
      for (const p of type.patterns) parts.push(`pattern ${JSON.stringify(p.source)}`);
      return parts.length === 0 ? 'string' : `string (${parts.join(', ')})`;
    }
    case 'numeric':
      return `${type.width} ${type.min}..${type.max}`;
    case 'enumeration':
      return `enumeration (${type.tokens.join(' | ')})`;
    case 'identityref':
      return `identityref (base ${type.base})`;
    case 'boolean':
      return 'boolean';
    case 'union':
      return `union (${type.members.map(describeType).join(' | ')})`;
    case 'opaque':
      return 'opaque (unconstrained)';
  }
}

/** Multi-line description of a resolved node. */
export function describeNode(node: SchemaNode, instancePath: string): string {
  const lines = [`${t.blue(node.kind)} ${t.white(node.name)}`, `  module:        ${node.module}`];
  lines.push(`  schema path:   ${node.path}`);
  if (instancePath !== node.path) lines.push(`  instance path: ${instancePath}`);

  switch (node.kind) {
    case NodeKind.Leaf:
      lines.push(`  type:          ${describeType(node.type)}`);
      if (node.mandatory) lines.push('  mandatory:     true');
      if (node.default !== null) lines.push(`  default:       ${JSON.stringify(node.default)}`);
      if (!node.config) lines.push('  config:        false');
      break;
    case NodeKind.LeafList:
      lines.push(`  type:          ${describeType(node.type)}`);
      lines.push(`  elements:      ${node.min_elements}..${node.max_elements ?? 'max'}`);
      if (!node.config) lines.push('  config:        false');
      break;
    case NodeKind.List:
      lines.push(`  keys:          ${node.keys.join(', ') || '(none)'}`);
      lines.push(`  children:      ${node.children.map((c) => c.name).join(', ')}`);
      if (!node.config) lines.push('  config:        false');
      break;
    case NodeKind.Container:
    case NodeKind.Notification:
      lines.push(`  children:      ${node.children.map((c) => c.name).join(', ') || '(none)'}`);
      break;
    case NodeKind.Rpc:
      lines.push(`  input:         ${node.input.map((c) => c.name).join(', ') || '(none)'}`);
      lines.push(`  output:        ${node.output === null ? '(none)' : node.output.map((c) => c.name).join(', ')}`);
      break;
  }
  return lines.join('\n');
}

export function formatIssues(issues: ReadonlyArray<BuildIssue>): string {
  return issues.map((i) => `  ${t.amber(i.path)}: ${i.message}`).join('\n');
}

// ---------------------------------------------------------------------------
// Validation and access
// ---------------------------------------------------------------------------

export function formatOutcome(outcome: ValidationOutcome): string {
  if (!outcome.ok) {
    return `${t.red('invalid')}: ${outcome.kind} at ${outcome.path}: ${outcome.detail}`;
  }
  const lines = [t.green('valid'), JSON.stringify(outcome.value, null, 2)];
  if (outcome.unconstrained.length > 0) {
    lines.push(`${t.amber('unconstrained')}: ${outcome.unconstrained.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatDecision(decision: AccessDecision): string {
  return decision.granted ? t.green('Granted') : `${t.red('Denied')} (${decision.reason})`;
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export function formatEnvelope(envelope: Envelope): string {
  const color = statusColor(envelope.status);
  const lines: string[] = [];
  switch (envelope.status) {
    case ResponseStatus.Ok:
      lines.push(color(envelope.status));
      if (envelope.value !== null && envelope.value !== undefined) {
        lines.push(JSON.stringify(envelope.value, null, 2));
      }
      if (envelope.unconstrained.length > 0) {
        lines.push(`${t.amber('unconstrained')}: ${envelope.unconstrained.join(', ')}`);
      }
      break;
    case ResponseStatus.ValidationFailed:
      lines.push(`${color(envelope.status)} ${envelope.detail.kind} at ${envelope.detail.path}: ${envelope.detail.detail}`);
      break;
    case ResponseStatus.CallbackError:
      lines.push(`${color(envelope.status)} ${envelope.detail}`);
      break;
    case ResponseStatus.NotFound:
    case ResponseStatus.AccessDenied:
      lines.push(color(envelope.status));
      break;
  }
  lines.push(t.muted(`trace: ${envelope.trace.join(' -> ')}`));
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Audit log
// ---------------------------------------------------------------------------

function field(event: LogEvent, name: string): string {
  const value = event[name];
  return typeof value === 'string' || typeof value === 'number' ? String(value) : '-';
}

/** One audit event per line, followed by its error when there is one. */
export function formatLogEvent(event: LogEvent): string {
  const status = field(event, 'status');
  const line =
    `${t.muted(event.timestamp ?? '-')}  ${statusColor(status)(status.padEnd(17))}  ` +
    `${field(event, 'principal_class')}/${field(event, 'principal_id')}  ${field(event, 'kind')}  ${field(event, 'path')}`;
  const errorKind = event['error_kind'];
  if (typeof errorKind !== 'string') return line;
  return `${line}\n    ${t.amber(errorKind)}: ${field(event, 'error_detail')}`;
}

export interface LogFilter {
  readonly status?: string | undefined;
  readonly limit?: number | undefined;
}

/** Events matching the status filter, newest `limit` of them, oldest first. */
export function selectEvents(events: ReadonlyArray<LogEvent>, filter: LogFilter): ReadonlyArray<LogEvent> {
  const matching =
    filter.status === undefined ? events : events.filter((e) => e['status'] === filter.status);
  if (filter.limit === undefined || matching.length <= filter.limit) return matching;
  return matching.slice(matching.length - filter.limit);
}
