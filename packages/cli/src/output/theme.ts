import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:   chalk.hex('#4FC3F7'),
  text:   chalk.hex('#C8C8C0'),
  white:  chalk.hex('#F2F2EC'),
  dim:    chalk.hex('#444444'),
  muted:  chalk.hex('#666666'),
  amber:  chalk.hex('#D4880A'),
  green:  chalk.hex('#81C784'),
  red:    chalk.hex('#CF6679'),
} as const

const _statusColors: Record<string, ChalkInstance> = {
  OK:                t.green,
  NOT_FOUND:         t.muted,
  VALIDATION_FAILED: t.amber,
  ACCESS_DENIED:     t.red,
  CALLBACK_ERROR:    t.red,
}

export const statusColor = (status: string): ChalkInstance =>
  _statusColors[status] ?? t.muted
