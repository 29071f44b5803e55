/**
 * commands/index.ts: Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/confgate.ts
 *   src/index.ts
 */

import { program } from 'commander'
import { checkCommand } from './check.js'
import { resolveCommand } from './resolve.js'
import { validateCommand } from './validate.js'
import { authorizeCommand } from './authorize.js'
import { dispatchCommand } from './dispatch.js'
import { logCommand } from './log.js'

program
  .name('confgate')
  .description(
    'Confgate: schema-governed validation, authorization and dispatch.\n' +
    'Every request is resolved against the schema, validated and authorized before a handler runs.',
  )
  .version('0.1.0')

program.addCommand(checkCommand)
program.addCommand(resolveCommand)
program.addCommand(validateCommand)
program.addCommand(authorizeCommand)
program.addCommand(dispatchCommand)
program.addCommand(logCommand)

export { program }
