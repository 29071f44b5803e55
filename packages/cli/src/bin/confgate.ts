#!/usr/bin/env node
/**
 * bin/confgate.ts: entry point for the `confgate` CLI command.
 *
 * confgate --help
 * confgate check schema.json
 * confgate dispatch schema.json policy.json /system/hostname --class operator
 */

import { program } from '../commands/index.js'

await program.parseAsync()
