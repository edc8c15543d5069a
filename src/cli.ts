#!/usr/bin/env node
/**
 * Address Mapper CLI
 *
 * Local orchestrator for the core library.
 * Handles file I/O, progress reporting, cancellation and config.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdConfig } from './cli/commands/config'
import { cmdMap } from './cli/commands/map'
import { cmdValidate } from './cli/commands/validate'
import { createLogger } from './cli/logger'
import { getErrorMessage } from './errors'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'map':
        await cmdMap(args, logger)
        break

      case 'validate':
        await cmdValidate(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'address-mapper --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    logger.error(getErrorMessage(error))
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error(getErrorMessage(error))
  process.exit(1)
})
