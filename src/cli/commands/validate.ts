/**
 * Validate Command
 *
 * Checks required columns and cell values without calling a provider.
 */

import { basename } from 'node:path'
import { AddressMapperError } from '../../errors'
import { readInputTable, REQUIRED_COLUMNS } from '../../input/index'
import type { CLIArgs } from '../args'
import { readInputFile } from '../io'
import type { Logger } from '../logger'

export async function cmdValidate(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new AddressMapperError('No input file specified', 'INPUT_NOT_FOUND')
  }

  logger.log(`\n📁 ${basename(args.input)}`)

  const table = readInputTable(await readInputFile(args.input), args.mode)
  const required = new Set(REQUIRED_COLUMNS[table.mode])
  const extra = table.columns.filter((c) => !required.has(c))

  logger.success(`Valid ${table.mode} file: ${table.rows.length} rows`)
  logger.log(`   Columns: ${table.columns.join(', ')}`)
  if (extra.length > 0) {
    logger.verbose(`Passed through to the export: ${extra.join(', ')}`)
  }
}
