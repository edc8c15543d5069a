/**
 * CLI File I/O
 *
 * File reading and writing utilities for the CLI.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { AddressMapperError } from '../errors'

/**
 * Read a CSV input file as UTF-8 text.
 */
export async function readInputFile(path: string): Promise<string> {
  if (!existsSync(path)) {
    throw new AddressMapperError(`Input file not found: ${path}`, 'INPUT_NOT_FOUND', { path })
  }
  return readFile(path, 'utf-8')
}

/**
 * Ensure a directory exists.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true })
}

/**
 * Write a text file, creating its parent directory first.
 */
export async function writeOutputFile(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path))
  await writeFile(path, content, 'utf-8')
}
