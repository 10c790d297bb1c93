/**
 * CLI File I/O
 *
 * File reading and writing utilities for the CLI.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

/**
 * Read a UTF-8 input table.
 *
 * @throws Error "Input file not found: <path>" when the file is missing
 */
export async function readInputFile(path: string): Promise<string> {
  if (!existsSync(path)) {
    throw new Error(`Input file not found: ${path}`)
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
 * Write an output file, creating parent directories as needed.
 */
export async function writeOutputFile(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path))
  await writeFile(path, content, 'utf-8')
}
