#!/usr/bin/env node
/**
 * sector-analyst CLI - Main entry point
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { realpathSync } from 'fs'
import { createLogger } from '../utils/logger.js'
import { registerAnalyzeCommand } from './commands/analyze.js'
import { registerConfigCommand } from './commands/config.js'
import { registerRolesCommand } from './commands/roles.js'
import { registerRunsCommand } from './commands/runs.js'

const logger = createLogger('cli')

/** Version from the package.json next to src/ or dist/ */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    try {
      const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
    } catch {
      // Try next path
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()
  program
    .name('sector-analyst')
    .description('Multi-role industry analysis with LLM agents')
    .version(version, '-v, --version', 'Output the current version')

  registerAnalyzeCommand(program)
  registerRolesCommand(program, version)
  registerRunsCommand(program, version)
  registerConfigCommand(program)

  return program
}

async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] !== undefined && realpathSync(resolve(process.argv[1])) === fileURLToPath(import.meta.url)) {
  void main()
}
