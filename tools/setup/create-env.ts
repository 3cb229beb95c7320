#!/usr/bin/env node
/**
 * Environment Setup Helper
 * Copies .env.example to .env so credentials can be filled in
 */

import * as fs from 'fs'
import * as path from 'path'
import * as readline from 'readline/promises'
import { fileURLToPath } from 'url'

import chalk from 'chalk'
import { program } from 'commander'

export const TEMPLATE_NAME = '.env.example'
export const ENV_NAME = '.env'

/**
 * Variables a working .env needs, printed when the template is missing
 */
export const EXPECTED_VARIABLES = [
  'PLUG_BACKEND=tplink-cloud',
  'TP_LINK_EMAIL=your-email@example.com',
  'TP_LINK_PASSWORD=your-password',
  'PLUG_ALIAS=',
  'PLUG_ADDRESS=',
  'BATTERY_START_THRESHOLD=40',
  'BATTERY_STOP_THRESHOLD=80',
  'BATTERY_CHECK_INTERVAL=60',
]

export interface CreateEnvOptions {
  /** Directory holding the template and receiving .env */
  dir: string
  /** Ask a yes/no question */
  confirm: (question: string) => Promise<boolean>
  log: (message: string) => void
}

/**
 * Create .env from the template
 * @returns true when .env was written
 */
export async function createEnvFile(options: CreateEnvOptions): Promise<boolean> {
  const { dir, confirm, log } = options
  const templatePath = path.join(dir, TEMPLATE_NAME)
  const envPath = path.join(dir, ENV_NAME)

  if (!fs.existsSync(templatePath)) {
    log(chalk.red(`ERROR: ${TEMPLATE_NAME} not found in ${dir}`))
    log('Create .env by hand with the following content:')
    log(chalk.gray('─'.repeat(60)))
    EXPECTED_VARIABLES.forEach((line) => log(line))
    log(chalk.gray('─'.repeat(60)))
    return false
  }

  if (fs.existsSync(envPath)) {
    const overwrite = await confirm(`${ENV_NAME} already exists. Overwrite? (y/N): `)
    if (!overwrite) {
      log(chalk.yellow(`Cancelled. ${ENV_NAME} not modified.`))
      return false
    }
  }

  try {
    fs.copyFileSync(templatePath, envPath)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    log(chalk.red(`ERROR: Failed to create ${ENV_NAME}: ${message}`))
    return false
  }

  log(chalk.green(`✓ Created ${ENV_NAME} from ${TEMPLATE_NAME}`))
  log(chalk.gray(`  Location: ${envPath}`))
  log(chalk.yellow('Fill in the plug credentials before starting: TP_LINK_EMAIL, TP_LINK_PASSWORD or PLUG_ADDRESS'))
  return true
}

/**
 * Yes/no question on the terminal, defaulting to no
 */
async function askYesNo(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
  try {
    const answer = await rl.question(question)
    return answer.trim().toLowerCase() === 'y'
  } finally {
    rl.close()
  }
}

async function main(): Promise<void> {
  program
    .name('setup-env')
    .description('Create .env from .env.example')
    .option('-d, --dir <path>', 'Project directory', process.cwd())
    .parse(process.argv)

  const options = program.opts<{ dir: string }>()

  console.log(chalk.cyan('═'.repeat(60)))
  console.log(chalk.cyan.bold('Charge Keeper - Environment Setup'))
  console.log(chalk.cyan('═'.repeat(60)))

  const created = await createEnvFile({
    dir: path.resolve(options.dir),
    confirm: askYesNo,
    log: (message) => console.log(message),
  })
  if (!created) process.exitCode = 1
}

const invokedPath = process.argv[1]
if (invokedPath !== undefined && path.resolve(invokedPath) === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error))
    process.exitCode = 1
  })
}
