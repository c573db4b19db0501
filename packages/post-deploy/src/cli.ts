/**
 * Post-deploy CLI
 *
 * Usage:
 *   afterdeploy                     # Run against the current directory
 *   afterdeploy --path /home/forge/site
 *   afterdeploy --remove-tools      # Delete provisioned admin tools
 *
 * Environment:
 *   FORGE_PHP, FORGE_USER, AUTOMATOR_WEB_USER, AUTOMATOR_BASE_PATH, NO_COLOR
 */

import path from "node:path"
import { fileURLToPath } from "node:url"
import { parseRuntimeEnv, type RuntimeEnv, RuntimeEnvError } from "@afterdeploy/env"
import { createConsoleSink, createLogger } from "@afterdeploy/logger"
import { AutomatorError } from "./errors.js"
import { PostDeployOrchestrator } from "./orchestrator.js"

export interface CliOptions {
  basePath?: string
  removeTools: boolean
  color: boolean
  help: boolean
}

export const USAGE = `
Usage: afterdeploy [options]

Options:
  --path <dir>      Project root (default: AUTOMATOR_BASE_PATH or the current directory)
  --remove-tools    Delete provisioned admin tool directories and exit
  --no-color        Disable colored output
  --help, -h        Show this help
`

/**
 * @throws AutomatorError INVALID_ARGUMENTS
 */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { removeTools: false, color: true, help: false }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    if (arg === "--help" || arg === "-h") {
      options.help = true
      continue
    }

    if (arg === "--remove-tools") {
      options.removeTools = true
      continue
    }

    if (arg === "--no-color") {
      options.color = false
      continue
    }

    if (arg === "--path") {
      const value = argv[++i]
      if (!value || value.startsWith("--")) {
        throw AutomatorError.invalidArguments("--path requires a value")
      }
      options.basePath = path.resolve(value)
      continue
    }

    throw AutomatorError.invalidArguments(`Unknown argument: ${arg}`)
  }

  return options
}

export function resolveBasePath(options: CliOptions, env: RuntimeEnv, cwd: string): string {
  return options.basePath ?? env.AUTOMATOR_BASE_PATH ?? cwd
}

export async function main(argv: string[]): Promise<number> {
  let options: CliOptions
  let env: RuntimeEnv
  try {
    options = parseArgs(argv)
    env = parseRuntimeEnv()
  } catch (error) {
    if (error instanceof AutomatorError) {
      console.error(error.message)
      console.error(USAGE)
      return error.exitCode
    }
    if (error instanceof RuntimeEnvError) {
      const wrapped = AutomatorError.invalidRuntimeEnv(error.message)
      console.error(wrapped.message)
      return wrapped.exitCode
    }
    throw error
  }

  if (options.help) {
    console.log(USAGE)
    return 0
  }

  const logger = createLogger(createConsoleSink({ color: options.color && env.NO_COLOR === undefined }))
  const basePath = resolveBasePath(options, env, process.cwd())

  if (options.removeTools) {
    PostDeployOrchestrator.removeTools(basePath, logger)
    return 0
  }

  const report = await PostDeployOrchestrator.run({ basePath, env, logger })
  return report.exitCode
}

const invokedDirectly = process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)

if (invokedDirectly) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? (error.stack ?? error.message) : String(error))
      process.exitCode = 1
    })
}
