import type { Logger } from "@afterdeploy/logger"
import { ARTISAN, type ArtisanCommand } from "@afterdeploy/shared"
import type { CommandRunner, RuntimeSettings, StepReport } from "../types.js"
import { describeCommand, exitedCleanly } from "./common.js"

export interface OptimizeApplicationParams {
  settings: RuntimeSettings
  runner: CommandRunner
  logger: Logger
}

/**
 * Cache rebuild commands, then the queue restart
 */
export function optimizeCommands(php: string): string[][] {
  const artisan = (args: ArtisanCommand) => [php, "artisan", ...args]
  return [...ARTISAN.OPTIMIZE.map(artisan), artisan(ARTISAN.QUEUE_RESTART)]
}

/**
 * Rebuild framework caches and restart queue workers
 *
 * Non-strict: a project without a queue or without cached routes still
 * deploys. Failures are logged and reported as a degraded step.
 */
export function optimizeApplication(params: OptimizeApplicationParams): StepReport {
  const { settings, runner, logger } = params
  logger.info("Optimizing application...")

  const failed: string[] = []
  for (const command of optimizeCommands(settings.php)) {
    const result = runner.run(command, { strict: false })
    if (!exitedCleanly(result)) {
      failed.push(command.slice(2).join(" "))
      logger.warn(`${describeCommand(command)} failed: ${result.stderr || `exit code ${result.exitCode}`}`)
    }
  }

  if (failed.length > 0) {
    return { step: "optimize", outcome: "degraded", detail: `failed: ${failed.join(", ")}` }
  }

  logger.success("Application caches rebuilt")
  return { step: "optimize", outcome: "ok" }
}
