import { lstatSync } from "node:fs"
import { join } from "node:path"
import type { Logger } from "@afterdeploy/logger"
import { ARTISAN, PATHS } from "@afterdeploy/shared"
import type { CommandRunner, RuntimeSettings, StepReport } from "../types.js"

export interface EnsureStorageLinkParams {
  settings: RuntimeSettings
  runner: CommandRunner
  logger: Logger
}

/** lstat so a dangling symlink still counts as present */
function pathPresent(path: string): boolean {
  try {
    lstatSync(path)
    return true
  } catch {
    return false
  }
}

/**
 * Create public/storage through the framework when it is missing
 */
export function ensureStorageLink(params: EnsureStorageLinkParams): StepReport {
  const { settings, runner, logger } = params

  if (pathPresent(join(settings.basePath, PATHS.STORAGE_LINK))) {
    return { step: "storage-link", outcome: "skipped", detail: `${PATHS.STORAGE_LINK} already present` }
  }

  const result = runner.run([settings.php, "artisan", ...ARTISAN.STORAGE_LINK], { strict: true })
  if (!result.success) {
    logger.warn(`storage:link failed: ${result.stderr || `exit code ${result.exitCode}`}`)
    return { step: "storage-link", outcome: "degraded", detail: result.stderr }
  }

  logger.success(`Linked ${PATHS.STORAGE_LINK}`)
  return { step: "storage-link", outcome: "ok" }
}
