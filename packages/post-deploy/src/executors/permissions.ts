import { existsSync, mkdirSync } from "node:fs"
import { join } from "node:path"
import type { Logger } from "@afterdeploy/logger"
import { MODES, PATHS } from "@afterdeploy/shared"
import type { CommandRunner, RemediationTarget, RuntimeSettings, StepReport } from "../types.js"
import { describeCommand, worstOutcome } from "./common.js"

/**
 * Writable dirs first, then the public web root
 */
export function remediationTargets(settings: Pick<RuntimeSettings, "deployUser" | "webUser">): RemediationTarget[] {
  const owner = { user: settings.deployUser, group: settings.webUser }
  return [
    ...PATHS.WRITABLE_DIRS.map(path => ({
      path,
      owner,
      dirMode: MODES.WRITABLE.DIR,
      fileMode: MODES.WRITABLE.FILE,
    })),
    { path: PATHS.PUBLIC_DIR, owner, dirMode: MODES.PUBLIC.DIR, fileMode: MODES.PUBLIC.FILE },
  ]
}

/**
 * Commands applied to one target. chmod -R sets every entry to the
 * directory mode, then find narrows regular files only.
 */
export function remediationCommands(target: RemediationTarget, absPath: string): string[][] {
  return [
    ["chown", "-R", `${target.owner.user}:${target.owner.group}`, absPath],
    ["chmod", "-R", target.dirMode, absPath],
    ["find", absPath, "-type", "f", "-exec", "chmod", target.fileMode, "{}", "+"],
  ]
}

export interface RemediateTargetParams {
  target: RemediationTarget
  basePath: string
  runner: CommandRunner
  logger: Logger
}

export function remediateTarget(params: RemediateTargetParams): StepReport {
  const { target, basePath, runner, logger } = params
  const step = `permissions:${target.path}`
  const absPath = join(basePath, target.path)

  if (!existsSync(absPath)) {
    try {
      mkdirSync(absPath, { recursive: true })
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      logger.warn(`Could not create ${target.path}, skipping: ${message}`)
      return { step, outcome: "skipped", detail: message }
    }
  }

  const failures: string[] = []
  for (const command of remediationCommands(target, absPath)) {
    const result = runner.run(command, { strict: true })
    if (!result.success) {
      failures.push(describeCommand(command))
      logger.warn(`${describeCommand(command)} failed: ${result.stderr || `exit code ${result.exitCode}`}`)
    }
  }

  if (failures.length > 0) {
    return { step, outcome: "degraded", detail: `${failures.length} command(s) failed` }
  }

  logger.success(`Fixed permissions for ${target.path}`)
  return { step, outcome: "ok" }
}

export interface FixPermissionsParams {
  settings: RuntimeSettings
  runner: CommandRunner
  logger: Logger
}

/**
 * Normalize ownership and modes of the writable and public directories.
 * Best effort: every target is attempted whatever happened to the previous one.
 */
export function fixPermissions(params: FixPermissionsParams): StepReport[] {
  const { settings, runner, logger } = params
  logger.info("Running permission fixes...")

  const reports = remediationTargets(settings).map(target =>
    remediateTarget({ target, basePath: settings.basePath, runner, logger }),
  )

  const outcome = worstOutcome(reports.map(r => r.outcome))
  if (outcome !== "ok") {
    logger.warn("Some permission fixes did not complete. Re-run after fixing the reported errors.")
  }
  return reports
}
