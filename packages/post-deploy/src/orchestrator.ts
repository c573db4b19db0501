import { join } from "node:path"
import { parseRuntimeEnv, type RuntimeEnv } from "@afterdeploy/env"
import { createLogger, type Logger } from "@afterdeploy/logger"
import { PATHS, type RandomIndex } from "@afterdeploy/shared"
import { readConfigMap, toProjectEnv } from "./config-reader.js"
import { AutomatorError } from "./errors.js"
import { assertEnvFile, auditEnvironment } from "./executors/audit.js"
import { createCommandRunner } from "./executors/common.js"
import { resolveRuntimeSettings } from "./executors/identity.js"
import { optimizeApplication } from "./executors/optimize.js"
import { fixPermissions } from "./executors/permissions.js"
import { ensureStorageLink } from "./executors/storage-link.js"
import { type Fetcher, installTools, removeToolDirectories } from "./executors/tools.js"
import type { CommandRunner, RunReport, StepReport } from "./types.js"

export interface PostDeployOptions {
  /** Project root; every command runs here */
  basePath: string
  /** Validated process environment (defaults to process.env) */
  env?: RuntimeEnv
  logger?: Logger
  /** Replaces the spawnSync runner, e.g. in tests */
  runner?: CommandRunner
  fetcher?: Fetcher
  pick?: RandomIndex
}

const OUTCOME_LABELS: Record<StepReport["outcome"], string> = {
  ok: "ok",
  degraded: "DEGRADED",
  skipped: "skipped",
}

/**
 * Post-deploy orchestrator
 *
 * Sequential, best-effort pipeline. Only a missing .env stops the run;
 * every other failure is logged and recorded as a degraded step.
 */
export class PostDeployOrchestrator {
  /**
   * Run the full pipeline against a deployed project
   *
   * @returns Run report; `exitCode` is nonzero only when a precondition failed
   */
  static async run(options: PostDeployOptions): Promise<RunReport> {
    const { basePath, fetcher, pick } = options
    const env = options.env ?? parseRuntimeEnv()
    const logger = options.logger ?? createLogger()
    const runner = options.runner ?? createCommandRunner(basePath)

    const steps: StepReport[] = []

    const settings = resolveRuntimeSettings({ env, basePath, runner, logger })
    logger.info(`Automator initialized (User: ${settings.deployUser}, Web: ${settings.webUser})`)

    let envPath: string
    try {
      envPath = assertEnvFile(basePath)
    } catch (error) {
      if (error instanceof AutomatorError && error.code === "ENV_FILE_MISSING") {
        logger.error(`CRITICAL: ${error.message}`)
        logger.error("For security and safety, this automator will NOT auto-create .env from an example file.")
        logger.error("Please ensure .env is properly configured.")
        return { success: false, exitCode: error.exitCode, steps, findings: [], error: error.message }
      }
      throw error
    }

    // Read once, shared by the audit and the tool provisioner
    const projectEnv = toProjectEnv(readConfigMap(envPath, logger))

    const audit = auditEnvironment({ env: projectEnv, settings, runner, logger })
    steps.push(audit.report)

    steps.push(...fixPermissions({ settings, runner, logger }))
    steps.push(ensureStorageLink({ settings, runner, logger }))
    steps.push(optimizeApplication({ settings, runner, logger }))

    const tools = await installTools({ env: projectEnv, settings, runner, logger, fetcher, pick })
    steps.push(tools.report)

    PostDeployOrchestrator.renderSummary(steps, logger)
    logger.success("Automator finished successfully.")

    return {
      success: true,
      exitCode: 0,
      steps,
      findings: audit.findings,
      deployment: tools.deployment,
    }
  }

  /**
   * Remove every provisioned tool directory without installing a new one
   *
   * @returns names of the removed directories
   */
  static removeTools(basePath: string, logger: Logger = createLogger()): string[] {
    const removed = removeToolDirectories(join(basePath, PATHS.PUBLIC_DIR), logger)
    if (removed.length === 0) {
      logger.info("No tool directories found.")
    } else {
      for (const name of removed) {
        logger.success(`Removed ${PATHS.PUBLIC_DIR}/${name}`)
      }
    }
    return removed
  }

  private static renderSummary(steps: StepReport[], logger: Logger): void {
    logger.blank()
    logger.info("Run summary:")
    const width = Math.max(...steps.map(s => s.step.length))
    for (const { step, outcome, detail } of steps) {
      const line = `  ${step.padEnd(width)}  ${OUTCOME_LABELS[outcome]}${detail ? ` (${detail})` : ""}`
      if (outcome === "degraded") {
        logger.warn(line)
      } else {
        logger.info(line)
      }
    }
    logger.blank()
  }
}
