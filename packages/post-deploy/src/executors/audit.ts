/**
 * Environment audit
 *
 * Inspects the project .env and prints advice. Read-only with respect to
 * the file; the only side effect is asking the framework for a fresh
 * application key when none is set.
 */

import { existsSync } from "node:fs"
import { join } from "node:path"
import type { Logger } from "@afterdeploy/logger"
import { ARTISAN, PATHS } from "@afterdeploy/shared"
import type { ProjectEnv } from "../config-reader.js"
import { AutomatorError } from "../errors.js"
import type { AuditFinding, CommandRunner, RuntimeSettings, StepReport } from "../types.js"

const SEPARATOR = "-".repeat(64)

export function envFilePath(basePath: string): string {
  return join(basePath, PATHS.ENV_FILE)
}

/**
 * @throws AutomatorError ENV_FILE_MISSING
 */
export function assertEnvFile(basePath: string): string {
  const envPath = envFilePath(basePath)
  if (!existsSync(envPath)) {
    throw AutomatorError.envFileMissing(envPath)
  }
  return envPath
}

export interface AppKeyResult {
  finding: AuditFinding
  generated: boolean
}

function appKeyFinding(settings: RuntimeSettings, runner: CommandRunner): AppKeyResult {
  const result = runner.run([settings.php, "artisan", ...ARTISAN.KEY_GENERATE])
  const key = result.success && result.exitCode === 0 ? result.stdout : ""

  if (key) {
    return {
      generated: true,
      finding: {
        rule: "app-key-missing",
        keys: ["APP_KEY"],
        observed: undefined,
        severity: "attention",
        message: "APP_KEY is missing in your .env file!",
        notes: ["Please copy the following line and add it to your .env file:"],
        suggestion: `APP_KEY=${key}`,
      },
    }
  }

  return {
    generated: false,
    finding: {
      rule: "app-key-missing",
      keys: ["APP_KEY"],
      observed: undefined,
      severity: "attention",
      message: "APP_KEY is missing in your .env file!",
      notes: [
        `Could not generate a key automatically: ${result.stderr || `exit code ${result.exitCode}`}`,
        `Run '${settings.php} artisan key:generate' in the project root.`,
      ],
    },
  }
}

/**
 * Rules 2-6: pure checks over the typed record, in display order
 */
export function evaluateAdvisoryRules(env: ProjectEnv): AuditFinding[] {
  const findings: AuditFinding[] = []

  if ((env.APP_DEBUG ?? "").toLowerCase() === "true") {
    findings.push({
      rule: "app-debug-enabled",
      keys: ["APP_DEBUG"],
      observed: env.APP_DEBUG,
      severity: "attention",
      message: "APP_DEBUG is set to 'true'.",
      notes: [
        "For production environments, it is highly recommended to set this to 'false'.",
        "Suggestion: Update your .env file with:",
      ],
      suggestion: "APP_DEBUG=false",
    })
  }

  if ((env.APP_ENV ?? "").toLowerCase() !== "production") {
    findings.push({
      rule: "app-env-not-production",
      keys: ["APP_ENV"],
      observed: env.APP_ENV,
      severity: "suggestion",
      message: "APP_ENV is not set to 'production'.",
      notes: [`Current Value: ${env.APP_ENV ?? "not set"}`, "On a live server, it is recommended to use:"],
      suggestion: "APP_ENV=production",
    })
  }

  // Only checked when the key is present
  if (env.APP_URL !== undefined && (env.APP_URL.includes("localhost") || !env.APP_URL.startsWith("http"))) {
    findings.push({
      rule: "app-url-misconfigured",
      keys: ["APP_URL"],
      observed: env.APP_URL,
      severity: "suggestion",
      message: "APP_URL might be misconfigured.",
      notes: [`Current Value: ${env.APP_URL}`, "Ensure APP_URL matches your actual domain (including https://)."],
    })
  }

  if (env.QUEUE_CONNECTION === "sync") {
    findings.push({
      rule: "queue-sync",
      keys: ["QUEUE_CONNECTION"],
      observed: env.QUEUE_CONNECTION,
      severity: "suggestion",
      message: "QUEUE_CONNECTION is set to 'sync'.",
      notes: [
        "Jobs will run in the foreground, which can slow down requests.",
        "Consider using 'database' or 'redis' for better performance.",
      ],
    })
  }

  for (const key of ["SESSION_DRIVER", "CACHE_DRIVER"] as const) {
    if (env[key] === "array") {
      findings.push({
        rule: "driver-array",
        keys: [key],
        observed: env[key],
        severity: "suggestion",
        message: `${key} is set to 'array'.`,
        notes: [
          "This driver does not persist data between requests.",
          "Consider using 'file', 'database', or 'redis' for production.",
        ],
      })
    }
  }

  return findings
}

export function renderFinding(finding: AuditFinding, logger: Logger): void {
  const header = finding.severity === "attention" ? "[ATTENTION]" : "[SUGGESTION]"

  logger.blank()
  logger.warn(SEPARATOR)
  logger.warn(`${header} ${finding.message}`)
  for (const note of finding.notes) {
    logger.warn(note)
  }
  if (finding.suggestion) {
    logger.success(finding.suggestion)
  }
  logger.warn(SEPARATOR)
  logger.blank()
}

export interface AuditEnvironmentParams {
  env: ProjectEnv
  settings: RuntimeSettings
  runner: CommandRunner
  logger: Logger
}

export interface AuditResult {
  findings: AuditFinding[]
  report: StepReport
}

/**
 * Evaluate every rule and render each finding as soon as it is produced.
 */
export function auditEnvironment(params: AuditEnvironmentParams): AuditResult {
  const { env, settings, runner, logger } = params
  logger.info("Checking environment...")

  const findings: AuditFinding[] = []
  let keyGenerationFailed = false

  if (!env.APP_KEY) {
    const { finding, generated } = appKeyFinding(settings, runner)
    keyGenerationFailed = !generated
    findings.push(finding)
    renderFinding(finding, logger)
  }

  for (const finding of evaluateAdvisoryRules(env)) {
    findings.push(finding)
    renderFinding(finding, logger)
  }

  if (keyGenerationFailed) {
    return { findings, report: { step: "audit", outcome: "degraded", detail: "APP_KEY could not be generated" } }
  }

  return {
    findings,
    report: {
      step: "audit",
      outcome: "ok",
      detail: findings.length === 0 ? "no findings" : `${findings.length} finding(s)`,
    },
  }
}
