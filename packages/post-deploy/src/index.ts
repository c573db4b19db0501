/**
 * Post-deploy remediation and tool provisioning
 *
 * Runs after a release lands on the server:
 * - Audits the project .env and prints suggestions
 * - Normalizes ownership and modes of writable and public directories
 * - Rebuilds framework caches and restarts queue workers
 * - Installs short-lived database and file manager tools
 *
 * @packageDocumentation
 */

export { PostDeployOrchestrator } from "./orchestrator.js"
export type { PostDeployOptions } from "./orchestrator.js"
export type {
  AuditFinding,
  AuditRuleId,
  Command,
  CommandResult,
  CommandRunner,
  RemediationTarget,
  RunCommandOptions,
  RunReport,
  RuntimeSettings,
  StepOutcome,
  StepReport,
  ToolCredentials,
  ToolDeployment,
} from "./types.js"

// Constants - re-exported from constants.ts
export { ARTISAN, IDENTITIES, MODES, PATHS, TOOLS } from "./constants.js"

// Config reading
export { type ConfigMap, parseConfigMap, type ProjectEnv, projectEnvSchema, readConfigMap, toProjectEnv } from "./config-reader.js"

// Re-export individual executors for advanced usage
export { createCommandRunner, runCommand } from "./executors/common.js"
export { detectWebUser, resolveRuntimeSettings } from "./executors/identity.js"
export { fixPermissions, remediationTargets } from "./executors/permissions.js"
export { assertEnvFile, auditEnvironment, evaluateAdvisoryRules } from "./executors/audit.js"
export { ensureStorageLink } from "./executors/storage-link.js"
export { optimizeApplication } from "./executors/optimize.js"
export { type Fetcher, httpFetcher, installTools, removeToolDirectories } from "./executors/tools.js"
export { patchFileManager, resolveProjectRoot } from "./executors/file-manager.js"

export { AutomatorError } from "./errors.js"
export type { AutomatorErrorCode } from "./errors.js"
