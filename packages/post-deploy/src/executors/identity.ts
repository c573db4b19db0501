import type { RuntimeEnv } from "@afterdeploy/env"
import type { Logger } from "@afterdeploy/logger"
import { IDENTITIES } from "@afterdeploy/shared"
import type { CommandRunner, RuntimeSettings } from "../types.js"

export function userExists(runner: CommandRunner, user: string): boolean {
  return runner.run(["id", "-u", user], { strict: true }).success
}

/**
 * First web server account present on the host, or the fallback
 */
export function detectWebUser(
  runner: CommandRunner,
  candidates: readonly string[] = IDENTITIES.WEB_USER_CANDIDATES,
): string {
  for (const candidate of candidates) {
    if (userExists(runner, candidate)) {
      return candidate
    }
  }
  return IDENTITIES.WEB_USER_FALLBACK
}

export interface ResolveRuntimeSettingsParams {
  env: RuntimeEnv
  basePath: string
  runner: CommandRunner
  logger: Logger
}

/**
 * Resolve identities once per run
 *
 * A missing deploy account is reported but does not stop the run; the
 * chown calls that depend on it will surface as degraded steps.
 */
export function resolveRuntimeSettings(params: ResolveRuntimeSettingsParams): RuntimeSettings {
  const { env, basePath, runner, logger } = params

  const deployUser = env.FORGE_USER
  const webUser = env.AUTOMATOR_WEB_USER ?? detectWebUser(runner)

  if (!userExists(runner, deployUser)) {
    logger.warn(`User ${deployUser} not found on this host. Ownership changes will likely fail.`)
  }

  return {
    basePath,
    php: env.FORGE_PHP,
    deployUser,
    webUser,
  }
}
