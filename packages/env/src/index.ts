/**
 * @afterdeploy/env
 *
 * Centralized environment variable validation for the post-deploy CLI.
 *
 * ## Usage
 *
 * ```typescript
 * import { parseRuntimeEnv } from "@afterdeploy/env"
 *
 * const env = parseRuntimeEnv() // reads process.env
 * const php = env.FORGE_PHP // "php" unless overridden
 * ```
 *
 * Validation runs once at startup; the result is threaded through the run
 * instead of being re-read from process.env.
 */

import { RUNTIME_ENV_KEYS, type RuntimeEnv, runtimeEnvSchema } from "./schema.js"

export { absolutePath, posixUser, RUNTIME_ENV_KEYS, type RuntimeEnv, runtimeEnvSchema } from "./schema.js"

export class RuntimeEnvError extends Error {
  readonly fieldErrors: Record<string, string[] | undefined>

  constructor(fieldErrors: Record<string, string[] | undefined>) {
    const summary = Object.entries(fieldErrors)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(", ")}`)
      .join("; ")
    super(`Invalid environment variables: ${summary}`)
    this.name = "RuntimeEnvError"
    this.fieldErrors = fieldErrors
  }
}

/**
 * Validate the runtime environment.
 *
 * Only known keys are read; empty strings count as unset so that
 * `FORGE_USER=` falls back to the default instead of failing validation.
 *
 * @throws RuntimeEnvError when a set value is malformed
 */
export function parseRuntimeEnv(source: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const picked: Partial<Record<(typeof RUNTIME_ENV_KEYS)[number], string>> = {}
  for (const key of RUNTIME_ENV_KEYS) {
    const value = source[key]
    if (value !== undefined && value !== "") {
      picked[key] = value
    }
  }

  const result = runtimeEnvSchema.safeParse(picked)
  if (!result.success) {
    throw new RuntimeEnvError(result.error.flatten().fieldErrors)
  }
  return result.data
}
