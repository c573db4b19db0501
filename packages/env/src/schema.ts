/**
 * Pure Zod schemas for environment variable validation
 *
 * This file contains ONLY schema definitions - no runtime code, no side effects.
 * Safe to import anywhere (CLI, library code, tests).
 */

import { IDENTITIES } from "@afterdeploy/shared"
import { z } from "zod"

/**
 * Custom validators for common patterns
 */
export const posixUser = z
  .string()
  .min(1)
  .regex(/^[a-z_][a-z0-9_-]*\$?$/i, "Must be a valid POSIX account name")

export const absolutePath = z.string().regex(/^\//, "Must be an absolute path")

/**
 * Process environment read by the post-deploy CLI
 *
 * Empty strings are treated as unset before validation (see parseRuntimeEnv).
 */
export const runtimeEnvSchema = z.object({
  // PHP binary used for artisan and password hashing
  FORGE_PHP: z.string().min(1).default(IDENTITIES.PHP_BINARY),

  // Account that owns the deployed tree
  FORGE_USER: posixUser.default(IDENTITIES.DEPLOY_USER),

  // Skips web user detection when set
  AUTOMATOR_WEB_USER: posixUser.optional(),

  // Project root; the CLI --path flag takes precedence
  AUTOMATOR_BASE_PATH: absolutePath.optional(),

  // https://no-color.org - any value disables ANSI colors
  NO_COLOR: z.string().optional(),
})

export type RuntimeEnv = z.infer<typeof runtimeEnvSchema>

export const RUNTIME_ENV_KEYS = runtimeEnvSchema.keyof().options
