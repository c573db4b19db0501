/**
 * Project .env reading
 *
 * Two layers: a tolerant line parser producing a flat key/value map, and a
 * zod schema that turns the map into the typed record the audit and tool
 * steps consume.
 */

import { existsSync, readFileSync } from "node:fs"
import type { Logger } from "@afterdeploy/logger"
import { z } from "zod"

export type ConfigMap = ReadonlyMap<string, string>

function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0]
    const last = value[value.length - 1]
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1)
    }
  }
  return value
}

/**
 * Parse KEY=value lines.
 *
 * - Blank lines and `#` comments are skipped
 * - Lines without `=` are ignored
 * - Split happens on the first `=` only
 * - One layer of matching single or double quotes is removed
 * - Later keys overwrite earlier ones
 */
export function parseConfigMap(content: string): ConfigMap {
  const map = new Map<string, string>()

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith("#")) continue

    const eqIndex = trimmed.indexOf("=")
    if (eqIndex === -1) continue

    const key = trimmed.slice(0, eqIndex).trim()
    const value = stripQuotes(trimmed.slice(eqIndex + 1).trim())
    map.set(key, value)
  }

  return map
}

/**
 * Read a config file into a map. A missing or unreadable file yields an
 * empty map; read errors are reported through `logger` when one is given.
 */
export function readConfigMap(path: string, logger?: Pick<Logger, "warn">): ConfigMap {
  if (!existsSync(path)) {
    return new Map()
  }
  try {
    return parseConfigMap(readFileSync(path, "utf-8"))
  } catch (error) {
    logger?.warn(`Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`)
    return new Map()
  }
}

// =============================================================================
// Typed record
// =============================================================================

/**
 * The keys the post-deploy steps look at. Everything else in the file is
 * dropped. Absent keys stay undefined unless a default is documented here.
 */
export const projectEnvSchema = z.object({
  APP_KEY: z.string().optional(),
  APP_DEBUG: z.string().optional(),
  APP_ENV: z.string().optional(),
  APP_URL: z.string().optional(),
  QUEUE_CONNECTION: z.string().optional(),
  SESSION_DRIVER: z.string().optional(),
  CACHE_DRIVER: z.string().optional(),

  // Database, shown in the tool report and reused as file manager login
  DB_HOST: z.string().default("127.0.0.1"),
  DB_DATABASE: z.string().default(""),
  DB_USERNAME: z.string().default(""),
  DB_PASSWORD: z.string().default(""),
})

export type ProjectEnv = z.infer<typeof projectEnvSchema>

export function toProjectEnv(map: ConfigMap): ProjectEnv {
  return projectEnvSchema.parse(Object.fromEntries(map))
}
