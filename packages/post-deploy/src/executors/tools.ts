/**
 * Ephemeral admin tool provisioning
 *
 * Installs a database browser and a file manager into a randomly named
 * directory under the public web root:
 * - Removes directories left by earlier runs (same prefix)
 * - Downloads both single-file tools
 * - Resolves credentials (database login, or generated)
 * - Hashes the password through PHP and patches the file manager
 * - Prints connection details
 */

import { type Dirent, existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import type { Logger } from "@afterdeploy/logger"
import { ALPHABETS, cryptoIndex, PATHS, type RandomIndex, randomString, TOOLS } from "@afterdeploy/shared"
import type { ProjectEnv } from "../config-reader.js"
import type { CommandRunner, RuntimeSettings, StepReport, ToolCredentials, ToolDeployment } from "../types.js"
import { patchFileManager, phpString, resolveProjectRoot } from "./file-manager.js"

/**
 * Downloads a URL; rejects on network errors and non-2xx responses
 */
export type Fetcher = (url: string) => Promise<Uint8Array>

export const httpFetcher: Fetcher = async url => {
  const response = await fetch(url, { redirect: "follow" })
  if (!response.ok) {
    throw new Error(`GET ${url} returned HTTP ${response.status}`)
  }
  return new Uint8Array(await response.arrayBuffer())
}

function isToolDirectoryName(name: string): boolean {
  return name.startsWith(`${TOOLS.DIR_PREFIX}-`)
}

/**
 * Delete every provisioned tool directory under the public root.
 * Per-entry failures are logged and skipped.
 *
 * @returns names of the directories removed
 */
export function removeToolDirectories(publicPath: string, logger: Logger): string[] {
  if (!existsSync(publicPath)) {
    return []
  }

  const removed: string[] = []
  let entries: Dirent[]
  try {
    entries = readdirSync(publicPath, { withFileTypes: true })
  } catch (error) {
    logger.warn(`Could not list ${publicPath}: ${error instanceof Error ? error.message : String(error)}`)
    return []
  }

  for (const entry of entries) {
    if (!entry.isDirectory() || !isToolDirectoryName(entry.name)) continue
    try {
      rmSync(join(publicPath, entry.name), { recursive: true, force: true })
      removed.push(entry.name)
    } catch (error) {
      logger.warn(`Could not remove ${entry.name}: ${error instanceof Error ? error.message : String(error)}`)
    }
  }

  return removed
}

export function generateToolDirectoryName(pick: RandomIndex = cryptoIndex): string {
  return `${TOOLS.DIR_PREFIX}-${randomString(TOOLS.DIR_SUFFIX_LENGTH, ALPHABETS.LOWER_ALNUM, pick)}`
}

/**
 * Database login when both parts are present, generated credentials otherwise
 */
export function resolveCredentials(env: ProjectEnv, pick: RandomIndex = cryptoIndex): ToolCredentials {
  const username = env.DB_USERNAME.trim()
  const password = env.DB_PASSWORD.trim()

  if (username && password) {
    return { username, password, generated: false }
  }

  return {
    username: TOOLS.FALLBACK_USERNAME,
    password: randomString(TOOLS.GENERATED_PASSWORD_LENGTH, ALPHABETS.ALNUM, pick),
    generated: true,
  }
}

/**
 * Hash through PHP's password_hash. Falls back to the placeholder hash,
 * which leaves the file manager login unusable.
 */
export function hashPassword(
  password: string,
  settings: Pick<RuntimeSettings, "php">,
  runner: CommandRunner,
): ToolDeployment["hash"] {
  const result = runner.run([settings.php, "-r", `echo password_hash(${phpString(password)}, PASSWORD_DEFAULT);`], {
    strict: true,
  })
  if (result.success && result.stdout) {
    return { value: result.stdout, source: "computed" }
  }
  return { value: TOOLS.PLACEHOLDER_HASH, source: "placeholder" }
}

async function download(url: string, target: string, fetcher: Fetcher, logger: Logger): Promise<boolean> {
  try {
    writeFileSync(target, await fetcher(url))
    return true
  } catch (error) {
    logger.warn(`Download failed for ${url}: ${error instanceof Error ? error.message : String(error)}`)
    return false
  }
}

export function renderDeploymentReport(deployment: ToolDeployment, env: ProjectEnv, logger: Logger): void {
  const host = TOOLS.PUBLIC_HOST_PLACEHOLDER
  const rule = "=".repeat(66)
  const { credentials } = deployment

  logger.success(rule)
  logger.success(" PROJECT MANAGEMENT TOOLS INSTALLED ")
  logger.success(rule)
  logger.info(` Directory: ${PATHS.PUBLIC_DIR}/${deployment.directoryName}`)
  logger.blank()
  logger.info(" [DATABASE - ADMINER]")
  logger.success(` URL:  ${host}/${deployment.directoryName}/${TOOLS.ADMINER.FILE_NAME}`)
  logger.warn(` Host: ${env.DB_HOST}`)
  logger.warn(` User: ${env.DB_USERNAME}`)
  logger.warn(" Pass: (Check .env file)")
  logger.blank()
  logger.info(" [FILE MANAGER]")
  logger.success(` URL:  ${host}/${deployment.directoryName}/${TOOLS.FILE_MANAGER.FILE_NAME}`)
  if (credentials.generated) {
    logger.warn(` User: ${credentials.username}`)
    logger.warn(` Pass: ${credentials.password} (Auto-Generated - Save this!)`)
  } else {
    logger.warn(` User: ${credentials.username} (DB Credentials)`)
    logger.warn(" Pass: (Use your DB Password)")
  }
  if (deployment.hash.source === "placeholder") {
    logger.error(" Password hashing failed: file manager login is disabled until the next run.")
  }
  logger.success(rule)
}

export interface InstallToolsParams {
  env: ProjectEnv
  settings: RuntimeSettings
  runner: CommandRunner
  logger: Logger
  fetcher?: Fetcher
  /** Index source for directory names and passwords */
  pick?: RandomIndex
}

export interface InstallToolsResult {
  /** Undefined when the tool directory could not be created */
  deployment?: ToolDeployment
  report: StepReport
}

export async function installTools(params: InstallToolsParams): Promise<InstallToolsResult> {
  const { env, settings, runner, logger, fetcher = httpFetcher, pick = cryptoIndex } = params
  logger.info("Installing project management tools...")

  const problems: string[] = []
  const publicPath = join(settings.basePath, PATHS.PUBLIC_DIR)

  const removed = removeToolDirectories(publicPath, logger)
  if (removed.length > 0) {
    logger.info(`Removed previous tool directories: ${removed.join(", ")}`)
  }

  const directoryName = generateToolDirectoryName(pick)
  const directoryPath = join(publicPath, directoryName)
  try {
    mkdirSync(directoryPath, { recursive: true })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.error(`Could not create ${directoryPath}: ${message}`)
    return { report: { step: "tools", outcome: "skipped", detail: message } }
  }

  const files = {
    adminer: join(directoryPath, TOOLS.ADMINER.FILE_NAME),
    fileManager: join(directoryPath, TOOLS.FILE_MANAGER.FILE_NAME),
  }

  if (!(await download(TOOLS.ADMINER.URL, files.adminer, fetcher, logger))) {
    problems.push("adminer download failed")
  }
  if (!(await download(TOOLS.FILE_MANAGER.URL, files.fileManager, fetcher, logger))) {
    problems.push("file manager download failed")
  }

  const credentials = resolveCredentials(env, pick)
  if (credentials.generated) {
    logger.warn("DB_USERNAME or DB_PASSWORD not found in .env. Using generated credentials for File Manager.")
  }

  const hash = hashPassword(credentials.password, settings, runner)
  if (hash.source === "placeholder") {
    problems.push("password hashing failed")
  }

  const projectRoot = resolveProjectRoot(settings.basePath)

  if (existsSync(files.fileManager)) {
    try {
      const patched = patchFileManager(readFileSync(files.fileManager, "utf-8"), {
        username: credentials.username,
        hash: hash.value,
        rootPath: projectRoot,
      })
      if (!patched.authUsersPatched) {
        problems.push("$auth_users literal not found")
        logger.warn("File manager: $auth_users literal not found, default logins are still active.")
      }
      if (!patched.directoriesPatched) {
        problems.push("$directories_users literal not found")
        logger.warn("File manager: $directories_users literal not found, root path not applied.")
      }
      writeFileSync(files.fileManager, patched.content)
    } catch (error) {
      problems.push(`${TOOLS.FILE_MANAGER.FILE_NAME} could not be patched`)
      logger.warn(
        `Could not patch ${TOOLS.FILE_MANAGER.FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
      )
    }
  }

  const deployment: ToolDeployment = {
    directoryName,
    directoryPath,
    files,
    credentials,
    projectRoot,
    hash,
  }

  renderDeploymentReport(deployment, env, logger)

  return {
    deployment,
    report:
      problems.length > 0
        ? { step: "tools", outcome: "degraded", detail: problems.join("; ") }
        : { step: "tools", outcome: "ok", detail: directoryName },
  }
}
