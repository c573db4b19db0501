/**
 * Text patching of the downloaded file manager payload
 *
 * The payload keeps its users and root directories in two PHP array
 * literals. Both are rewritten in place; a literal that is not found is
 * reported back so the caller can flag the install as degraded.
 */

import { PATHS } from "@afterdeploy/shared"

const AUTH_USERS_PATTERN = /\$auth_users\s*=\s*array\([^)]*\);/
const DIRECTORIES_USERS_PATTERN = /\$directories_users\s*=\s*array\([^)]*\);/

/**
 * Single-quoted PHP string literal
 */
export function phpString(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`
}

function phpArrayAssignment(variable: string, key: string, value: string): string {
  return `$${variable} = array(\n    ${phpString(key)} => ${phpString(value)}\n);`
}

/**
 * Root of a timestamped release layout (`<root>/releases/<ts>`), or the
 * working directory itself.
 */
export function resolveProjectRoot(cwd: string): string {
  const index = cwd.indexOf(PATHS.RELEASES_SEGMENT)
  if (index === -1) {
    return cwd
  }
  return cwd.slice(0, index) || "/"
}

export interface FileManagerPatch {
  username: string
  hash: string
  rootPath: string
}

export interface FileManagerPatchResult {
  content: string
  authUsersPatched: boolean
  directoriesPatched: boolean
}

export function patchFileManager(content: string, patch: FileManagerPatch): FileManagerPatchResult {
  const authUsersPatched = AUTH_USERS_PATTERN.test(content)
  const directoriesPatched = DIRECTORIES_USERS_PATTERN.test(content)

  // Replacer functions keep `$` sequences in bcrypt hashes literal
  const next = content
    .replace(AUTH_USERS_PATTERN, () => phpArrayAssignment("auth_users", patch.username, patch.hash))
    .replace(DIRECTORIES_USERS_PATTERN, () => phpArrayAssignment("directories_users", patch.username, patch.rootPath))

  return { content: next, authUsersPatched, directoriesPatched }
}
