/**
 * @afterdeploy/shared
 *
 * Shared constants and helpers used across all packages in the workspace.
 *
 * @example
 * ```typescript
 * import { PATHS, TOOLS } from "@afterdeploy/shared"
 *
 * const envFile = PATHS.ENV_FILE // ".env"
 * const prefix = TOOLS.DIR_PREFIX // "forge-tools"
 * ```
 */

export { ARTISAN, type ArtisanCommand, IDENTITIES, MODES, PATHS, TOOLS } from "./constants.js"
export { ALPHABETS, cryptoIndex, type RandomIndex, randomString } from "./random.js"
