/**
 * Constants re-export
 *
 * Lets consumers of @afterdeploy/post-deploy read the paths and tool names
 * without depending on @afterdeploy/shared directly.
 */

export { ARTISAN, IDENTITIES, MODES, PATHS, TOOLS } from "@afterdeploy/shared"
