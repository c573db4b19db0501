/**
 * Shared Constants - Single Source of Truth
 *
 * Paths, names and tool locations used by every post-deploy step.
 * DO NOT duplicate these values anywhere else.
 *
 * Organization:
 * - PATHS: Project-relative filesystem paths
 * - MODES: Permission modes per directory class
 * - IDENTITIES: Default deploy/web accounts
 * - TOOLS: Ephemeral admin tool provisioning
 * - ARTISAN: Framework CLI commands
 */

// =============================================================================
// Path Constants
// =============================================================================

export const PATHS = {
  /** Project configuration file, relative to the project root */
  ENV_FILE: ".env",

  /** Directories the web server must be able to write */
  WRITABLE_DIRS: ["storage", "bootstrap/cache"],

  /** Public web root */
  PUBLIC_DIR: "public",

  /** Storage symlink created by `artisan storage:link` */
  STORAGE_LINK: "public/storage",

  /** Path segment marking a timestamped release layout (root/releases/<ts>) */
  RELEASES_SEGMENT: "/releases/",
} as const

// =============================================================================
// Permission Modes
// =============================================================================

export const MODES = {
  WRITABLE: { DIR: "775", FILE: "664" },
  PUBLIC: { DIR: "755", FILE: "644" },
} as const

// =============================================================================
// Identities
// =============================================================================

export const IDENTITIES = {
  /** Account that owns deployed files */
  DEPLOY_USER: "forge",

  /** Web server accounts, probed in order */
  WEB_USER_CANDIDATES: ["www-data", "nginx", "apache"],

  /** Used when no candidate exists on the host */
  WEB_USER_FALLBACK: "www-data",

  /** PHP binary */
  PHP_BINARY: "php",
} as const

// =============================================================================
// Tool Provisioning
// =============================================================================

export const TOOLS = {
  /** Provisioned directories are named `${DIR_PREFIX}-xxxxxx` */
  DIR_PREFIX: "forge-tools",
  DIR_SUFFIX_LENGTH: 6,

  ADMINER: {
    URL: "https://www.adminer.org/latest.php",
    FILE_NAME: "adminer.php",
  },

  FILE_MANAGER: {
    URL: "https://raw.githubusercontent.com/prasathmani/tinyfilemanager/master/tinyfilemanager.php",
    FILE_NAME: "filemanager.php",
  },

  /** Public host is unknown at deploy time */
  PUBLIC_HOST_PLACEHOLDER: "your-site-url",

  FALLBACK_USERNAME: "forge_admin",
  GENERATED_PASSWORD_LENGTH: 12,

  /** Written when hashing fails; the file manager login is unusable until re-provisioned */
  PLACEHOLDER_HASH: "$2y$10$MixedHashPlaceholder...",
} as const

// =============================================================================
// Framework CLI
// =============================================================================

export const ARTISAN = {
  KEY_GENERATE: ["key:generate", "--show"],
  STORAGE_LINK: ["storage:link"],
  OPTIMIZE: [["optimize:clear"], ["config:cache"], ["event:cache"], ["route:cache"], ["view:cache"]],
  QUEUE_RESTART: ["queue:restart"],
} as const

export type ArtisanCommand = readonly string[]
