/**
 * Outcome of a single external command
 */
export interface CommandResult {
  /** False when the process could not start, or exited nonzero under strict mode */
  success: boolean
  stdout: string
  stderr: string
  /** Raw exit status; null when the process never ran or died from a signal */
  exitCode: number | null
}

/**
 * Literal argument list (no shell), or a single string run by the system shell
 */
export type Command = readonly string[] | string

export interface RunCommandOptions {
  /** Report a nonzero exit status as `success: false` */
  strict?: boolean
}

export interface CommandRunner {
  /** Working directory every command runs in */
  readonly cwd: string
  run(command: Command, options?: RunCommandOptions): CommandResult
}

/**
 * Identities and binaries resolved once at startup
 */
export interface RuntimeSettings {
  /** Project root (the working directory of every command) */
  basePath: string
  /** PHP binary */
  php: string
  /** Owner of the deployed tree */
  deployUser: string
  /** Group the web server runs as */
  webUser: string
}

/**
 * A directory whose ownership and modes are normalized
 */
export interface RemediationTarget {
  /** Relative to the project root */
  path: string
  owner: { user: string; group: string }
  dirMode: string
  fileMode: string
}

export type AuditRuleId =
  | "app-key-missing"
  | "app-debug-enabled"
  | "app-env-not-production"
  | "app-url-misconfigured"
  | "queue-sync"
  | "driver-array"

export interface AuditFinding {
  rule: AuditRuleId
  /** Configuration keys the finding is about */
  keys: string[]
  /** Value seen in the file; undefined when the key is absent */
  observed: string | undefined
  /** "attention" findings need action, "suggestion" findings are advisory */
  severity: "attention" | "suggestion"
  message: string
  /** Extra context lines shown under the header */
  notes: string[]
  /** Copy-paste line for the .env file, when there is one */
  suggestion?: string
}

export interface ToolCredentials {
  username: string
  password: string
  /** True when the database credentials were unusable and these were generated */
  generated: boolean
}

/**
 * Record of one tool provisioning pass
 */
export interface ToolDeployment {
  /** e.g. forge-tools-k3x9qa */
  directoryName: string
  directoryPath: string
  files: {
    adminer: string
    fileManager: string
  }
  credentials: ToolCredentials
  /** Directory the file manager is rooted at */
  projectRoot: string
  hash: {
    value: string
    source: "computed" | "placeholder"
  }
}

export type StepOutcome = "ok" | "degraded" | "skipped"

export interface StepReport {
  step: string
  outcome: StepOutcome
  detail?: string
}

/**
 * Result of a full post-deploy run
 */
export interface RunReport {
  /** False only when a precondition stopped the run */
  success: boolean
  exitCode: number
  steps: StepReport[]
  findings: AuditFinding[]
  deployment?: ToolDeployment
  /** Message of the error that stopped the run */
  error?: string
}
