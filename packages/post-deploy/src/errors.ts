export type AutomatorErrorCode = "ENV_FILE_MISSING" | "INVALID_RUNTIME_ENV" | "INVALID_ARGUMENTS"

export class AutomatorError extends Error {
  readonly code: AutomatorErrorCode
  readonly exitCode: number

  constructor(code: AutomatorErrorCode, message: string, exitCode = 1) {
    super(message)
    this.name = "AutomatorError"
    this.code = code
    this.exitCode = exitCode
  }

  static envFileMissing(envPath: string): AutomatorError {
    return new AutomatorError("ENV_FILE_MISSING", `No .env file found at ${envPath}`)
  }

  static invalidRuntimeEnv(message: string): AutomatorError {
    return new AutomatorError("INVALID_RUNTIME_ENV", message)
  }

  static invalidArguments(message: string): AutomatorError {
    return new AutomatorError("INVALID_ARGUMENTS", message)
  }
}
