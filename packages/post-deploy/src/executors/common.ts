import { spawnSync } from "node:child_process"
import type { Command, CommandResult, CommandRunner, RunCommandOptions, StepOutcome } from "../types.js"

/**
 * Render a command for log lines
 */
export function describeCommand(command: Command): string {
  return typeof command === "string" ? command : command.join(" ")
}

/**
 * Execute a command synchronously in `cwd`
 *
 * Never throws: launch errors come back as `success: false` with the
 * error message in `stderr`.
 *
 * @param command - Argument list (spawned directly) or shell string
 * @param cwd - Working directory, always the project root
 * @param options - `strict` turns a nonzero exit into `success: false`
 */
export function runCommand(command: Command, cwd: string, options: RunCommandOptions = {}): CommandResult {
  try {
    const result =
      typeof command === "string"
        ? spawnSync(command, { cwd, encoding: "utf-8", shell: true })
        : spawnSync(command[0] ?? "", command.slice(1), { cwd, encoding: "utf-8" })

    if (result.error) {
      return { success: false, stdout: "", stderr: result.error.message, exitCode: null }
    }

    const exitCode = result.status
    return {
      success: options.strict ? exitCode === 0 : true,
      stdout: (result.stdout ?? "").trim(),
      stderr: (result.stderr ?? "").trim(),
      exitCode,
    }
  } catch (error) {
    return {
      success: false,
      stdout: "",
      stderr: error instanceof Error ? error.message : String(error),
      exitCode: null,
    }
  }
}

export function createCommandRunner(cwd: string): CommandRunner {
  return {
    cwd,
    run: (command, options) => runCommand(command, cwd, options),
  }
}

/**
 * True when the command started and exited 0, regardless of strict mode
 */
export function exitedCleanly(result: CommandResult): boolean {
  return result.success && result.exitCode === 0
}

/**
 * Fold per-command outcomes into a step outcome
 */
export function worstOutcome(outcomes: StepOutcome[]): StepOutcome {
  if (outcomes.includes("degraded")) return "degraded"
  if (outcomes.length > 0 && outcomes.every(o => o === "skipped")) return "skipped"
  return "ok"
}
