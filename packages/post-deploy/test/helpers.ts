import { mkdtempSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { createLogger, createMemorySink, type LogEntry, type Logger } from "@afterdeploy/logger"
import { describeCommand } from "../src/executors/common"
import type { Command, CommandResult, CommandRunner, RuntimeSettings } from "../src/types"

export interface RecordedCall {
  command: Command
  strict: boolean
}

export type Responder = (command: string) => Partial<CommandResult> | undefined

/**
 * In-process CommandRunner. Every call is recorded; `respond` gets the
 * space-joined command and may override the result. Unmatched commands
 * exit 0 with empty output.
 */
export function createFakeRunner(respond: Responder = () => undefined, cwd = "/srv/app") {
  const calls: RecordedCall[] = []
  const runner: CommandRunner = {
    cwd,
    run(command, options = {}) {
      const strict = options.strict ?? false
      calls.push({ command, strict })
      const partial = respond(describeCommand(command)) ?? {}
      const exitCode = partial.exitCode === undefined ? 0 : partial.exitCode
      return {
        success: partial.success ?? (strict ? exitCode === 0 : true),
        stdout: partial.stdout ?? "",
        stderr: partial.stderr ?? "",
        exitCode,
      }
    },
  }
  return {
    runner,
    calls,
    commands: () => calls.map(call => describeCommand(call.command)),
  }
}

export function createTestLogger(): { logger: Logger; entries: LogEntry[]; lines: () => string[] } {
  const sink = createMemorySink()
  return {
    logger: createLogger(sink),
    entries: sink.entries,
    lines: () => sink.entries.map(entry => `[${entry.level}] ${entry.message}`),
  }
}

export function createTempProject(): { root: string; cleanup: () => void } {
  const root = mkdtempSync(join(tmpdir(), "afterdeploy-"))
  return { root, cleanup: () => rmSync(root, { recursive: true, force: true }) }
}

export function testSettings(basePath: string, overrides: Partial<RuntimeSettings> = {}): RuntimeSettings {
  return {
    basePath,
    php: "php",
    deployUser: "forge",
    webUser: "www-data",
    ...overrides,
  }
}
