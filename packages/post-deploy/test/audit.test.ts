import { writeFileSync } from "node:fs"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { parseConfigMap, toProjectEnv } from "../src/config-reader"
import { AutomatorError } from "../src/errors"
import { assertEnvFile, auditEnvironment, evaluateAdvisoryRules } from "../src/executors/audit"
import { createFakeRunner, createTempProject, createTestLogger, testSettings } from "./helpers"

const envOf = (content: string) => toProjectEnv(parseConfigMap(content))

const PRODUCTION = [
  "APP_KEY=base64:dGVzdC1zZWNyZXQ=",
  "APP_ENV=production",
  "APP_DEBUG=false",
  "APP_URL=https://shop.example.test",
  "QUEUE_CONNECTION=redis",
  "SESSION_DRIVER=file",
  "CACHE_DRIVER=redis",
].join("\n")

describe("evaluateAdvisoryRules", () => {
  it("produces nothing for a production-ready file", () => {
    expect(evaluateAdvisoryRules(envOf(PRODUCTION))).toEqual([])
  })

  it("flags debug mode, a local environment and a localhost URL", () => {
    const findings = evaluateAdvisoryRules(
      envOf("APP_KEY=base64:dGVzdC1zZWNyZXQ=\nAPP_ENV=local\nAPP_DEBUG=true\nAPP_URL=http://localhost"),
    )

    expect(findings.map(f => f.rule)).toEqual(["app-debug-enabled", "app-env-not-production", "app-url-misconfigured"])
  })

  it("matches APP_DEBUG case-insensitively", () => {
    expect(evaluateAdvisoryRules(envOf("APP_ENV=production\nAPP_DEBUG=TRUE")).map(f => f.rule)).toEqual([
      "app-debug-enabled",
    ])
  })

  it("treats an absent APP_ENV as not production", () => {
    const [finding] = evaluateAdvisoryRules(envOf(""))

    expect(finding?.rule).toBe("app-env-not-production")
    expect(finding?.notes[0]).toBe("Current Value: not set")
    expect(finding?.suggestion).toBe("APP_ENV=production")
  })

  it("flags an APP_URL without a scheme", () => {
    const findings = evaluateAdvisoryRules(envOf("APP_ENV=production\nAPP_URL=shop.example.test"))

    expect(findings).toHaveLength(1)
    expect(findings[0]?.rule).toBe("app-url-misconfigured")
    expect(findings[0]?.suggestion).toBeUndefined()
  })

  it("flags sync queues and array drivers", () => {
    const findings = evaluateAdvisoryRules(
      envOf("APP_ENV=production\nQUEUE_CONNECTION=sync\nSESSION_DRIVER=array\nCACHE_DRIVER=array"),
    )

    expect(findings.map(f => [f.rule, f.keys])).toEqual([
      ["queue-sync", ["QUEUE_CONNECTION"]],
      ["driver-array", ["SESSION_DRIVER"]],
      ["driver-array", ["CACHE_DRIVER"]],
    ])
  })
})

describe("auditEnvironment", () => {
  it("reports exactly three findings for debug, local and localhost", () => {
    const { runner, commands } = createFakeRunner()
    const { logger } = createTestLogger()

    const { findings, report } = auditEnvironment({
      env: envOf("APP_KEY=base64:dGVzdC1zZWNyZXQ=\nAPP_ENV=local\nAPP_DEBUG=true\nAPP_URL=http://localhost"),
      settings: testSettings("/srv/app"),
      runner,
      logger,
    })

    expect(findings).toHaveLength(3)
    expect(report).toEqual({ step: "audit", outcome: "ok", detail: "3 finding(s)" })
    expect(commands()).toEqual([])
  })

  it("reports debug, environment and queue findings for a staging file", () => {
    const { runner } = createFakeRunner()
    const { logger } = createTestLogger()

    const { findings } = auditEnvironment({
      env: envOf("APP_KEY=base64:dGVzdC1zZWNyZXQ=\nAPP_DEBUG=true\nAPP_ENV=staging\nQUEUE_CONNECTION=sync"),
      settings: testSettings("/srv/app"),
      runner,
      logger,
    })

    expect(findings.map(f => f.rule)).toEqual(["app-debug-enabled", "app-env-not-production", "queue-sync"])
    expect(findings[1]?.notes[0]).toBe("Current Value: staging")
  })

  it("suggests a freshly generated key when APP_KEY is missing", () => {
    const { runner, commands } = createFakeRunner(command =>
      command === "php artisan key:generate --show" ? { stdout: "base64:dGVzdC1zZWNyZXQ=" } : undefined,
    )
    const { logger } = createTestLogger()

    const { findings, report } = auditEnvironment({
      env: envOf("APP_ENV=production"),
      settings: testSettings("/srv/app"),
      runner,
      logger,
    })

    expect(commands()).toEqual(["php artisan key:generate --show"])
    expect(findings).toHaveLength(1)
    expect(findings[0]).toMatchObject({
      rule: "app-key-missing",
      severity: "attention",
      suggestion: "APP_KEY=base64:dGVzdC1zZWNyZXQ=",
    })
    expect(report).toEqual({ step: "audit", outcome: "ok", detail: "1 finding(s)" })
  })

  it("treats an empty APP_KEY as missing", () => {
    const { runner, commands } = createFakeRunner(() => ({ stdout: "base64:dGVzdC1zZWNyZXQ=" }))
    const { logger } = createTestLogger()

    auditEnvironment({ env: envOf("APP_KEY=\nAPP_ENV=production"), settings: testSettings("/srv/app"), runner, logger })

    expect(commands()).toEqual(["php artisan key:generate --show"])
  })

  it("uses the configured php binary", () => {
    const { runner, commands } = createFakeRunner(() => ({ stdout: "base64:dGVzdC1zZWNyZXQ=" }))
    const { logger } = createTestLogger()

    auditEnvironment({
      env: envOf("APP_ENV=production"),
      settings: testSettings("/srv/app", { php: "/usr/bin/php8.3" }),
      runner,
      logger,
    })

    expect(commands()).toEqual(["/usr/bin/php8.3 artisan key:generate --show"])
  })

  it("degrades without a suggestion line when key generation fails", () => {
    const { runner } = createFakeRunner(() => ({ exitCode: 1, stderr: "Could not open input file: artisan" }))
    const { logger } = createTestLogger()

    const { findings, report } = auditEnvironment({
      env: envOf("APP_ENV=production"),
      settings: testSettings("/srv/app"),
      runner,
      logger,
    })

    expect(findings[0]?.suggestion).toBeUndefined()
    expect(findings[0]?.notes).toEqual([
      "Could not generate a key automatically: Could not open input file: artisan",
      "Run 'php artisan key:generate' in the project root.",
    ])
    expect(report).toEqual({ step: "audit", outcome: "degraded", detail: "APP_KEY could not be generated" })
  })

  it("does not accept empty output as a key", () => {
    const { runner } = createFakeRunner(() => ({ stdout: "" }))
    const { logger } = createTestLogger()

    const { report } = auditEnvironment({
      env: envOf("APP_ENV=production"),
      settings: testSettings("/srv/app"),
      runner,
      logger,
    })

    expect(report.outcome).toBe("degraded")
  })

  it("renders each finding inside separators", () => {
    const { runner } = createFakeRunner()
    const { logger, lines } = createTestLogger()

    auditEnvironment({
      env: envOf("APP_KEY=base64:dGVzdC1zZWNyZXQ=\nAPP_ENV=production\nAPP_DEBUG=true"),
      settings: testSettings("/srv/app"),
      runner,
      logger,
    })

    const separator = `[warn] ${"-".repeat(64)}`
    expect(lines()).toEqual([
      "[info] Checking environment...",
      "[info] ",
      separator,
      "[warn] [ATTENTION] APP_DEBUG is set to 'true'.",
      "[warn] For production environments, it is highly recommended to set this to 'false'.",
      "[warn] Suggestion: Update your .env file with:",
      "[success] APP_DEBUG=false",
      separator,
      "[info] ",
    ])
  })

  it("reports no findings for a production-ready file", () => {
    const { runner } = createFakeRunner()
    const { logger } = createTestLogger()

    const { findings, report } = auditEnvironment({
      env: envOf(PRODUCTION),
      settings: testSettings("/srv/app"),
      runner,
      logger,
    })

    expect(findings).toEqual([])
    expect(report.detail).toBe("no findings")
  })
})

describe("assertEnvFile", () => {
  let project: ReturnType<typeof createTempProject>

  beforeEach(() => {
    project = createTempProject()
  })

  afterEach(() => {
    project.cleanup()
  })

  it("returns the path when the file exists", () => {
    writeFileSync(join(project.root, ".env"), "APP_ENV=production\n")

    expect(assertEnvFile(project.root)).toBe(join(project.root, ".env"))
  })

  it("throws ENV_FILE_MISSING otherwise", () => {
    let caught: unknown
    try {
      assertEnvFile(project.root)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(AutomatorError)
    expect(caught).toMatchObject({
      code: "ENV_FILE_MISSING",
      message: `No .env file found at ${join(project.root, ".env")}`,
    })
  })
})
