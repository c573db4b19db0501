import { describe, expect, it } from "vitest"
import { detectWebUser, resolveRuntimeSettings } from "../src/executors/identity"
import { createFakeRunner, createTestLogger } from "./helpers"

const existing =
  (...users: string[]) =>
  (command: string) => {
    const match = /^id -u (.+)$/.exec(command)
    if (!match) return undefined
    return users.includes(match[1] ?? "") ? { stdout: "33" } : { exitCode: 1, stderr: "id: no such user" }
  }

describe("detectWebUser", () => {
  it("picks the first candidate present on the host", () => {
    const { runner, commands } = createFakeRunner(existing("nginx", "apache"))

    expect(detectWebUser(runner)).toBe("nginx")
    expect(commands()).toEqual(["id -u www-data", "id -u nginx"])
  })

  it("falls back to www-data when no candidate exists", () => {
    const { runner, commands } = createFakeRunner(existing())

    expect(detectWebUser(runner)).toBe("www-data")
    expect(commands()).toEqual(["id -u www-data", "id -u nginx", "id -u apache"])
  })
})

describe("resolveRuntimeSettings", () => {
  it("resolves identities from the environment and the host", () => {
    const { runner } = createFakeRunner(existing("forge", "apache"))
    const { logger, lines } = createTestLogger()

    const settings = resolveRuntimeSettings({
      env: { FORGE_PHP: "php8.3", FORGE_USER: "forge" },
      basePath: "/srv/app",
      runner,
      logger,
    })

    expect(settings).toEqual({ basePath: "/srv/app", php: "php8.3", deployUser: "forge", webUser: "apache" })
    expect(lines()).toEqual([])
  })

  it("skips detection when the web user is configured", () => {
    const { runner, commands } = createFakeRunner(existing("deploy"))
    const { logger } = createTestLogger()

    const settings = resolveRuntimeSettings({
      env: { FORGE_PHP: "php", FORGE_USER: "deploy", AUTOMATOR_WEB_USER: "caddy" },
      basePath: "/srv/app",
      runner,
      logger,
    })

    expect(settings.webUser).toBe("caddy")
    expect(commands()).toEqual(["id -u deploy"])
  })

  it("warns but continues when the deploy user is missing", () => {
    const { runner } = createFakeRunner(existing("www-data"))
    const { logger, lines } = createTestLogger()

    const settings = resolveRuntimeSettings({
      env: { FORGE_PHP: "php", FORGE_USER: "forge" },
      basePath: "/srv/app",
      runner,
      logger,
    })

    expect(settings.deployUser).toBe("forge")
    expect(lines()).toEqual(["[warn] User forge not found on this host. Ownership changes will likely fail."])
  })
})
