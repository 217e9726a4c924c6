import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"
import { FakeClock } from "@loglane/clock"
import { mock } from "vitest-mock-extended"
import type { ConsoleSink } from "../../ports/console-sink"
import { RecordingLogger } from "../../tests/utils/recording-logger"
import { createLogManager, loadLogSettings } from "../settings"

describe("loadLogSettings", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "loglane-settings-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("falls back to defaults", async () => {
    await expect(loadLogSettings({ env: {}, cwd })).resolves.toEqual({
      directory: path.join(cwd, "data", "logs"),
      format: "json",
      loggerName: "loglane",
      diagnostics: { level: "warn", prettify: false },
    })
  })

  it("reads LOGLANE_ variables", async () => {
    const settings = await loadLogSettings({
      cwd,
      env: {
        LOGLANE_DIRECTORY: "/srv/logs",
        LOGLANE_FORMAT: "csv",
        LOGLANE_LOGGER_NAME: "worker",
        LOGLANE_DIAGNOSTICS_LEVEL: "debug",
        LOGLANE_DIAGNOSTICS_PRETTY: "true",
        FORMAT: "json",
      },
    })

    expect(settings).toEqual({
      directory: "/srv/logs",
      format: "csv",
      loggerName: "worker",
      diagnostics: { level: "debug", prettify: true },
    })
  })

  it("resolves a relative directory against cwd", async () => {
    const settings = await loadLogSettings({ cwd, env: { LOGLANE_DIRECTORY: "var/log" } })

    expect(settings.directory).toBe(path.join(cwd, "var", "log"))
  })

  it("reads .env and lets the environment win", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "LOGLANE_FORMAT=csv\nLOGLANE_LOGGER_NAME=from-file\n",
    )

    const settings = await loadLogSettings({ cwd, env: { LOGLANE_LOGGER_NAME: "from-env" } })

    expect(settings.format).toBe("csv")
    expect(settings.loggerName).toBe("from-env")
  })

  it("throws ConfigurationError for an invalid format", async () => {
    await expect(loadLogSettings({ cwd, env: { LOGLANE_FORMAT: "xml" } })).rejects.toMatchObject({
      name: "ConfigurationError",
      code: "configuration_error",
      cause: { name: "ConfigValidationError" },
    })
  })

  it("throws ConfigurationError for an empty directory", async () => {
    await expect(
      loadLogSettings({ cwd, env: { LOGLANE_DIRECTORY: "" } }),
    ).rejects.toMatchObject({
      message: expect.stringContaining("DIRECTORY:"),
    })
  })
})

describe("createLogManager", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "loglane-factory-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("builds a manager from settings", async () => {
    const manager = await createLogManager(
      { cwd, env: { LOGLANE_DIRECTORY: "logs", LOGLANE_FORMAT: "csv", LOGLANE_LOGGER_NAME: "jobs" } },
      { console: mock<ConsoleSink>(), diagnostics: new RecordingLogger() },
    )

    expect(manager.directory).toBe(path.join(cwd, "logs"))
    expect(manager.format).toBe("csv")
    expect(manager.loggerName).toBe("jobs")
    expect((await fs.stat(manager.directory)).isDirectory()).toBe(true)
  })

  it("lets explicit options win over settings", async () => {
    const manager = await createLogManager(
      { cwd, env: { LOGLANE_FORMAT: "csv" }, format: "json", directory: "custom" },
      { console: mock<ConsoleSink>(), diagnostics: new RecordingLogger() },
    )

    expect(manager.format).toBe("json")
    expect(manager.directory).toBe(path.join(cwd, "custom"))
  })

  it("passes dependencies through", async () => {
    const consoleSink = mock<ConsoleSink>()
    const manager = await createLogManager(
      { cwd, env: {} },
      {
        console: consoleSink,
        clock: new FakeClock(new Date("2024-01-15T10:30:00.000Z")),
        diagnostics: new RecordingLogger(),
      },
    )

    await manager.info("ready")

    expect(consoleSink.write).toHaveBeenCalledWith({
      timestamp: new Date("2024-01-15T10:30:00.000Z"),
      level: "info",
      message: "ready",
    })
  })
})
