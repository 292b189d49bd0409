import { Writable } from "node:stream"
import { createPinoLogger, logLevelNames } from "@envbind/logger"
import {
  ConfigMissingError,
  type DefineConfigOptions,
  defineConfig,
  field,
  InvalidDataError,
  ProcessEnvSource,
  types,
} from "../index"

const KEYS = ["ENVBIND_E2E_HOST", "ENVBIND_E2E_PORT", "ENVBIND_E2E_LOG_LEVEL"] as const

function captureLogs() {
  const entries: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      entries.push(JSON.parse(chunk.toString("utf8")))
      callback()
    },
  })

  return { entries, logger: createPinoLogger({ destination }, { level: "info" }, { module: "config" }) }
}

describe("config e2e (process.env)", () => {
  afterEach(() => {
    for (const key of KEYS) delete process.env[key]
  })

  const server = (options: DefineConfigOptions = {}) =>
    defineConfig(
      [
        field("ENVBIND_E2E_HOST", "host", types.string()),
        field("ENVBIND_E2E_PORT", "port", types.uint({ min: 1, max: 65535 })),
        field("ENVBIND_E2E_LOG_LEVEL", "logLevel", types.oneOf(logLevelNames)),
      ],
      options,
    )

  it("loads from process.env", () => {
    process.env.ENVBIND_E2E_HOST = "localhost"
    process.env.ENVBIND_E2E_PORT = "8080"
    process.env.ENVBIND_E2E_LOG_LEVEL = "warn"

    expect(server({ logger: captureLogs().logger }).load()).toEqual({
      host: "localhost",
      port: 8080,
      logLevel: "warn",
    })
  })

  it("sees changes made between loads", () => {
    const config = server({ logger: captureLogs().logger })

    process.env.ENVBIND_E2E_HOST = "localhost"
    process.env.ENVBIND_E2E_LOG_LEVEL = "info"

    const before = config.safeLoad()

    process.env.ENVBIND_E2E_PORT = "3000"

    const after = config.safeLoad()

    expect(!before.success && before.error).toBeInstanceOf(ConfigMissingError)
    expect(after).toEqual({
      success: true,
      value: { host: "localhost", port: 3000, logLevel: "info" },
    })
  })

  it("reads prefixed variables through a ProcessEnvSource", () => {
    process.env.ENVBIND_E2E_HOST = "example.com"

    const config = defineConfig([field("HOST", "host", types.string())], {
      logger: captureLogs().logger,
      source: new ProcessEnvSource({ prefix: "ENVBIND_E2E_" }),
    })

    expect(config.load()).toEqual({ host: "example.com" })
  })

  it("writes a fatal entry before exiting", () => {
    process.env.ENVBIND_E2E_HOST = "localhost"
    process.env.ENVBIND_E2E_PORT = "0"
    process.env.ENVBIND_E2E_LOG_LEVEL = "info"

    const { entries, logger } = captureLogs()
    const exit = vi.fn((code: number): never => {
      throw new Error(`exit ${code}`)
    })

    expect(() => server({ logger, exit }).load()).toThrow("exit 1")
    expect(exit).toHaveBeenCalledWith(1)
    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      level: 60,
      module: "config",
      source: "env",
      key: "ENVBIND_E2E_PORT",
      msg: 'Invalid value "0" in environment variable ENVBIND_E2E_PORT (expected unsigned integer): must be at least 1',
      err: { type: "InvalidDataError", code: "invalid_data", value: "0" },
    })
  })

  it("reports the failure without exiting from safeLoad", () => {
    process.env.ENVBIND_E2E_HOST = "localhost"
    process.env.ENVBIND_E2E_PORT = "http"
    process.env.ENVBIND_E2E_LOG_LEVEL = "info"

    const { entries, logger } = captureLogs()
    const result = server({ logger }).safeLoad()

    expect(result.success).toBe(false)
    expect(!result.success && result.error).toBeInstanceOf(InvalidDataError)
    expect(entries).toEqual([])
  })
})
