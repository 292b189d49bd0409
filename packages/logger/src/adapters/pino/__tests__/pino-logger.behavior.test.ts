import { Writable } from "node:stream"
import pino from "pino"

import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parse(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "null")
}

describe("PinoLogger behavior", () => {
  it("emits JSON with context and meta to the destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { module: "config" })

    logger.info("Configuration loaded", { fieldCount: 2 })

    expect(lines).toHaveLength(1)

    const payload = parse(lines[0])

    expect(payload).toMatchObject({
      msg: "Configuration loaded",
      level: 30,
      module: "config",
      fieldCount: 2,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("defaults to the info level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination })

    logger.debug("ignored")
    logger.info("kept")

    expect(lines.map((l) => parse(l).msg)).toEqual(["kept"])
  })

  it("serializes err with its code and cause", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "trace" })

    const cause = new RangeError("too large")
    const err = Object.assign(new Error("AGE is invalid", { cause }), { code: "invalid_data" })

    logger.fatal("Invalid configuration", { err })

    const payload = parse(lines[0])

    expect(payload.level).toBe(60)
    expect(payload.err).toMatchObject({
      type: "Error",
      code: "invalid_data",
      cause: { type: "RangeError", message: "too large" },
    })
  })

  it("child() shares the sink and level of its parent", () => {
    const { lines, destination } = makeLineDestination()

    const parent = new PinoLogger({ destination }, { level: "warn" }, { module: "config" })
    const child = parent.child({ source: "env" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({ msg: "logged", module: "config", source: "env" })
  })

  it("derives from a given pino base logger", () => {
    const { lines, destination } = makeLineDestination()

    const base = pino({ level: "error" }, destination)
    const logger = new PinoLogger({ base }, {}, { service: "api" })

    logger.warn("ignored")
    logger.error("kept")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({ msg: "kept", service: "api" })
  })
})
