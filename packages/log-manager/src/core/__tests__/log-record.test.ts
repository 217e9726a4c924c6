import type { Severity } from "../../ports/severity"
import { createLogRecord } from "../log-record"

describe("createLogRecord", () => {
  const timestamp = new Date("2024-01-15T10:30:00.000Z")

  it("returns a frozen record", () => {
    const record = createLogRecord("warning", "low disk", timestamp)

    expect(record).toEqual({ timestamp, level: "warning", message: "low disk" })
    expect(Object.isFrozen(record)).toBe(true)
  })

  it("accepts an empty message", () => {
    expect(createLogRecord("info", "", timestamp).message).toBe("")
  })

  it.each([
    [42, "number"],
    [null, "null"],
    [undefined, "undefined"],
    [{ text: "x" }, "object"],
  ])("rejects %j with SerializationError", (message, receivedType) => {
    expect(() => createLogRecord("error", message, timestamp)).toThrow(
      expect.objectContaining({
        name: "SerializationError",
        code: "serialization_error",
        message: `Log message must be a string, received ${receivedType}`,
        context: { receivedType },
      }),
    )
  })

  it("rejects a level outside the severity table", () => {
    const level: unknown = "bogus"

    expect(() => createLogRecord(level as Severity, "x", timestamp)).toThrow(
      expect.objectContaining({
        name: "SerializationError",
        message: "Unknown log level: bogus",
        context: { level: "bogus" },
      }),
    )
  })
})
