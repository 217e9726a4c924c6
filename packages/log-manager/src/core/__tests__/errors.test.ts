import { ConfigurationError, SerializationError, WriteError } from "../errors"

function fsError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code })
}

describe("log-manager errors", () => {
  describe("WriteError", () => {
    const target = { path: "/var/log/app/json/error.json", format: "json", level: "error" } as const

    it("names the path and the cause", () => {
      const err = WriteError.fromCause(target, fsError("EACCES", "permission denied"))

      expect(err.message).toBe(
        "Failed to append json record to /var/log/app/json/error.json: permission denied",
      )
      expect(err.code).toBe("write_error")
      expect(err.context).toEqual({ ...target, errno: "EACCES" })
      expect(err.isRetryable).toBe(false)
    })

    it.each(["EAGAIN", "EBUSY", "EMFILE", "ENFILE"])("is retryable for %s", (code) => {
      expect(WriteError.fromCause(target, fsError(code, "busy")).isRetryable).toBe(true)
    })

    it("accepts non-Error causes", () => {
      const err = WriteError.fromCause(target, "boom")

      expect(err.message.endsWith(": boom")).toBe(true)
      expect(err.context).toEqual(target)
    })
  })

  describe("ConfigurationError", () => {
    it("reports an unusable directory", () => {
      const cause = fsError("EACCES", "permission denied")
      const err = ConfigurationError.directoryUnavailable("/root/logs", cause)

      expect(err.message).toBe("Cannot use log directory /root/logs: permission denied")
      expect(err.code).toBe("configuration_error")
      expect(err.context).toEqual({ directory: "/root/logs", errno: "EACCES" })
      expect(err.cause).toBe(cause)
    })

    it("reports an unsupported format", () => {
      expect(ConfigurationError.unsupportedFormat("xml").message).toBe(
        "Unsupported log format: xml",
      )
    })
  })

  describe("SerializationError", () => {
    it("reports a missing writer", () => {
      const err = SerializationError.unsupportedFormat("yaml")

      expect(err.message).toBe("No writer for log format: yaml")
      expect(err.context).toEqual({ format: "yaml" })
    })

    it("reports an unknown level", () => {
      expect(SerializationError.unknownLevel("notice").message).toBe("Unknown log level: notice")
    })

    it("wraps an encoding failure", () => {
      const err = SerializationError.unencodable("json", new TypeError("cyclic"))

      expect(err.message).toBe("Cannot encode record as json: cyclic")
      expect(err.toJSON()).toMatchObject({ name: "SerializationError", code: "serialization_error" })
    })
  })
})
