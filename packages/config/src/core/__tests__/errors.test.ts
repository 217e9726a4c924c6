import { ConfigValidationError } from "../errors"

describe("ConfigValidationError", () => {
  it("formats nested and indexed paths", () => {
    const err = ConfigValidationError.fromIssues([
      { path: ["writers", 0, "format"], message: "Invalid option" },
      { path: [], message: "Expected object" },
    ])

    expect(err.context.issues).toEqual([
      { path: "writers[0].format", message: "Invalid option" },
      { path: "", message: "Expected object" },
    ])
    expect(err.message).toBe(
      "Configuration validation failed:\n  writers[0].format: Invalid option\n  (root): Expected object",
    )
  })
})
