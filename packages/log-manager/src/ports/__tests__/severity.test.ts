import { compareSeverity, isSeverity, severityNames } from "../severity"

describe("severity", () => {
  it("lists severities from least to most severe", () => {
    const sorted = [...severityNames].sort(compareSeverity)

    expect(sorted).toEqual(["debug", "info", "warning", "error", "critical"])
    expect(compareSeverity("warning", "error")).toBeLessThan(0)
    expect(compareSeverity("critical", "critical")).toBe(0)
  })

  it("recognizes severity names only", () => {
    expect(isSeverity("warning")).toBe(true)
    expect(isSeverity("warn")).toBe(false)
    expect(isSeverity("toString")).toBe(false)
    expect(isSeverity(20)).toBe(false)
  })
})
