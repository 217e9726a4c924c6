import { BaseError, type ErrorContext } from "@loglane/errors"

export type ConfigIssue = { path: string; message: string }

type SchemaIssue = {
  path: ReadonlyArray<PropertyKey>
  message: string
}

function formatPath(path: ReadonlyArray<PropertyKey>): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

export class ConfigValidationError extends BaseError<"config_validation_error"> {
  declare readonly context: ErrorContext & { issues: ConfigIssue[] }

  static fromIssues(issues: ReadonlyArray<SchemaIssue>): ConfigValidationError {
    const mapped = issues.map((i) => ({ path: formatPath(i.path), message: i.message }))
    const lines = mapped.map((i) => `  ${i.path || "(root)"}: ${i.message}`)

    return new ConfigValidationError(
      `Configuration validation failed:\n${lines.join("\n")}`,
      {
        code: "config_validation_error",
        context: { issues: mapped },
      },
    )
  }
}
