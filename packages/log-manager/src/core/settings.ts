import * as path from "node:path"
import {
  type ConfigSource,
  ConfigValidationError,
  DotenvSource,
  EnvSource,
  loadConfig,
} from "@loglane/config"
import { createStderrLogger, type LogLevelName, logLevelNames } from "@loglane/diagnostics"
import { z } from "zod/mini"
import { logFormats, type LogFormat } from "../ports/log-record"
import { ConfigurationError } from "./errors"
import {
  DEFAULT_LOG_DIRECTORY,
  DEFAULT_LOG_FORMAT,
  DEFAULT_LOGGER_NAME,
  LogManager,
  type LogManagerDeps,
  type LogManagerOptions,
} from "./log-manager"

export const SETTINGS_ENV_PREFIX = "LOGLANE_"

export const settingsSchema = z.object({
  DIRECTORY: z._default(z.string().check(z.minLength(1)), DEFAULT_LOG_DIRECTORY),
  FORMAT: z._default(z.enum(logFormats), DEFAULT_LOG_FORMAT),
  LOGGER_NAME: z._default(z.string().check(z.minLength(1)), DEFAULT_LOGGER_NAME),
  DIAGNOSTICS_LEVEL: z._default(z.enum(logLevelNames), "warn"),
  DIAGNOSTICS_PRETTY: z._default(z.stringbool(), false),
})

export type LogSettings = {
  /** Absolute path. */
  directory: string
  format: LogFormat
  loggerName: string
  diagnostics: {
    level: LogLevelName
    prettify: boolean
  }
}

export type LoadLogSettingsOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>

  /** Base for `.env` and for a relative `LOGLANE_DIRECTORY`. @default process.cwd() */
  cwd?: string
}

/**
 * Reads `.env` (optional) and then `LOGLANE_*` environment variables.
 *
 * | variable | default |
 * |---|---|
 * | `LOGLANE_DIRECTORY` | `data/logs` |
 * | `LOGLANE_FORMAT` | `json` |
 * | `LOGLANE_LOGGER_NAME` | `loglane` |
 * | `LOGLANE_DIAGNOSTICS_LEVEL` | `warn` |
 * | `LOGLANE_DIAGNOSTICS_PRETTY` | `false` |
 *
 * @throws {ConfigurationError} when a value fails validation.
 */
export async function loadLogSettings(
  options: LoadLogSettingsOptions = {},
): Promise<LogSettings> {
  const cwd = options.cwd ?? process.cwd()

  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd, prefix: SETTINGS_ENV_PREFIX }),
    new EnvSource({ prefix: SETTINGS_ENV_PREFIX, env: options.env ?? process.env }),
  ]

  try {
    const config = await loadConfig({ schema: settingsSchema, sources })

    return {
      directory: path.resolve(cwd, config.get("DIRECTORY")),
      format: config.get("FORMAT"),
      loggerName: config.get("LOGGER_NAME"),
      diagnostics: {
        level: config.get("DIAGNOSTICS_LEVEL"),
        prettify: config.get("DIAGNOSTICS_PRETTY"),
      },
    }
  } catch (err) {
    if (err instanceof ConfigValidationError) throw ConfigurationError.invalidSettings(err)
    throw err
  }
}

export type CreateLogManagerOptions = LogManagerOptions & LoadLogSettingsOptions

/**
 * Builds a LogManager from loaded settings. Explicit options win over
 * settings; a `diagnostics` dependency wins over the configured one.
 */
export async function createLogManager(
  options: CreateLogManagerOptions = {},
  deps: LogManagerDeps = {},
): Promise<LogManager> {
  const { env, cwd = process.cwd(), ...overrides } = options
  const settings = await loadLogSettings({ cwd, ...(env !== undefined && { env }) })

  return new LogManager(
    {
      directory:
        overrides.directory !== undefined
          ? path.resolve(cwd, overrides.directory)
          : settings.directory,
      format: overrides.format ?? settings.format,
      loggerName: overrides.loggerName ?? settings.loggerName,
    },
    {
      ...deps,
      diagnostics: deps.diagnostics ?? createStderrLogger(settings.diagnostics),
    },
  )
}
