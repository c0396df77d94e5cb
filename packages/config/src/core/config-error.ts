import { BaseError } from "@postline/errors"

export type ConfigErrorCode = "config_invalid"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(summary: string, issues: readonly string[]): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${summary}`, {
      code: "config_invalid",
      context: { issues },
      isOperational: true,
    })
  }
}
