import { ConfigError } from "@postline/config"
import { z } from "zod"
import type { MailerOptions, ResolvedMailerOptions } from "../../ports/mailer-options"
import { mailerSettingsSchema } from "./schemas"

/**
 * Validates caller options once and fills in defaults.
 *
 * @throws {ConfigError} with one issue path per invalid field
 */
export function resolveMailerOptions(options: MailerOptions): ResolvedMailerOptions {
  const { hooks, ...settings } = options
  const result = mailerSettingsSchema.safeParse(settings)

  if (!result.success) {
    throw ConfigError.invalid(
      z.prettifyError(result.error),
      result.error.issues.map((issue) => issue.path.join(".")),
    )
  }

  const { credentials, dsn, ...rest } = result.data

  return Object.freeze({
    ...rest,
    authType: Object.freeze([...rest.authType]),
    ...(credentials && { credentials: Object.freeze({ ...credentials }) }),
    ...(dsn && { dsn: Object.freeze({ ...dsn }) }),
    hooks: hooks ?? {},
  })
}
