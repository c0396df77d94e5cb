import { DotenvSource, EnvSource, loadConfig } from "@postline/config"
import { type LoggerOptions, logLevelNames } from "@postline/logger"
import { z } from "zod"
import { authMechanisms, type MailerSettings } from "../../ports/mailer-options"

const flag = (fallback: boolean) => z.stringbool().default(fallback)

const port = z.coerce.number().int().min(1).max(65_535)
const timeout = z.coerce.number().int().positive()

const commaList = z.string().transform((raw) =>
  raw
    .split(",")
    .map((v) => v.trim().toLowerCase())
    .filter(Boolean),
)

export const mailerEnvSchema = z
  .object({
    SMTP_HOST: z.string().min(1),
    SMTP_PORT: port.default(587),
    SMTP_SECURE: flag(false),
    SMTP_START_TLS: flag(true),
    SMTP_USERNAME: z.string().min(1).optional(),
    SMTP_PASSWORD: z.string().optional(),
    SMTP_AUTH_TYPE: commaList
      .pipe(z.array(z.enum(authMechanisms)).min(1))
      .default(["plain", "login"]),
    SMTP_SOCKET_TIMEOUT_MS: timeout.default(60_000),
    SMTP_RESPONSE_TIMEOUT_MS: timeout.default(30_000),
    SMTP_CLIENT_NAME: z.string().min(1).default("[127.0.0.1]"),
    SMTP_DSN_RETURN: z.enum(["headers", "full"]).optional(),
    SMTP_DSN_NOTIFY: commaList
      .pipe(z.array(z.enum(["success", "failure", "delay", "never"])))
      .optional(),
    SMTP_DSN_ORCPT: flag(false),
    LOG_LEVEL: z.enum(logLevelNames).default("info"),
    LOG_PRETTY: flag(false),
  })
  .refine((env) => (env.SMTP_USERNAME === undefined) === (env.SMTP_PASSWORD === undefined), {
    message: "SMTP_USERNAME and SMTP_PASSWORD must be set together",
    path: ["SMTP_PASSWORD"],
  })

export type MailerEnv = z.infer<typeof mailerEnvSchema>

export type LoadMailerConfigOptions = {
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>

  /** Directory holding the dotenv file. Defaults to `process.cwd()`. */
  cwd?: string

  /** @default ".env" */
  file?: string
}

export type MailerConfig = {
  mailer: MailerSettings
  logging: LoggerOptions
}

/**
 * Reads `SMTP_*` and `LOG_*` settings from a dotenv file (when present) and
 * the environment, which wins.
 *
 * @throws {ConfigError} when a variable is missing or malformed
 */
export async function loadMailerConfig(
  options: LoadMailerConfigOptions = {},
): Promise<MailerConfig> {
  const config = await loadConfig({
    schema: mailerEnvSchema,
    sources: [
      new DotenvSource({
        file: options.file ?? ".env",
        required: false,
        ...(options.cwd && { cwd: options.cwd }),
      }),
      new EnvSource({ ...(options.env && { env: options.env }) }),
    ],
  })

  return toMailerConfig(config.value)
}

export function toMailerConfig(env: MailerEnv): MailerConfig {
  const dsn = {
    ...(env.SMTP_DSN_RETURN && { return: env.SMTP_DSN_RETURN }),
    ...(env.SMTP_DSN_NOTIFY && {
      notify: env.SMTP_DSN_NOTIFY.filter((n) => n !== "never"),
    }),
    ...(env.SMTP_DSN_ORCPT && { orcpt: true }),
  }

  return {
    mailer: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      secure: env.SMTP_SECURE,
      startTls: env.SMTP_START_TLS,
      ...(env.SMTP_USERNAME !== undefined && {
        credentials: { username: env.SMTP_USERNAME, password: env.SMTP_PASSWORD ?? "" },
      }),
      authType: env.SMTP_AUTH_TYPE,
      socketTimeoutMs: env.SMTP_SOCKET_TIMEOUT_MS,
      responseTimeoutMs: env.SMTP_RESPONSE_TIMEOUT_MS,
      clientName: env.SMTP_CLIENT_NAME,
      ...(Object.keys(dsn).length > 0 && { dsn }),
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}
