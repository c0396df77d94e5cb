/**
 * Configuration container providing type-safe access to validated configuration values.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     SMTP_HOST: z.string(),
 *     SMTP_PORT: z.coerce.number().default(587),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("SMTP_PORT")     // 587
 * config.explain("SMTP_HOST") // "dotenv:.env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Explains which source provided the final value for a key.
   *
   * @returns The source name (e.g., "env", "dotenv:.env", "default" for Zod defaults).
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Returns the names of all sources that contributed at least one value.
   */
  sourcesUsed(): string[]

  /**
   * Returns keys present in sources but not defined in the schema.
   *
   * Useful for spotting a misspelt `SMTP_*` variable.
   */
  unknownKeys(): string[]
}
