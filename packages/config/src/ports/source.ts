/**
 * Raw configuration values from one place: the environment, a dotenv file,
 * an object. Sources only load; `loadConfig` merges them in order (later
 * wins) and the schema coerces and validates the result.
 */
export interface ConfigSource {
  /** Shown by `Config.explain`, e.g. "env" or "dotenv:.env". */
  readonly name: string

  /** An `undefined` value means the key was not provided. */
  load(): Promise<Record<string, unknown>>
}
