import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Only keys starting with this prefix are loaded, with the prefix removed.
   * Example: `{ prefix: "APP_" }` turns `APP_SMTP_HOST` into `SMTP_HOST`.
   */
  prefix?: string

  /** Environment to read. Defaults to `process.env`. */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
