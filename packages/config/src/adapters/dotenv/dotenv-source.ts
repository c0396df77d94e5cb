import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd`. @example ".env", ".env.smtp" */
  file: string

  /** When false, a missing file loads as no values. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

/** Reads a dotenv file with `dotenv.parse`; never touches `process.env`. */
export class DotenvSource implements ConfigSource {
  readonly name: string
  private readonly filePath: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
    this.filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await this.read()

    return content === undefined ? {} : parse(content)
  }

  private async read(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) return undefined

      throw err
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
