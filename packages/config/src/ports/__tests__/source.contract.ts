import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string

  /** Builds a source inside a fresh temporary directory. */
  make: (cwd: string) => Promise<ConfigSource>

  /** Values the source must report. */
  expected: Record<string, string>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let cwd: string

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-source-"))
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("reports the expected values", async () => {
      const source = await h.make(cwd)

      expect(await source.load()).toMatchObject(h.expected)
    })

    it("has a non-empty name", async () => {
      const source = await h.make(cwd)

      expect(source.name.length).toBeGreaterThan(0)
    })

    it("returns a fresh plain object on every load", async () => {
      const source = await h.make(cwd)

      const first = await source.load()
      first.SMTP_HOST_OVERRIDE = "mutated.example.test"
      const second = await source.load()

      expect(Object.getPrototypeOf(second)).toBe(Object.prototype)
      expect(second).not.toHaveProperty("SMTP_HOST_OVERRIDE")
      expect(second).toEqual(await source.load())
    })
  })
}
