import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("returns all env vars when no prefix", async () => {
    const env = {
      SMTP_HOST: "mail.example.test",
      SMTP_PORT: "2525",
      LOG_LEVEL: "debug",
    }

    const source = new EnvSource({ env })
    const result = await source.load()

    expect(result).toEqual(env)
    expect(source.name).toBe("env")
  })

  it("filters and strips prefix when provided", async () => {
    const env = {
      APP_SMTP_HOST: "mail.example.test",
      APP_SMTP_PORT: "2525",
      OTHER_KEY: "ignored",
      PATH: "/usr/bin",
    }

    const source = new EnvSource({ env, prefix: "APP_" })
    const result = await source.load()

    expect(result).toEqual({
      SMTP_HOST: "mail.example.test",
      SMTP_PORT: "2525",
    })
    expect(source.name).toBe("env:APP_")
  })

  it("uses injected env over process.env", async () => {
    const source = new EnvSource({ env: { SMTP_CLIENT_NAME: "relay.example.test" } })
    const result = await source.load()

    expect(result).toEqual({ SMTP_CLIENT_NAME: "relay.example.test" })
    expect(result).not.toHaveProperty("PATH")
  })
})
