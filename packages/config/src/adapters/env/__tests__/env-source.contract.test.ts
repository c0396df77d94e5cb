import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: async () => new EnvSource({ env: { SMTP_HOST: "mail.example.test" } }),
  expected: { SMTP_HOST: "mail.example.test" },
})
