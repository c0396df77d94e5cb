import { describeSmtpConnectorContract } from "../../../ports/__tests__/smtp-connector.contract"
import { MemoryRelay } from "../memory-relay"

describe("MemoryRelay contract", () => {
  describeSmtpConnectorContract({
    name: "MemoryRelay",

    async make() {
      return {
        connector: new MemoryRelay(),
        params: { host: "relay.test", port: 25, secure: false, timeoutMs: 1_000 },
      }
    },
  })
})
