import { mock } from "vitest-mock-extended"
import { MemoryRelay } from "../../../adapters/memory/memory-relay"
import type { ConnectParams, SmtpConnection, SmtpConnector } from "../../../ports/connection"
import type { EmailQueue, QueueEmailMessage, QueueMessage } from "../../../ports/queue"
import { CaptureLogger } from "../../../tests/utils/capture-logger"
import { minimalEmail, relayOptions } from "../../../tests/utils/email-fixtures"
import { sequenceIds } from "../../../tests/utils/sequence-ids"
import { enqueueEmail, enqueueEmails, processBatch, processQueueBatch } from "../process-batch"

/** Tracks how many connections are open at once. */
class CountingConnector implements SmtpConnector {
  active = 0
  peak = 0

  constructor(private readonly relay: MemoryRelay) {}

  async connect(params: ConnectParams): Promise<SmtpConnection> {
    const connection = await this.relay.connect(params)

    this.active++
    this.peak = Math.max(this.peak, this.active)

    return {
      readLine: (timeoutMs) => connection.readLine(timeoutMs),
      write: (data) => connection.write(data),
      upgradeToTls: () => connection.upgradeToTls(),
      close: async () => {
        this.active--
        await connection.close()
      },
    }
  }
}

const mailer = relayOptions({ startTls: false })

function queueMessage<T = QueueEmailMessage>(id: string, body: T) {
  return {
    id,
    body,
    ack: vi.fn<QueueMessage<T>["ack"]>(),
    retry: vi.fn<QueueMessage<T>["retry"]>(),
  }
}

describe("processBatch", () => {
  it("yields one outcome per item, in order, without stopping on failure", async () => {
    const relay = new MemoryRelay()

    const outcomes = await processBatch(
      [
        { mailer, email: minimalEmail({ subject: "one" }) },
        { mailer, email: minimalEmail({ to: "not an address" }) },
        { mailer, email: minimalEmail({ subject: "three" }) },
      ],
      { connector: relay, messageIds: sequenceIds("msg"), boundaries: sequenceIds("b") },
    )

    expect(outcomes).toEqual([
      {
        success: true,
        messageId: "<msg1@example.com>",
        response: "250 2.0.0 Ok: queued as Q1",
      },
      {
        success: false,
        stage: "build",
        error: expect.objectContaining({ code: "invalid_email" }),
      },
      {
        success: true,
        messageId: "<msg2@example.com>",
        response: "250 2.0.0 Ok: queued as Q2",
      },
    ])
    expect(relay.connections).toBe(2)
  })

  it("classifies relay failures as delivery and bad settings as build", async () => {
    const relay = new MemoryRelay({ rejectRecipients: ["recipient@example.com"] })

    const outcomes = await processBatch(
      [
        { mailer, email: minimalEmail() },
        { mailer: { host: "" }, email: minimalEmail() },
      ],
      { connector: relay },
    )

    expect(outcomes).toEqual([
      {
        success: false,
        stage: "delivery",
        error: expect.objectContaining({ code: "recipient_rejected", isRetryable: false }),
      },
      {
        success: false,
        stage: "build",
        error: expect.objectContaining({ code: "config_invalid" }),
      },
    ])
  })

  it("opens at most `concurrency` connections at once", async () => {
    const connector = new CountingConnector(new MemoryRelay())
    const items = Array.from({ length: 5 }, (_, i) => ({
      mailer,
      email: minimalEmail({ subject: `#${i}` }),
    }))

    const outcomes = await processBatch(items, { connector, concurrency: 2 })

    expect(outcomes.every((o) => o.success)).toBe(true)
    expect(connector.peak).toBe(2)
    expect(connector.active).toBe(0)
  })

  it("handles an empty batch", async () => {
    expect(await processBatch([])).toEqual([])
  })
})

describe("processQueueBatch", () => {
  it("acknowledges delivered messages and retries failed ones", async () => {
    const relay = new MemoryRelay({ rejectRecipients: ["bounce@example.com"] })
    const delivered = queueMessage("q-1", { mailer, email: minimalEmail() })
    const refused = queueMessage("q-2", {
      mailer,
      email: minimalEmail({ to: "bounce@example.com" }),
    })

    const outcomes = await processQueueBatch([delivered, refused], { connector: relay })

    expect(outcomes.map((o) => [o.queueMessageId, o.success])).toEqual([
      ["q-1", true],
      ["q-2", false],
    ])
    expect(outcomes[1]?.email).toEqual(refused.body.email)
    expect(delivered.ack).toHaveBeenCalledTimes(1)
    expect(delivered.retry).not.toHaveBeenCalled()
    expect(refused.retry).toHaveBeenCalledTimes(1)
    expect(refused.ack).not.toHaveBeenCalled()
  })

  it("fails a malformed body on its own and delivers the rest", async () => {
    const logger = new CaptureLogger()
    const first = queueMessage("q-1", { mailer, email: minimalEmail({ subject: "one" }) })
    const malformed = queueMessage<unknown>("q-2", null)
    const third = queueMessage("q-3", { mailer, email: minimalEmail({ subject: "three" }) })

    const outcomes = await processQueueBatch([first, malformed, third], {
      connector: new MemoryRelay(),
      messageIds: sequenceIds("msg"),
      logger,
    })

    expect(outcomes).toEqual([
      expect.objectContaining({ success: true, queueMessageId: "q-1" }),
      {
        success: false,
        stage: "build",
        error: expect.objectContaining({ code: "invalid_content" }),
        queueMessageId: "q-2",
      },
      expect.objectContaining({ success: true, queueMessageId: "q-3" }),
    ])
    expect(first.ack).toHaveBeenCalledTimes(1)
    expect(third.ack).toHaveBeenCalledTimes(1)
    expect(malformed.retry).toHaveBeenCalledTimes(1)
    expect(malformed.ack).not.toHaveBeenCalled()
    expect(logger.messages("warn")).toEqual(["Malformed queue message"])
  })

  it("logs acknowledgement failures and keeps the outcome", async () => {
    const logger = new CaptureLogger()
    const message = queueMessage("q-1", { mailer, email: minimalEmail() })
    message.ack.mockRejectedValue(new Error("queue unavailable"))

    const outcomes = await processQueueBatch([message], {
      connector: new MemoryRelay(),
      logger,
    })

    expect(outcomes[0]?.success).toBe(true)
    expect(logger.messages("warn")).toEqual(["Queue acknowledgement failed"])
  })
})

describe("enqueue", () => {
  it("hands single messages and batches to the queue", async () => {
    const queue = mock<EmailQueue>()
    const first = { mailer, email: minimalEmail() }
    const second = { mailer, email: minimalEmail({ subject: "again" }) }

    await enqueueEmail(queue, first)
    await enqueueEmails(queue, [first, second])

    expect(queue.send).toHaveBeenCalledWith(first)
    expect(queue.sendBatch).toHaveBeenCalledWith([first, second])
  })
})
