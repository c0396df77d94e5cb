import { ConfigError } from "@postline/config"
import { serializeError } from "@postline/errors"
import { createNullLogger, type Logger } from "@postline/logger"
import type { MailerOptions } from "../../ports/mailer-options"
import type { EmailOptions } from "../../ports/message"
import type { BatchItem, SendOutcome } from "../../ports/outcome"
import type { EmailQueue, QueueEmailMessage, QueueMessage, QueueOutcome } from "../../ports/queue"
import { parseQueueEmailMessage } from "../config/parse-queue-message"
import { isBuildError } from "../errors/errors"
import { Mailer, type MailerDeps } from "../mailer/mailer"
import { mapPool } from "./map-pool"

export type BatchDeps = MailerDeps & {
  /**
   * Simultaneous connections. Keep it at or below the environment's limit on
   * outbound sockets.
   * @default 1
   */
  concurrency?: number
}

/**
 * Sends every item over its own connection. Each item yields exactly one
 * outcome, in input order; a failure never stops the batch.
 */
export async function processBatch(
  items: readonly BatchItem[],
  deps: BatchDeps = {},
): Promise<SendOutcome[]> {
  const { concurrency = 1, ...mailerDeps } = deps

  return mapPool(items, concurrency, (item) => deliver(item.mailer, item.email, mailerDeps))
}

/**
 * {@link processBatch} over messages from a host queue: acknowledges
 * delivered messages and hands failed ones back for redelivery. Bodies are
 * validated per message; a malformed body fails only its own message.
 */
export async function processQueueBatch(
  messages: readonly QueueMessage<unknown>[],
  deps: BatchDeps = {},
): Promise<QueueOutcome[]> {
  const { concurrency = 1, ...mailerDeps } = deps
  const logger = (deps.logger ?? createNullLogger()).child({ module: "email-batch" })

  return mapPool(messages, concurrency, async (message): Promise<QueueOutcome> => {
    let body: QueueEmailMessage

    try {
      body = parseQueueEmailMessage(message.body)
    } catch (err) {
      logger.warn("Malformed queue message", { err, queueMessageId: message.id })
      await settle(message, false, logger)

      return {
        success: false,
        stage: "build",
        error: serializeError(err),
        queueMessageId: message.id,
      }
    }

    const outcome = await deliver(body.mailer, body.email, mailerDeps)
    await settle(message, outcome.success, logger)

    return { ...outcome, queueMessageId: message.id, email: body.email }
  })
}

async function settle(message: QueueMessage<unknown>, delivered: boolean, logger: Logger) {
  try {
    if (delivered) await message.ack()
    else await message.retry()
  } catch (err) {
    logger.warn("Queue acknowledgement failed", { err, queueMessageId: message.id })
  }
}

export function enqueueEmail(queue: EmailQueue, message: QueueEmailMessage): Promise<void> {
  return queue.send(message)
}

export function enqueueEmails(
  queue: EmailQueue,
  messages: readonly QueueEmailMessage[],
): Promise<void> {
  return queue.sendBatch(messages)
}

async function deliver(
  mailer: MailerOptions,
  email: EmailOptions,
  deps: MailerDeps,
): Promise<SendOutcome> {
  try {
    const result = await Mailer.send(mailer, email, deps)

    return { success: true, messageId: result.messageId, response: result.response }
  } catch (err) {
    return {
      success: false,
      // Invalid mailer settings are caller data too.
      stage: isBuildError(err) || err instanceof ConfigError ? "build" : "delivery",
      error: serializeError(err),
    }
  }
}
