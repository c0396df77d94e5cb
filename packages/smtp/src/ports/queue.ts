import type { Milliseconds } from "@postline/clock"
import type { EmailOptions } from "./message"
import type { MailerSettings } from "./mailer-options"
import type { SendOutcome } from "./outcome"

export type QueueEmailMessage = {
  mailer: MailerSettings
  email: EmailOptions
}

/** A delivered queue message. Redelivery policy belongs to the queue. */
export interface QueueMessage<T> {
  readonly id: string
  readonly body: T

  ack(): void | Promise<void>
  retry(options?: { delayMs?: Milliseconds }): void | Promise<void>
}

/** Producer side of the host queue. */
export interface EmailQueue {
  send(message: QueueEmailMessage): Promise<void>
  sendBatch(messages: readonly QueueEmailMessage[]): Promise<void>
}

export type QueueOutcome = SendOutcome & {
  queueMessageId: string
  /** Absent when the message body failed validation. */
  email?: EmailOptions
}
