import { z } from "zod"
import type { QueueEmailMessage } from "../../ports/queue"
import { EmailBuildError } from "../errors/errors"
import { queueEmailMessageSchema } from "./schemas"

/**
 * Validates the shape of a message read off a queue. Address and body rules
 * are still applied later by `createEmail`.
 *
 * @throws {EmailBuildError} `invalid_content` listing every bad path
 */
export function parseQueueEmailMessage(input: unknown): QueueEmailMessage {
  const result = queueEmailMessageSchema.safeParse(input)

  if (!result.success) {
    throw EmailBuildError.invalidContent(
      `Invalid queue message:\n${z.prettifyError(result.error)}`,
      { issues: result.error.issues.map((issue) => issue.path.join(".")) },
    )
  }

  return result.data
}
