import type { Milliseconds } from "@postline/clock"
import type { SmtpReply } from "../../ports/session"
import { SmtpResponseError } from "../errors/errors"

export type ReadLine = (timeoutMs: Milliseconds) => Promise<string>

export type ReplyLine = {
  code: number
  text: string
  final: boolean
}

const REPLY_LINE = /^([2-5]\d\d)(?:([ -])(.*))?$/

/**
 * Splits one reply line into code and text. `250-...` continues a multiline
 * reply; `250 ...` or a bare `250` ends it.
 */
export function parseReplyLine(line: string, command: string): ReplyLine {
  const match = REPLY_LINE.exec(line)

  if (!match?.[1]) throw SmtpResponseError.malformed(command, line)

  return {
    code: Number(match[1]),
    text: match[3] ?? "",
    final: match[2] !== "-",
  }
}

/** Reads lines until the final line of one reply. */
export async function readReply(
  readLine: ReadLine,
  command: string,
  timeoutMs: Milliseconds,
): Promise<SmtpReply> {
  const lines: string[] = []
  const raw: string[] = []

  for (;;) {
    const line = await readLine(timeoutMs)
    const parsed = parseReplyLine(line, command)

    lines.push(parsed.text)
    raw.push(line)

    if (parsed.final) return { code: parsed.code, lines, raw }
  }
}

export function isPositive(reply: SmtpReply): boolean {
  return reply.code >= 200 && reply.code < 300
}

/** The reply as the relay sent it, lines joined with "\n". */
export function replyText(reply: SmtpReply): string {
  return reply.raw.join("\n")
}
