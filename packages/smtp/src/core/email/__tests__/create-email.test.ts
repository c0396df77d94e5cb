import type { EmailOptions } from "../../../ports/message"
import { minimalEmail } from "../../../tests/utils/email-fixtures"
import { EmailBuildError, InvalidEmailError } from "../../errors/errors"
import { createEmail, envelopeOf } from "../create-email"

function buildError(fn: () => unknown): EmailBuildError {
  try {
    fn()
  } catch (err) {
    if (err instanceof EmailBuildError) return err
    throw err
  }

  throw new Error("expected createEmail to throw")
}

describe("createEmail", () => {
  it("normalizes recipients to address objects", () => {
    const email = createEmail(
      minimalEmail({
        from: { email: " sender@example.com ", name: "Sender" },
        to: ["a@example.com", { email: "b@example.com", name: "B" }],
        cc: "c@example.com",
      }),
    )

    expect(email.from).toEqual({ email: "sender@example.com", name: "Sender" })
    expect(email.to).toEqual([{ email: "a@example.com" }, { email: "b@example.com", name: "B" }])
    expect(email.cc).toEqual([{ email: "c@example.com" }])
    expect(email.bcc).toEqual([])
    expect(email.replyTo).toEqual([])
    expect(Object.isFrozen(email)).toBe(true)
  })

  it("requires a text or html body", () => {
    const error = buildError(() =>
      createEmail({ from: "a@example.com", to: "b@example.com", subject: "x", text: "" }),
    )

    expect(error.code).toBe("invalid_content")
  })

  it("requires at least one recipient", () => {
    const error = buildError(() => createEmail(minimalEmail({ to: [] })))

    expect(error.code).toBe("invalid_content")
    expect(error.message).toBe("Email requires at least one recipient")
  })

  it("lists every invalid address", () => {
    const error = buildError(() =>
      createEmail(
        minimalEmail({
          from: "@b.com",
          to: ["ok@example.com", "a b@c.com"],
          bcc: "a@",
        }),
      ),
    )

    expect(error.code).toBe("invalid_email")
    expect(error.context).toEqual({ invalidEmails: ["@b.com", "a b@c.com", "a@"] })
    expect(error.cause).toBeInstanceOf(InvalidEmailError)
  })

  it("rejects header names with a colon and values with line breaks", () => {
    expect(buildError(() => createEmail(minimalEmail({ headers: { "X:Bad": "1" } }))).code).toBe(
      "invalid_content",
    )
    expect(
      buildError(() => createEmail(minimalEmail({ headers: { "X-Note": "a\r\nBcc: x@y.com" } })))
        .context,
    ).toEqual({ header: "X-Note" })
  })

  it("rejects a subject with line breaks", () => {
    const error = buildError(() =>
      createEmail(minimalEmail({ subject: "Hello\r\nBcc: hidden@example.com" })),
    )

    expect(error.code).toBe("invalid_content")
    expect(error.message).toBe("Subject must not contain line breaks")
  })

  it.each<[string, Partial<EmailOptions>]>([
    ["from", { from: { email: "sender@example.com", name: "Sender\r\nBcc: x@example.com" } }],
    ["to", { to: [{ email: "to@example.com", name: "To\nX-Injected: 1" }] }],
    ["cc", { cc: { email: "cc@example.com", name: "Cc\r" } }],
    ["bcc", { bcc: [{ email: "bcc@example.com", name: "\nBcc" }] }],
    ["replyTo", { replyTo: { email: "reply@example.com", name: "Reply\r\n" } }],
  ])("rejects a %s display name with line breaks", (_field, overrides) => {
    const error = buildError(() => createEmail(minimalEmail(overrides)))

    expect(error.code).toBe("invalid_content")
    expect(error.message).toBe("Display names must not contain line breaks")
  })

  describe("attachments", () => {
    it("defaults content type and disposition", () => {
      const email = createEmail(
        minimalEmail({ attachments: [{ filename: "report.pdf", content: "JVBERi0=" }] }),
      )

      expect(email.attachments).toEqual([
        {
          filename: "report.pdf",
          content: "JVBERi0=",
          contentType: "application/pdf",
          disposition: "attachment",
        },
      ])
    })

    it("treats an attachment with a content id as inline and strips angle brackets", () => {
      const email = createEmail(
        minimalEmail({
          html: '<img src="cid:logo">',
          attachments: [{ filename: "logo.png", content: "iVBORw==", contentId: "<logo>" }],
        }),
      )

      expect(email.attachments[0]).toMatchObject({ disposition: "inline", contentId: "logo" })
    })

    it("requires a filename", () => {
      const error = buildError(() =>
        createEmail(minimalEmail({ attachments: [{ filename: "", content: "AAAA" }] })),
      )

      expect(error.code).toBe("invalid_content")
      expect(error.context).toEqual({ attachment: 0 })
    })

    it("requires a content id for inline attachments", () => {
      const error = buildError(() =>
        createEmail(
          minimalEmail({
            attachments: [{ filename: "logo.png", content: "AAAA", disposition: "inline" }],
          }),
        ),
      )

      expect(error.message).toBe('Inline attachment "logo.png" requires a contentId')
    })

    it("rejects content that is not base64", () => {
      const error = buildError(() =>
        createEmail(minimalEmail({ attachments: [{ filename: "a.txt", content: "not base64!" }] })),
      )

      expect(error.code).toBe("invalid_content")
    })
  })
})

describe("envelopeOf", () => {
  it("includes Bcc and drops duplicates case-insensitively", () => {
    const email = createEmail(
      minimalEmail({
        to: ["a@example.com", "b@example.com"],
        cc: "A@example.com",
        bcc: ["hidden@example.com", "b@example.com"],
      }),
    )

    expect(envelopeOf(email)).toEqual({
      from: "sender@example.com",
      recipients: ["a@example.com", "b@example.com", "hidden@example.com"],
    })
  })

  it("carries per-message DSN settings", () => {
    const email = createEmail(minimalEmail({ dsn: { notify: ["failure"] } }))

    expect(envelopeOf(email).dsn).toEqual({ notify: ["failure"] })
  })
})
