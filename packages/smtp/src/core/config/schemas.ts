import { z } from "zod"
import { authMechanisms } from "../../ports/mailer-options"

export const dsnSchema = z.object({
  return: z.enum(["headers", "full"]).optional(),
  notify: z.array(z.enum(["success", "failure", "delay"])).optional(),
  envelopeId: z.string().min(1).optional(),
  orcpt: z.boolean().optional(),
})

export const credentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string(),
})

export const mailerSettingsSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65_535).default(587),
  secure: z.boolean().default(false),
  startTls: z.boolean().default(true),
  credentials: credentialsSchema.optional(),
  authType: z.array(z.enum(authMechanisms)).min(1).default(["plain", "login"]),
  socketTimeoutMs: z.number().int().positive().default(60_000),
  responseTimeoutMs: z.number().int().positive().default(30_000),
  clientName: z.string().min(1).default("[127.0.0.1]"),
  dsn: dsnSchema.optional(),
})

const recipientSchema = z.union([
  z.string(),
  z.object({ email: z.string(), name: z.string().optional() }),
])

const recipientsSchema = z.union([recipientSchema, z.array(recipientSchema)])

const attachmentSchema = z.object({
  filename: z.string(),
  content: z.string(),
  contentType: z.string().optional(),
  contentId: z.string().optional(),
  disposition: z.enum(["attachment", "inline"]).optional(),
})

const envelopeFieldsSchema = z.object({
  from: recipientSchema,
  to: recipientsSchema,
  cc: recipientsSchema.optional(),
  bcc: recipientsSchema.optional(),
  replyTo: recipientsSchema.optional(),
  subject: z.string(),
  headers: z.record(z.string(), z.string()).optional(),
  attachments: z.array(attachmentSchema).optional(),
  dsn: dsnSchema.optional(),
})

/** Structural shape of `EmailOptions`; content rules are left to `createEmail`. */
export const emailOptionsSchema = z.union([
  envelopeFieldsSchema.extend({ text: z.string(), html: z.string().optional() }),
  envelopeFieldsSchema.extend({ text: z.string().optional(), html: z.string() }),
])

export const queueEmailMessageSchema = z.object({
  mailer: mailerSettingsSchema,
  email: emailOptionsSchema,
})
