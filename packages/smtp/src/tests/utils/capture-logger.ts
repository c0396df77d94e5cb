import type { LogContext, LogContextPatch, Logger, LogLevelName, LogMeta } from "@postline/logger"

export type CapturedEntry = {
  level: LogLevelName
  message: string
  meta: Record<string, unknown>
}

/** Keeps every entry, children included, in one shared array. */
export class CaptureLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  constructor(
    readonly entries: CapturedEntry[] = [],
    private readonly context: Record<string, unknown> = {},
  ) {}

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.record("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.record("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.record("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.record("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.record("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.record("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new CaptureLogger<TContext & U>(this.entries, { ...this.context, ...context })
  }

  messages(level?: LogLevelName): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message)
  }

  private record(level: LogLevelName, message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level, message, meta: { ...this.context, ...meta } })
  }
}
