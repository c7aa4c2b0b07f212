import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

const noop = (..._args: unknown[]): void => {}

/** Discards everything. The default when a store is built without a logger. */
export class NullLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  readonly trace = noop
  readonly debug = noop
  readonly info = noop
  readonly warn = noop
  readonly error = noop
  readonly fatal = noop

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}

export function createNullLogger<TContext extends LogContext = LogContext>(): Logger<TContext> {
  return new NullLogger<TContext>()
}
