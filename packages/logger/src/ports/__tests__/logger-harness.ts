import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

export type LogEntry = {
  level: LogLevelName
  payload: Record<string, unknown>
}

/**
 * A logger wired to an in-memory sink so the contract can inspect output.
 */
export type CapturingLogger = {
  logger: Logger
  read: () => LogEntry[]
  clear: () => void
}

export type LoggerHarness = {
  name: string
  make: (opts: { level: LogLevelName }) => CapturingLogger
}
