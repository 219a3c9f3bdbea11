import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Adapters must honor these options but are free to implement them however
 * suits the underlying library.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Example: "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Pretty-print output for humans. Intended for local debugging only;
   * leave it off where logs are ingested as JSON.
   */
  prettify?: boolean
}
