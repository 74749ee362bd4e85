/**
 * Well-known fields a log entry may carry.
 *
 * @remarks
 * `namespace` and `operation` identify the dict and the call being made;
 * `service`, `module` and `env` describe the emitting process.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  namespace: string
  operation: string
  key: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
