/** Thrown by Logger.fatal() after the message has been written. */
export class LoggerFatalError extends Error {
  constructor(readonly loggerName: string, readonly detail: string) {
    super(loggerName ? `[${loggerName}] ${detail}` : detail)
    this.name = 'LoggerFatalError'
  }
}
