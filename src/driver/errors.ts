/** Error classes for misuse the SQLite engine itself does not report. */
export type DriverErrorCode = 'PROGRAMMING' | 'OPERATIONAL' | 'NOT_SUPPORTED'

export class DriverError extends Error {
  readonly code: DriverErrorCode

  constructor(code: DriverErrorCode, message: string) {
    super(message)
    this.name = 'DriverError'
    this.code = code
  }
}

/** Closed cursor or connection, bad statement kind, invalid setting. */
export class ProgrammingError extends DriverError {
  constructor(message: string) {
    super('PROGRAMMING', message)
    this.name = 'ProgrammingError'
  }
}

export class OperationalError extends DriverError {
  constructor(message: string) {
    super('OPERATIONAL', message)
    this.name = 'OperationalError'
  }
}

/** The underlying engine binding has no equivalent hook. */
export class NotSupportedError extends DriverError {
  constructor(message: string) {
    super('NOT_SUPPORTED', message)
    this.name = 'NotSupportedError'
  }
}
