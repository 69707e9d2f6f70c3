export type ErrorStatus = 401 | 404 | 405 | 413 | 500 | 503

export class AppError extends Error {
  public readonly code: string
  public readonly status: ErrorStatus

  public constructor({code, message, status}: {code: string; message: string; status: ErrorStatus}) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
  }
}

export const unauthorized = (code: string, message: string) =>
  new AppError({code, message, status: 401})

export const notFound = (code: string, message: string) =>
  new AppError({code, message, status: 404})

export const methodNotAllowed = (code: string, message: string) =>
  new AppError({code, message, status: 405})

export const payloadTooLarge = (code: string, message: string) =>
  new AppError({code, message, status: 413})

export const internal = (code: string, message: string) =>
  new AppError({code, message, status: 500})

export const serviceUnavailable = (code: string, message: string) =>
  new AppError({code, message, status: 503})

export const isAppError = (value: unknown): value is AppError => value instanceof AppError

/**
 * Raised by `start()` when the listener cannot be bound or the server is not in a
 * state that allows starting. The underlying OS error, when any, is the `cause`.
 */
export class AdminSetupError extends Error {
  public readonly host: string
  public readonly port: number

  public constructor({host, port, reason, cause}: {host: string; port: number; reason?: string; cause?: unknown}) {
    super(
      `Unable to start admin status server with host '${host}' and port '${String(port)}'` +
        (reason ? `: ${reason}` : ''),
      cause === undefined ? undefined : {cause}
    )
    this.name = 'AdminSetupError'
    this.host = host
    this.port = port
  }
}
