export type DistErrorCode =
  | 'READ_ERROR'
  | 'NOT_FOUND'
  | 'TRANSPORT_ERROR'
  | 'ALREADY_EXISTS'
  | 'IO_ERROR'
  | 'EXTRACT_ERROR'
  | 'EXEC_ERROR'

export type DistErrorOptions = {
  path?: string
  cause?: unknown
}

/**
 * Base class for every error raised by the fetch/install pipeline.
 *
 * `path` names the logical path or filesystem path the failing operation
 * was working on, when there is one.
 */
export abstract class DistError extends Error {
  abstract readonly code: DistErrorCode
  readonly path: string | undefined

  constructor(message: string, options: DistErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.path = options.path
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/** The version list could not be fetched or scanned. */
export class ReadError extends DistError {
  readonly code = 'READ_ERROR'
}

/** No version satisfied the selection. */
export class NotFoundError extends DistError {
  readonly code = 'NOT_FOUND'
}

/** Both the daemon and the gateway failed; the cause is the gateway failure. */
export class TransportError extends DistError {
  readonly code = 'TRANSPORT_ERROR'
}

/** The output path is taken by something that is not a directory. */
export class AlreadyExistsError extends DistError {
  readonly code = 'ALREADY_EXISTS'
}

export class IOError extends DistError {
  readonly code = 'IO_ERROR'
}

/** The expected binary is missing from the archive, or the archive is unreadable. */
export class ExtractError extends DistError {
  readonly code = 'EXTRACT_ERROR'
}

/** The platform probe command could not be launched. */
export class ExecError extends DistError {
  readonly code = 'EXEC_ERROR'
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Wrap a filesystem failure in an IOError naming the operation and path.
 * Errors that already belong to the taxonomy pass through untouched.
 */
export function toIOError(op: string, path: string, error: unknown): DistError {
  if (error instanceof DistError) {
    return error
  }
  return new IOError(`${op} ${path}: ${errorMessage(error)}`, {
    path,
    cause: error,
  })
}
