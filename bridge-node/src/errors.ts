/**
 * Error types for the bridge.
 *
 * Every error carries a `kind` discriminant so callers can branch on the
 * category without `instanceof` chains:
 * - `InvalidAddress`: malformed or unsupported connection URI
 * - `NotFound`: no server descriptor located
 * - `InvalidData`: undecodable descriptor, or a frame body that fails validation
 * - `UnexpectedEof`: stream ended mid-frame
 * - `IoFailure`: transport read/write/connect/shutdown failure
 *
 * @module
 */

export type BridgeErrorKind =
  | 'InvalidAddress'
  | 'NotFound'
  | 'InvalidData'
  | 'UnexpectedEof'
  | 'IoFailure'

/**
 * Base class for all bridge errors.
 */
export abstract class BridgeError extends Error {
  abstract readonly kind: BridgeErrorKind
}

/**
 * Thrown when a connection URI cannot be parsed or names an unsupported scheme.
 */
export class InvalidAddressError extends BridgeError {
  readonly kind = 'InvalidAddress' as const

  constructor(
    public readonly uri: string,
    reason: string
  ) {
    super(`Invalid server address "${uri}": ${reason}`)
    this.name = 'InvalidAddressError'
  }
}

/**
 * Thrown when no ancestor of the working directory holds a server descriptor.
 */
export class ConfigNotFoundError extends BridgeError {
  readonly kind = 'NotFound' as const

  constructor(
    public readonly startDir: string,
    relativePath: string
  ) {
    super(`No ${relativePath} found in ${startDir} or any parent directory`)
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when a server descriptor exists but is not one of the recognized shapes.
 */
export class InvalidConfigError extends BridgeError {
  readonly kind = 'InvalidData' as const

  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Invalid server descriptor ${path}: ${reason}`)
    this.name = 'InvalidConfigError'
  }
}

/**
 * Thrown when a message body balances its braces but is not valid JSON,
 * or closes more braces than it opened.
 */
export class MalformedMessageError extends BridgeError {
  readonly kind = 'InvalidData' as const

  constructor(
    reason: string,
    public readonly body: Buffer
  ) {
    super(`Malformed message body: ${reason}`)
    this.name = 'MalformedMessageError'
  }
}

/**
 * Thrown when a single message grows beyond the configured limit.
 */
export class FrameSizeError extends BridgeError {
  readonly kind = 'InvalidData' as const

  constructor(
    public readonly size: number,
    public readonly maxSize: number
  ) {
    super(`Message size ${size} exceeds maximum ${maxSize}`)
    this.name = 'FrameSizeError'
  }
}

/**
 * Thrown when the byte stream ends before a complete message was read.
 */
export class UnexpectedEofError extends BridgeError {
  readonly kind = 'UnexpectedEof' as const

  /**
   * @param phase - Parser phase when the stream ended
   * @param partial - True if some bytes of the unfinished message had been read
   */
  constructor(
    public readonly phase: 'headers' | 'body',
    public readonly partial: boolean
  ) {
    super(
      partial
        ? `Stream ended in the middle of a message (${phase})`
        : 'Stream ended at a message boundary'
    )
    this.name = 'UnexpectedEofError'
  }
}

/**
 * Transport failure. Keeps the underlying error as `cause` and its system
 * error code (ECONNREFUSED, EPIPE, ...) as `code`.
 */
export class IoFailureError extends BridgeError {
  readonly kind = 'IoFailure' as const
  readonly code: string | undefined

  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${errorMessage(cause)}`)
    this.name = 'IoFailureError'
    this.cause = cause
    this.code = errorCode(cause)
  }
}

/**
 * Thrown when an interrupt handler cannot be registered.
 */
export class InterruptRegistrationError extends BridgeError {
  readonly kind = 'IoFailure' as const

  constructor(reason: string) {
    super(`Could not register interrupt handler: ${reason}`)
    this.name = 'InterruptRegistrationError'
  }
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Extract a Node.js system error code, if there is one.
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) {
    return undefined
  }
  return typeof err.code === 'string' ? err.code : undefined
}

const TRANSIENT_CODES: ReadonlySet<string> = new Set(['EINTR', 'EAGAIN'])

/**
 * True for read failures that only mean "try again" (a signal landed
 * mid-call, or a non-blocking descriptor had nothing ready).
 */
export function isTransientError(err: unknown): boolean {
  const code = errorCode(err)
  return code !== undefined && TRANSIENT_CODES.has(code)
}
