/**
 * Interrupt handling.
 *
 * The pumps have no cancellation hook of their own: each is parked in an
 * awaited read. An interrupt therefore shuts the connection down in both
 * directions through a dedicated handle, and the pump blocked on the
 * socket fails through its ordinary error path, which signals completion.
 *
 * @module
 */
import { errorMessage, InterruptRegistrationError } from './errors.js'
import type { Logger } from './log.js'
import type { ShutdownDirection } from './transport/connection.js'

/**
 * Where interrupt signals come from. `process` in production.
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown
}

/**
 * The part of a connection handle the coordinator needs.
 */
export interface ShutdownTarget {
  shutdown(direction: ShutdownDirection): void
}

export interface ShutdownCoordinatorOptions {
  /** Handle reserved for the interrupt path. */
  readonly target: ShutdownTarget
  readonly logger: Logger
  /** Defaults to `['SIGINT']`. */
  readonly signals?: readonly NodeJS.Signals[]
  /** Defaults to `process`. */
  readonly source?: SignalSource
}

// One coordinator per signal source at a time
const claimedSources = new WeakSet<SignalSource>()

export class ShutdownCoordinator {
  private readonly target: ShutdownTarget
  private readonly logger: Logger
  private readonly signals: readonly NodeJS.Signals[]
  private readonly source: SignalSource
  private registered: NodeJS.Signals[] = []
  private installed = false
  private interrupts = 0

  constructor(options: ShutdownCoordinatorOptions) {
    this.target = options.target
    this.logger = options.logger
    this.signals = options.signals ?? ['SIGINT']
    this.source = options.source ?? process
  }

  /**
   * Register the interrupt handler for every configured signal.
   *
   * @throws InterruptRegistrationError if a handler is already installed on
   *   this signal source, or the source refuses a signal
   */
  install(): void {
    if (claimedSources.has(this.source)) {
      throw new InterruptRegistrationError('a handler is already installed')
    }

    for (const signal of this.signals) {
      try {
        this.source.on(signal, this.onInterrupt)
      } catch (err) {
        this.removeHandlers()
        throw new InterruptRegistrationError(`${signal}: ${errorMessage(err)}`)
      }
      this.registered.push(signal)
    }
    claimedSources.add(this.source)
    this.installed = true
  }

  /**
   * Remove the handlers. Safe to call more than once.
   */
  dispose(): void {
    if (!this.installed) return
    this.installed = false
    this.removeHandlers()
    claimedSources.delete(this.source)
  }

  /** Interrupts received since install. */
  get interruptCount(): number {
    return this.interrupts
  }

  private removeHandlers(): void {
    for (const signal of this.registered) {
      this.source.off(signal, this.onInterrupt)
    }
    this.registered = []
  }

  private readonly onInterrupt = (signal: NodeJS.Signals): void => {
    this.interrupts++
    this.logger.info('interrupt received, shutting down connection', { signal })
    this.target.shutdown('both')
  }
}
