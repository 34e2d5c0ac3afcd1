/**
 * Single-shot, multi-producer completion signal.
 *
 * Any number of producers may call `signal()`; the first value wins and is
 * what `wait()` resolves with. Later signals are counted and otherwise
 * dropped, so a second pump failing after the first never blocks or throws.
 *
 * @module
 */

export class CompletionSignal<T> {
  private first: { readonly value: T } | null = null
  private count = 0
  private readonly waiters: Array<(value: T) => void> = []

  /**
   * Deliver a completion. Returns true if this was the first one.
   */
  signal(value: T): boolean {
    this.count++
    if (this.first) return false

    this.first = { value }
    const waiters = this.waiters.splice(0)
    for (const resolve of waiters) resolve(value)
    return true
  }

  /**
   * Resolve with the first signalled value, now or once it arrives.
   */
  wait(): Promise<T> {
    const first = this.first
    if (first) return Promise.resolve(first.value)
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  /** True once any producer has signalled. */
  get completed(): boolean {
    return this.first !== null
  }

  /** Number of `signal()` calls so far, including dropped ones. */
  get signalCount(): number {
    return this.count
  }
}
