/**
 * Cancellation Slots
 *
 * Keyed cancellation tokens for background operations. Starting work under a
 * key aborts whatever is still registered under that key, so at most one
 * operation per key can ever apply its result.
 */

export class CancellationSlots<K extends string = string> {
  private controllers = new Map<K, AbortController>();

  /**
   * Abort the current holder of `key` and register a fresh token.
   */
  begin(key: K): AbortSignal {
    this.cancel(key);
    const controller = new AbortController();
    this.controllers.set(key, controller);
    return controller.signal;
  }

  /**
   * True while `signal` is the live token registered under `key`.
   */
  isCurrent(key: K, signal: AbortSignal): boolean {
    const controller = this.controllers.get(key);
    return controller !== undefined && controller.signal === signal && !signal.aborted;
  }

  /**
   * Release `key` once its operation has finished; a superseded signal is ignored.
   */
  finish(key: K, signal: AbortSignal): void {
    if (this.controllers.get(key)?.signal === signal) {
      this.controllers.delete(key);
    }
  }

  cancel(key: K): void {
    const controller = this.controllers.get(key);
    if (controller) {
      controller.abort();
      this.controllers.delete(key);
    }
  }

  cancelAll(): void {
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    this.controllers.clear();
  }

  isActive(key: K): boolean {
    return this.controllers.has(key);
  }
}
