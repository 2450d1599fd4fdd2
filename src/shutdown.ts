/**
 * @module shutdown
 * @description ShutdownHandler: turns process termination signals into an
 * AbortSignal for link setup.
 *
 * @example
 * ```ts
 * const shutdown = new ShutdownHandler().register();
 * try {
 *   await factory.newLink(options, shutdown.signal);
 * } finally {
 *   shutdown.unregister();
 * }
 * ```
 */

/**
 * The part of `process` the handler subscribes to.
 */
export interface SignalSource {
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export class ShutdownHandler {
  private readonly controller = new AbortController();
  private readonly listener = (signal: NodeJS.Signals): void => this.run(signal);

  constructor(
    private readonly signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
    private readonly source: SignalSource = process
  ) {}

  /** Aborted once a termination signal arrives or `run()` is called. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  register(): this {
    for (const signal of this.signals) {
      this.source.once(signal, this.listener);
    }
    return this;
  }

  unregister(): void {
    for (const signal of this.signals) {
      this.source.off(signal, this.listener);
    }
  }

  /**
   * Aborts the signal. Only the first call has an effect.
   */
  run(cause = "shutdown"): void {
    if (this.controller.signal.aborted) return;
    this.unregister();
    this.controller.abort(new Error(`interrupted by ${cause}`));
  }
}
