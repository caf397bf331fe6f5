/**
 * Signal handling for graceful shutdown of a download run
 *
 * The first SIGINT or SIGTERM aborts the shared signal so in-flight transfers
 * stop at the next chunk boundary; a second one exits immediately.
 */

import chalk from 'chalk';

export type ExitFn = (code: number) => void;

export class SignalHandler {
  private readonly controller = new AbortController();
  private readonly listeners = new Map<NodeJS.Signals, () => void>();
  private shuttingDown = false;

  constructor(private readonly exit: ExitFn = code => process.exit(code)) {}

  /**
   * Start listening for termination signals
   */
  install(signals: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): this {
    for (const name of signals) {
      const listener = () => this.handle(name);
      this.listeners.set(name, listener);
      process.on(name, listener);
    }
    return this;
  }

  uninstall(): void {
    for (const [name, listener] of this.listeners) {
      process.off(name, listener);
    }
    this.listeners.clear();
  }

  handle(signal: NodeJS.Signals): void {
    if (this.shuttingDown) {
      console.error(chalk.red('\nForce exit requested'));
      this.exit(130);
      return;
    }

    this.shuttingDown = true;
    console.error(chalk.yellow(`\nReceived ${signal}, finishing the current chunk and stopping...`));
    console.error(chalk.gray('Press Ctrl+C again to force exit'));

    const reason = new Error(`Interrupted by ${signal}`);
    reason.name = 'AbortError';
    this.controller.abort(reason);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }
}
