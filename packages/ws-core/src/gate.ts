// Shutdown barrier for background tasks.

import { GateClosedError } from "./errors.ts";

/**
 * Counts in-flight tasks so a stop can wait for them.
 *
 * Once `close` is called no new task may enter, and the returned promise
 * resolves when the last running task leaves.
 */
export class Gate {
  private _count = 0;
  private closing: Promise<void> | null = null;
  private resolveClosed: (() => void) | null = null;

  enter(): void {
    if (this.closing !== null) {
      throw new GateClosedError();
    }
    this._count++;
  }

  leave(): void {
    if (this._count === 0) {
      throw new Error("Gate.leave() without matching enter()");
    }
    this._count--;
    if (this._count === 0 && this.resolveClosed !== null) {
      const resolve = this.resolveClosed;
      this.resolveClosed = null;
      resolve();
    }
  }

  /** Run `fn` inside the gate. Rejects with GateClosedError if closing. */
  async run<R>(fn: () => Promise<R>): Promise<R> {
    this.enter();
    try {
      return await fn();
    } finally {
      this.leave();
    }
  }

  close(): Promise<void> {
    if (this.closing === null) {
      this.closing = new Promise((resolve) => {
        if (this._count === 0) {
          resolve();
        } else {
          this.resolveClosed = resolve;
        }
      });
    }
    return this.closing;
  }

  get count(): number {
    return this._count;
  }

  isClosed(): boolean {
    return this.closing !== null;
  }
}
