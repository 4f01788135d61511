// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Serial work queue for one connection.
 *
 * Unit n+1 starts only after unit n has settled, including every suspension
 * inside it. Closing drops units that have not started; the running unit is
 * left to finish.
 */
export class Mailbox {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;

  /**
   * Queue a unit of work. The returned promise settles with the unit;
   * a unit dropped because the mailbox closed resolves to `undefined`.
   */
  enqueue<T>(task: () => Promise<T>): Promise<T | undefined> {
    if (this.closed) return Promise.resolve(undefined);

    this.pending++;
    const run = this.tail
      .then(() => (this.closed ? undefined : task()))
      .finally(() => {
        this.pending--;
      });
    // Keep the chain alive after a failed unit; the failure surfaces through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Units queued or running. */
  get size(): number {
    return this.pending;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolve once every unit queued so far has settled.
   */
  idle(): Promise<void> {
    return this.tail;
  }

  close(): void {
    this.closed = true;
  }
}
