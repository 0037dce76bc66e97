/**
 * Promise-chained mutual exclusion.
 *
 * Each caller waits for the previous holder's promise to settle before
 * running, so critical sections execute strictly one after another in
 * arrival order. A failing section releases the lock like a passing one.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(section: () => Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    // Next waiter only cares that this section finished, not how
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
