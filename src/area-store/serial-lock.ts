/**
 * Promise-chain mutex: tasks passed to `run` execute one at a time, in call
 * order. A failing task rejects its own promise only; the queue keeps going.
 *
 * Not reentrant. Callers that already hold the lock must call their unlocked
 * internals directly instead of `run`.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
