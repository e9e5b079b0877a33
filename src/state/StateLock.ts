/**
 * Serializes async critical sections: each task starts only after every task
 * queued before it has settled. Not reentrant, so a task must never wait on
 * another `runExclusive` of the same lock.
 */
export class StateLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
