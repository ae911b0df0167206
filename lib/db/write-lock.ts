let tail: Promise<void> = Promise.resolve();

/** Runs write transactions one at a time within this process. Status reads skip it. */
export function withWriteLock<T>(operation: () => Promise<T>): Promise<T> {
  const run = tail.then(operation);
  tail = run.then(
    () => undefined,
    () => undefined
  );
  return run;
}
