// ---------------------------------------------------------------------------
// Serial lock – promise-chain mutual exclusion
// ---------------------------------------------------------------------------
// Each call waits for the previous holder to settle (fulfilled or rejected)
// before running. One lock per logical resource: discovery, connections,
// event buffers.
// ---------------------------------------------------------------------------

export type SerialLock = {
  run: <T>(fn: () => Promise<T> | T) => Promise<T>;
  /** True while a holder is running or queued. */
  readonly busy: boolean;
};

function resolveChain(p: Promise<unknown>): Promise<void> {
  return p.then(
    () => {},
    () => {},
  );
}

export function createSerialLock(): SerialLock {
  let op: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    run<T>(fn: () => Promise<T> | T): Promise<T> {
      pending += 1;
      const next = op.then(fn).finally(() => {
        pending -= 1;
      });
      op = resolveChain(next);
      return next;
    },
    get busy() {
      return pending > 0;
    },
  };
}
