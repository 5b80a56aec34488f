// Kept out of src/types.ts so the type module stays free of runtime code.

import type { Deferred } from "../types.js";

/** A promise plus its settle functions, for holding a strategy call open in tests. */
export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (reason: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
