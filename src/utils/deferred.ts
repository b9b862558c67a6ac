// Promise with its settle functions exposed. Kept out of src/types.ts so the
// type barrel stays free of runtime code.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let settle!: Pick<Deferred<T>, "resolve" | "reject">;
  const promise = new Promise<T>((resolve, reject) => {
    settle = { resolve, reject };
  });
  return { promise, ...settle };
}
