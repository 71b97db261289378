// test/helpers/dispatch.ts
// Shared fixtures for dispatch tests

import { createLogger, type Logger } from "../../src/adapters/logging";

export function silentLogger(): Logger {
  return createLogger({ level: "silent" });
}

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
};

/**
 * A promise the test settles by hand.
 */
export function deferred<T = void>(): Deferred<T> {
  let settle: (value: T) => void = () => {};
  let fail: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((resolve, reject) => {
    settle = resolve;
    fail = reject;
  });
  return { promise, resolve: value => settle(value), reject: reason => fail(reason) };
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
