// src/core/dispatch/proxy.ts
// Expose a dispatch domain as an object whose methods are dispatched calls

import type { Name } from "./types";
import type { CallOptions, DispatchDomain } from "./domain";

/**
 * DynamicObject: Every string-keyed member is an async method.
 */
export type DynamicObject = {
  readonly [name: string]: ((...args: unknown[]) => Promise<unknown>) | undefined;
};

/**
 * Wrap `domain` in a Proxy.
 *
 * Reading a property yields a function that dispatches the call. Reserved
 * names with no installed handler read as `undefined`, so awaiting the
 * object or serializing it does not reach the fallback. Symbols always
 * read as `undefined`. The `in` operator answers with `domain.can`.
 */
export function createDynamicObject(domain: DispatchDomain, options: CallOptions = {}): DynamicObject {
  const methods = new Map<Name, (...args: unknown[]) => Promise<unknown>>();

  // Only installed names are cached; arbitrary reads must not grow the map.
  const methodFor = (name: Name): ((...args: unknown[]) => Promise<unknown>) => {
    const cached = methods.get(name);
    if (cached) return cached;
    const method = (...args: unknown[]) => domain.call(name, args, options);
    if (domain.isInstalled(name)) methods.set(name, method);
    return method;
  };

  return new Proxy<DynamicObject>({}, {
    get: (_target, prop) => {
      if (typeof prop === "symbol") return undefined;
      if (domain.isReserved(prop) && !domain.isInstalled(prop)) return undefined;
      return methodFor(prop);
    },
    has: (_target, prop) => typeof prop === "string" && domain.can(prop),
    set: () => false,
    deleteProperty: () => false,
  });
}
