// src/core/dispatch/context.ts
// Call context construction and resolution lineage tracking

import { AsyncLocalStorage } from "node:async_hooks";
import type { CallContext, LineageEntry, Name, ResultArity } from "./types";
import { InvalidNameError } from "./errors";

// ─────────────────────────────────────────────────────────────────
// Active Resolution Frame
// ─────────────────────────────────────────────────────────────────

/**
 * ResolutionFrame: The resolver run the current async flow is inside of.
 */
export type ResolutionFrame = {
  depth: number;
  lineage: readonly LineageEntry[];
};

const activeResolution = new AsyncLocalStorage<ResolutionFrame>();

/**
 * Get the resolution frame of the current async flow, if any.
 */
export function currentResolution(): ResolutionFrame | undefined {
  return activeResolution.getStore();
}

/**
 * Run `fn` as the fallback resolution of `context` in domain `domainId`.
 * Contexts created inside `fn` (synchronously or after awaits) are nested.
 */
export function runInResolution<T>(domainId: string, context: CallContext, fn: () => T): T {
  return activeResolution.run(resolutionFrame(domainId, context), fn);
}

/**
 * The frame a resolver for `context` runs in.
 */
export function resolutionFrame(domainId: string, context: CallContext): ResolutionFrame {
  return {
    depth: context.depth,
    lineage: [...context.lineage, { domainId, name: context.name }],
  };
}

// ─────────────────────────────────────────────────────────────────
// Context Construction
// ─────────────────────────────────────────────────────────────────

export type CallContextOptions = {
  arity?: ResultArity;
  /** Explicit enclosing resolution; defaults to the active one */
  parent?: ResolutionFrame;
};

export function assertName(name: unknown): asserts name is Name {
  if (typeof name !== "string" || name.length === 0) {
    throw new InvalidNameError(name);
  }
}

/**
 * Create an immutable call context.
 *
 * A context created while a fallback resolver runs sits one level deeper
 * than that resolver's call and carries its lineage.
 */
export function createCallContext(
  name: Name,
  args: readonly unknown[] = [],
  options: CallContextOptions = {}
): CallContext {
  assertName(name);
  const parent = options.parent ?? currentResolution();

  return Object.freeze({
    name,
    args: Object.freeze([...args]),
    arity: options.arity ?? "single",
    depth: parent ? parent.depth + 1 : 0,
    lineage: Object.freeze([...(parent?.lineage ?? [])]),
  });
}

/**
 * Check whether `lineage` already resolves `name` in `domainId`.
 */
export function lineageIncludes(lineage: readonly LineageEntry[], domainId: string, name: Name): boolean {
  return lineage.some(entry => entry.domainId === domainId && entry.name === name);
}
