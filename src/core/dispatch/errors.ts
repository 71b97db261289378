// src/core/dispatch/errors.ts
// Error taxonomy for the dispatch engine

import type { Name } from "./types";

export type DispatchErrorCode =
  | "NAME_NOT_FOUND"
  | "RECURSIVE_FALLBACK"
  | "GENERATION_TIMEOUT"
  | "DELEGATION_TARGET_MISSING"
  | "CALL_ABORTED"
  | "INVALID_NAME";

/**
 * Base class for every error the engine raises.
 */
export class DispatchError extends Error {
  constructor(
    public readonly code: DispatchErrorCode,
    public readonly dispatchName: Name,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DispatchError";
  }
}

/**
 * The resolver declined the name, or no resolver is configured.
 */
export class NameNotFoundError extends DispatchError {
  constructor(name: Name, public readonly reason?: string) {
    super("NAME_NOT_FOUND", name, `NameNotFound: no handler for '${name}'${reason ? ` (${reason})` : ""}`);
    this.name = "NameNotFoundError";
  }
}

/**
 * A fallback re-entered itself for the same name, the chain of unresolved
 * calls grew past the configured depth, or waiting on another caller's
 * generation would wait on the caller's own fallback.
 */
export class RecursiveFallbackError extends DispatchError {
  public readonly waitCycle: boolean;

  constructor(
    name: Name,
    public readonly depth: number,
    public readonly maxDepth: number,
    options: { waitCycle?: boolean } = {}
  ) {
    super("RECURSIVE_FALLBACK", name, recursionMessage(name, depth, maxDepth, options.waitCycle ?? false));
    this.name = "RecursiveFallbackError";
    this.waitCycle = options.waitCycle ?? false;
  }
}

function recursionMessage(name: Name, depth: number, maxDepth: number, waitCycle: boolean): string {
  if (waitCycle) return `RecursiveFallback: waiting for '${name}' would wait on its own fallback`;
  if (depth > maxDepth) return `RecursiveFallback: resolving '${name}' exceeded depth ${maxDepth}`;
  return `RecursiveFallback: '${name}' re-entered its own fallback at depth ${depth}`;
}

export class GenerationTimeoutError extends DispatchError {
  constructor(name: Name, public readonly timeoutMs: number) {
    super("GENERATION_TIMEOUT", name, `GenerationTimeout: waited ${timeoutMs}ms for '${name}' to be generated`);
    this.name = "GenerationTimeoutError";
  }
}

export class DelegationTargetMissingError extends DispatchError {
  constructor(name: Name) {
    super("DELEGATION_TARGET_MISSING", name, `DelegationTargetMissing: delegation target has no method '${name}'`);
    this.name = "DelegationTargetMissingError";
  }
}

export class CallAbortedError extends DispatchError {
  constructor(name: Name, cause?: unknown) {
    super("CALL_ABORTED", name, `CallAborted: call to '${name}' abandoned while waiting for generation`, { cause });
    this.name = "CallAbortedError";
  }
}

export class InvalidNameError extends DispatchError {
  constructor(name: unknown) {
    super("INVALID_NAME", String(name), `InvalidName: expected a non-empty string, got ${typeof name === "string" ? "an empty string" : typeof name}`);
    this.name = "InvalidNameError";
  }
}

/**
 * Check if a value is an engine error, optionally of a given code.
 */
export function isDispatchError(e: unknown, code?: DispatchErrorCode): e is DispatchError {
  return e instanceof DispatchError && (code === undefined || e.code === code);
}
