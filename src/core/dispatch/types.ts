// src/core/dispatch/types.ts
// Dispatch engine types: call contexts, handlers, resolutions and events

// ─────────────────────────────────────────────────────────────────
// Names and Contexts
// ─────────────────────────────────────────────────────────────────

/**
 * Name: Identifier of a callable member. Never empty.
 */
export type Name = string;

/**
 * ResultArity: The cardinality the caller expects back (void, scalar or list).
 */
export type ResultArity = "none" | "single" | "multi";

/**
 * LineageEntry: A resolution in progress somewhere up the call chain.
 */
export type LineageEntry = {
  readonly domainId: string;
  readonly name: Name;
};

/**
 * CallContext: Immutable description of one invocation attempt.
 */
export type CallContext = {
  readonly name: Name;
  readonly args: readonly unknown[];
  readonly arity: ResultArity;
  /** Number of fallback resolutions enclosing this call (0 at top level) */
  readonly depth: number;
  /** Resolutions in progress in the enclosing call chain, outermost first */
  readonly lineage: readonly LineageEntry[];
};

export type MaybePromise<T> = T | Promise<T>;

// ─────────────────────────────────────────────────────────────────
// Handlers and the Dispatch Table
// ─────────────────────────────────────────────────────────────────

/**
 * Handler: A directly callable implementation for a name.
 * Installed handlers are shared and may run concurrently.
 */
export type Handler = (args: readonly unknown[], arity: ResultArity) => MaybePromise<unknown>;

export type InstallOutcome = "installed" | "already-present";

/**
 * InstallResult: What `install` did, and the handler now in the table.
 */
export type InstallResult = {
  outcome: InstallOutcome;
  handler: Handler;
};

// ─────────────────────────────────────────────────────────────────
// Fallback Resolution
// ─────────────────────────────────────────────────────────────────

/**
 * Resolution: What a fallback resolver decided for a missed name.
 */
export type Resolution =
  | { tag: "generate"; handler: Handler }
  | { tag: "answer"; value: unknown }
  | { tag: "decline"; reason?: string };

/**
 * FallbackResolver: Strategy consulted on a dispatch miss.
 *
 * `wouldResolve` is the side-effect-free verdict used by capability
 * queries. Resolvers without it are never reported as capable.
 */
export interface FallbackResolver {
  resolve(context: CallContext): MaybePromise<Resolution>;
  wouldResolve?(name: Name): boolean;
}

/**
 * GenerationRecord: Per-name state while a generation is in flight.
 */
export type GenerationRecord = {
  inProgress: boolean;
  waiters: number;
  /** Settles (never rejects) once the generation ends */
  done: Promise<void>;
};

/**
 * Generated: What the coordinator hands back to the dispatcher.
 */
export type Generated =
  | { tag: "handler"; handler: Handler; outcome?: InstallOutcome }
  | { tag: "answer"; value: unknown };

// ─────────────────────────────────────────────────────────────────
// Dispatch Outcomes
// ─────────────────────────────────────────────────────────────────

/**
 * DispatchOutcome: Result of a dispatch.
 * `absent` is the no-op outcome for reserved names without a handler.
 */
export type DispatchOutcome =
  | { tag: "done"; value: unknown; via: "table" | "generated" | "answer" }
  | { tag: "absent"; name: Name };

export type DispatchOptions = {
  /** Abandons the call while it waits on another caller's generation */
  signal?: AbortSignal;
  /** Overrides the domain's generation timeout for this call */
  generationTimeoutMs?: number;
};

// ─────────────────────────────────────────────────────────────────
// Events (for the ledger)
// ─────────────────────────────────────────────────────────────────

/**
 * DispatchEvent: Events recorded by a dispatch domain.
 */
export type DispatchEvent =
  | { tag: "hit"; name: Name; timestamp: number }
  | { tag: "miss"; name: Name; depth: number; timestamp: number }
  | { tag: "reserved"; name: Name; timestamp: number }
  | { tag: "generate"; name: Name; outcome: InstallOutcome; timestamp: number }
  | { tag: "answer"; name: Name; timestamp: number }
  | { tag: "decline"; name: Name; reason?: string; timestamp: number }
  | { tag: "wait"; name: Name; waiters: number; timestamp: number }
  | { tag: "timeout"; name: Name; timeoutMs: number; timestamp: number }
  | { tag: "aborted"; name: Name; timestamp: number }
  | { tag: "recursive"; name: Name; depth: number; timestamp: number };

export type DispatchEventTag = DispatchEvent["tag"];

/**
 * DispatchStats: Counters kept by each domain.
 */
export type DispatchStats = {
  hits: number;
  misses: number;
  resolverCalls: number;
  installs: number;
  answers: number;
  declines: number;
  reservedMisses: number;
  timeouts: number;
};
