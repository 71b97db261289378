// src/core/dispatch/domain.ts
// Dispatch domain: table + coordinator + resolver behind one entry point

import type { Logger } from "pino";
import type {
  CallContext,
  DispatchEvent,
  DispatchEventTag,
  DispatchOptions,
  DispatchOutcome,
  DispatchStats,
  FallbackResolver,
  Handler,
  InstallResult,
  Name,
  ResultArity,
} from "./types";
import { DispatchTable } from "./table";
import { GenerationCoordinator } from "./coordinator";
import { canDispatch } from "./capability";
import { assertName, createCallContext, currentResolution, lineageIncludes, runInResolution } from "./context";
import { DEFAULT_RESERVED_NAMES, reservedSet } from "./reserved";
import { EventLedger, emptyStats } from "./ledger";
import { NameNotFoundError, RecursiveFallbackError } from "./errors";
import { logger } from "../../adapters/logging";
import { type DispatchConfig, ConfigError, DEFAULT_DISPATCH_CONFIG, mergeConfigs, validateConfig } from "../config/config";

// ─────────────────────────────────────────────────────────────────
// Domain Options
// ─────────────────────────────────────────────────────────────────

export type DispatchDomainOptions = {
  /** Identifier used in call lineage; generated if omitted */
  id?: string;
  /** Names that never reach the resolver */
  reservedNames?: Iterable<Name>;
  /** Deepest chain of nested unresolved calls allowed */
  maxDepth?: number;
  /** Bound on waiting for another caller's generation */
  generationTimeoutMs?: number;
  fallback?: FallbackResolver;
  logger?: Logger;
  onEvent?: (event: DispatchEvent) => void;
  eventLogSize?: number;
};

export type CallOptions = DispatchOptions & {
  arity?: ResultArity;
};

let nextDomainId = 0;

function genDomainId(): string {
  return `domain-${nextDomainId++}`;
}

// ─────────────────────────────────────────────────────────────────
// Dispatch Domain
// ─────────────────────────────────────────────────────────────────

/**
 * DispatchDomain: One scoped instance of the dispatch engine.
 *
 * Lookup order for a call:
 * 1. Installed handler (invoked directly)
 * 2. Reserved name without a handler (absent outcome, resolver untouched)
 * 3. Recursion guard
 * 4. Fallback resolver through the generation coordinator
 */
export class DispatchDomain {
  readonly id: string;
  private readonly table = new DispatchTable();
  private readonly coordinator: GenerationCoordinator;
  private readonly reserved: ReadonlySet<Name>;
  private readonly maxDepth: number;
  private readonly generationTimeoutMs?: number;
  private readonly logger: Logger;
  private readonly ledger: EventLedger;
  private readonly counters: DispatchStats = emptyStats();
  private resolver?: FallbackResolver;

  constructor(options: DispatchDomainOptions = {}) {
    this.id = options.id ?? genDomainId();
    this.reserved = reservedSet(options.reservedNames ?? DEFAULT_RESERVED_NAMES);
    this.maxDepth = options.maxDepth ?? DEFAULT_DISPATCH_CONFIG.maxDepth;
    this.generationTimeoutMs = options.generationTimeoutMs;
    this.resolver = options.fallback;
    this.logger = (options.logger ?? logger).child({ domain: this.id });
    this.ledger = new EventLedger(options.eventLogSize ?? DEFAULT_DISPATCH_CONFIG.eventLogSize, options.onEvent);

    this.coordinator = new GenerationCoordinator(this.table, {
      onInstall: (name, outcome) => {
        if (outcome === "installed") this.counters.installs++;
        this.logger.debug({ member: name, outcome }, "handler generated");
        this.record({ tag: "generate", name, outcome, timestamp: Date.now() });
      },
      onAnswer: name => {
        this.counters.answers++;
        this.record({ tag: "answer", name, timestamp: Date.now() });
      },
      onDecline: (name, reason) => {
        this.counters.declines++;
        this.logger.debug({ member: name, reason }, "fallback declined");
        this.record(
          reason === undefined
            ? { tag: "decline", name, timestamp: Date.now() }
            : { tag: "decline", name, reason, timestamp: Date.now() }
        );
      },
      onWait: (name, waiters) => {
        this.record({ tag: "wait", name, waiters, timestamp: Date.now() });
      },
      onTimeout: (name, timeoutMs) => {
        this.counters.timeouts++;
        this.logger.warn({ member: name, timeoutMs }, "timed out waiting for generation");
        this.record({ tag: "timeout", name, timeoutMs, timestamp: Date.now() });
      },
      onAbort: name => {
        this.record({ tag: "aborted", name, timestamp: Date.now() });
      },
      onDeadlock: (name, depth) => {
        this.record({ tag: "recursive", name, depth, timestamp: Date.now() });
        this.logger.warn({ member: name, depth }, "generation wait cycle");
      },
    }, { domainId: this.id, maxDepth: this.maxDepth });
  }

  // ───────────────────────────────────────────────────────────────
  // Dispatch
  // ───────────────────────────────────────────────────────────────

  /**
   * Dispatch a call. Rejects with a `DispatchError` (or whatever the
   * handler or resolver threw).
   */
  async dispatch(context: CallContext, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    const { name } = context;

    const handler = this.table.lookup(name);
    if (handler) {
      this.counters.hits++;
      this.record({ tag: "hit", name, timestamp: Date.now() });
      return { tag: "done", value: await handler(context.args, context.arity), via: "table" };
    }

    this.counters.misses++;
    if (this.reserved.has(name)) {
      this.counters.reservedMisses++;
      this.record({ tag: "reserved", name, timestamp: Date.now() });
      return { tag: "absent", name };
    }

    const effective = this.withAmbientLineage(context);
    this.record({ tag: "miss", name, depth: effective.depth, timestamp: Date.now() });
    this.guardRecursion(effective);

    const resolver = this.resolver;
    if (!resolver) {
      this.counters.declines++;
      this.record({ tag: "decline", name, reason: "no fallback configured", timestamp: Date.now() });
      throw new NameNotFoundError(name, "no fallback configured");
    }

    const generated = await this.coordinator.generate(
      effective,
      ctx => {
        this.counters.resolverCalls++;
        return runInResolution(this.id, ctx, () => resolver.resolve(ctx));
      },
      {
        timeoutMs: options.generationTimeoutMs ?? this.generationTimeoutMs,
        signal: options.signal,
      }
    );

    if (generated.tag === "answer") {
      return { tag: "done", value: generated.value, via: "answer" };
    }
    return { tag: "done", value: await generated.handler(context.args, context.arity), via: "generated" };
  }

  /**
   * Build a context for `name` and dispatch it.
   * Resolves to the call's value; an absent reserved name yields `undefined`.
   */
  async call(name: Name, args: readonly unknown[] = [], options: CallOptions = {}): Promise<unknown> {
    const context = createCallContext(name, args, { arity: options.arity });
    const outcome = await this.dispatch(context, options);
    return outcome.tag === "done" ? outcome.value : undefined;
  }

  /**
   * Would a call to `name` currently succeed? Has no side effects.
   */
  can(name: Name): boolean {
    return canDispatch({ table: this.table, reserved: this.reserved, resolver: this.resolver }, name);
  }

  // ───────────────────────────────────────────────────────────────
  // Configuration
  // ───────────────────────────────────────────────────────────────

  /**
   * Replace the fallback resolver (last writer wins).
   * Calls already resolving keep the resolver they started with.
   */
  setFallback(resolver: FallbackResolver | undefined): void {
    this.resolver = resolver;
  }

  getFallback(): FallbackResolver | undefined {
    return this.resolver;
  }

  /**
   * Install a handler up front. Existing handlers are never replaced.
   */
  define(name: Name, handler: Handler): InstallResult {
    assertName(name);
    const result = this.table.install(name, handler);
    if (result.outcome === "installed") this.counters.installs++;
    return result;
  }

  isReserved(name: Name): boolean {
    return this.reserved.has(name);
  }

  // ───────────────────────────────────────────────────────────────
  // Introspection
  // ───────────────────────────────────────────────────────────────

  installed(): Name[] {
    return this.table.names();
  }

  isInstalled(name: Name): boolean {
    return this.table.has(name);
  }

  inProgress(name: Name): boolean {
    return this.coordinator.inProgress(name);
  }

  waiters(name: Name): number {
    return this.coordinator.waiters(name);
  }

  stats(): DispatchStats {
    return { ...this.counters };
  }

  events(limit?: number): DispatchEvent[] {
    return this.ledger.recent(limit);
  }

  countEvents(tag: DispatchEventTag): number {
    return this.ledger.count(tag);
  }

  // ───────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────

  /**
   * A context built before entering a resolver still belongs to that
   * resolver's chain when dispatched from inside it.
   */
  private withAmbientLineage(context: CallContext): CallContext {
    const frame = currentResolution();
    if (!frame || frame.depth + 1 <= context.depth) {
      return context;
    }
    const lineage = [...frame.lineage];
    for (const entry of context.lineage) {
      if (!lineageIncludes(lineage, entry.domainId, entry.name)) lineage.push(entry);
    }
    return createCallContext(context.name, context.args, {
      arity: context.arity,
      parent: { depth: frame.depth, lineage },
    });
  }

  private guardRecursion(context: CallContext): void {
    const reentered = lineageIncludes(context.lineage, this.id, context.name);
    if (reentered || context.depth > this.maxDepth) {
      this.record({ tag: "recursive", name: context.name, depth: context.depth, timestamp: Date.now() });
      this.logger.warn({ member: context.name, depth: context.depth, maxDepth: this.maxDepth }, "recursive fallback");
      throw new RecursiveFallbackError(context.name, context.depth, this.maxDepth);
    }
  }

  private record(event: DispatchEvent): void {
    this.ledger.record(event);
  }
}

// ─────────────────────────────────────────────────────────────────
// Construction from Configuration
// ─────────────────────────────────────────────────────────────────

/**
 * Create a domain from a loaded configuration.
 * Missing settings take their defaults; invalid ones throw `ConfigError`.
 */
export function createDispatchDomain(
  config: Partial<DispatchConfig> = {},
  options: Omit<DispatchDomainOptions, "reservedNames" | "maxDepth" | "generationTimeoutMs" | "eventLogSize"> = {}
): DispatchDomain {
  const resolved = mergeConfigs(config);
  const { errors } = validateConfig(resolved);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid dispatch configuration: ${errors.join("; ")}`);
  }

  return new DispatchDomain({
    ...options,
    reservedNames: resolved.reservedNames,
    maxDepth: resolved.maxDepth,
    generationTimeoutMs: resolved.generationTimeoutMs,
    eventLogSize: resolved.eventLogSize,
    logger: options.logger ?? logger.child({}, { level: resolved.logLevel }),
  });
}
