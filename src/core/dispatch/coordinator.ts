// src/core/dispatch/coordinator.ts
// Generation coordinator: one in-flight resolution per name

import type {
  CallContext,
  Generated,
  GenerationRecord,
  InstallOutcome,
  MaybePromise,
  Name,
  Resolution,
} from "./types";
import type { DispatchTable } from "./table";
import { CallAbortedError, GenerationTimeoutError, NameNotFoundError, RecursiveFallbackError } from "./errors";

/**
 * Hooks the coordinator reports through; the dispatch domain wires these
 * to its ledger and logger.
 */
export type CoordinatorHooks = {
  onInstall?: (name: Name, outcome: InstallOutcome) => void;
  onAnswer?: (name: Name) => void;
  onDecline?: (name: Name, reason?: string) => void;
  onWait?: (name: Name, waiters: number) => void;
  onTimeout?: (name: Name, timeoutMs: number) => void;
  onAbort?: (name: Name) => void;
  onDeadlock?: (name: Name, depth: number) => void;
};

export type CoordinatorOptions = {
  /** Domain whose lineage entries this coordinator's slots belong to */
  domainId: string;
  /** Reported on the error raised for a wait cycle */
  maxDepth: number;
};

export type WaitOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

type Slot = GenerationRecord & {
  release: () => void;
  /** Names that calls inside this slot's resolution are waiting on */
  blockedOn: Map<Name, number>;
};

/**
 * GenerationCoordinator: Serializes handler generation per name.
 *
 * The slot for a name is registered synchronously, before the resolver
 * runs, so concurrent first calls see it and wait. Calls for other names
 * never touch the slot. Slots are dropped as soon as their generation ends.
 *
 * A wait is refused with `RecursiveFallbackError` when the generation it
 * would wait on is itself (transitively) waiting on one of the caller's
 * enclosing resolutions in this domain.
 */
export class GenerationCoordinator {
  private readonly slots = new Map<Name, Slot>();

  constructor(
    private readonly table: DispatchTable,
    private readonly hooks: CoordinatorHooks = {},
    private readonly options: CoordinatorOptions = { domainId: "", maxDepth: Number.POSITIVE_INFINITY }
  ) {}

  /**
   * Produce a handler (or a one-shot answer) for `context.name`.
   *
   * `run` invokes the fallback resolver; it is called at most once per
   * generation. Declines throw `NameNotFoundError` and are not remembered.
   */
  async generate(
    context: CallContext,
    run: (context: CallContext) => MaybePromise<Resolution>,
    options: WaitOptions = {}
  ): Promise<Generated> {
    const { name } = context;
    for (;;) {
      const installed = this.table.lookup(name);
      if (installed) {
        return { tag: "handler", handler: installed };
      }

      const slot = this.slots.get(name);
      if (slot) {
        if (this.wouldDeadlock(context)) {
          this.hooks.onDeadlock?.(name, context.depth);
          throw new RecursiveFallbackError(name, context.depth, this.options.maxDepth, { waitCycle: true });
        }
        await this.wait(context, slot, options);
        continue;
      }

      return this.lead(context, run);
    }
  }

  /**
   * Check if a generation for `name` is in flight.
   */
  inProgress(name: Name): boolean {
    return this.slots.get(name)?.inProgress ?? false;
  }

  /**
   * Number of callers waiting on the generation of `name`.
   */
  waiters(name: Name): number {
    return this.slots.get(name)?.waiters ?? 0;
  }

  private async lead(
    context: CallContext,
    run: (context: CallContext) => MaybePromise<Resolution>
  ): Promise<Generated> {
    const { name } = context;
    const slot = this.openSlot(name);

    try {
      const resolution = await run(context);
      switch (resolution.tag) {
        case "generate": {
          const { outcome, handler } = this.table.install(name, resolution.handler);
          this.hooks.onInstall?.(name, outcome);
          return { tag: "handler", handler, outcome };
        }
        case "answer":
          this.hooks.onAnswer?.(name);
          return { tag: "answer", value: resolution.value };
        case "decline":
          this.hooks.onDecline?.(name, resolution.reason);
          throw new NameNotFoundError(name, resolution.reason);
      }
    } finally {
      slot.inProgress = false;
      this.slots.delete(name);
      slot.release();
    }
  }

  private openSlot(name: Name): Slot {
    let release: () => void = () => {};
    const done = new Promise<void>(resolve => {
      release = resolve;
    });
    const slot: Slot = { inProgress: true, waiters: 0, done, release, blockedOn: new Map() };
    this.slots.set(name, slot);
    return slot;
  }

  /**
   * Wait for another caller's generation to end.
   * Timing out or aborting only removes this waiter.
   */
  private wait(context: CallContext, slot: Slot, options: WaitOptions): Promise<void> {
    const { name } = context;
    const { timeoutMs, signal } = options;

    if (signal?.aborted) {
      this.hooks.onAbort?.(name);
      return Promise.reject(new CallAbortedError(name, signal.reason));
    }

    slot.waiters++;
    this.hooks.onWait?.(name, slot.waiters);
    const blocked = this.block(context);

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        slot.waiters--;
        this.unblock(blocked, name);
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        return true;
      };

      const onAbort = (): void => {
        if (!settle()) return;
        this.hooks.onAbort?.(name);
        reject(new CallAbortedError(name, signal?.reason));
      };

      void slot.done.then(() => {
        if (settle()) resolve();
      });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          if (!settle()) return;
          this.hooks.onTimeout?.(name, timeoutMs);
          reject(new GenerationTimeoutError(name, timeoutMs));
        }, timeoutMs);
      }

      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  // ───────────────────────────────────────────────────────────────
  // Wait-for Graph
  // ───────────────────────────────────────────────────────────────

  /**
   * Slots of the resolutions enclosing `context` in this domain.
   */
  private enclosingSlots(context: CallContext): Slot[] {
    const slots: Slot[] = [];
    for (const entry of context.lineage) {
      if (entry.domainId !== this.options.domainId) continue;
      const slot = this.slots.get(entry.name);
      if (slot) slots.push(slot);
    }
    return slots;
  }

  /**
   * Would waiting on `context.name` close a cycle in the wait-for graph?
   */
  private wouldDeadlock(context: CallContext): boolean {
    const own = new Set<Name>();
    for (const entry of context.lineage) {
      if (entry.domainId === this.options.domainId) own.add(entry.name);
    }
    if (own.size === 0) return false;

    const seen = new Set<Name>();
    const queue: Name[] = [context.name];
    for (let i = 0; i < queue.length; i++) {
      const current = queue[i];
      if (own.has(current)) return true;
      if (seen.has(current)) continue;
      seen.add(current);
      const blockedOn = this.slots.get(current)?.blockedOn;
      if (blockedOn) queue.push(...blockedOn.keys());
    }
    return false;
  }

  private block(context: CallContext): Slot[] {
    const slots = this.enclosingSlots(context);
    for (const slot of slots) {
      slot.blockedOn.set(context.name, (slot.blockedOn.get(context.name) ?? 0) + 1);
    }
    return slots;
  }

  private unblock(slots: Slot[], name: Name): void {
    for (const slot of slots) {
      const count = (slot.blockedOn.get(name) ?? 0) - 1;
      if (count > 0) slot.blockedOn.set(name, count);
      else slot.blockedOn.delete(name);
    }
  }
}
