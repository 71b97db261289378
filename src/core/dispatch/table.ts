// src/core/dispatch/table.ts
// Dispatch table: name → installed handler

import type { Handler, InstallResult, Name } from "./types";

/**
 * DispatchTable: Mapping from member name to installed handler.
 *
 * Handlers are only ever added. `install` is first-writer-wins: a second
 * install for a name reports `already-present` together with the handler
 * that stays in the table, and the candidate is dropped.
 */
export class DispatchTable {
  private readonly handlers = new Map<Name, Handler>();

  /**
   * Look up a handler. Never mutates.
   */
  lookup(name: Name): Handler | undefined {
    return this.handlers.get(name);
  }

  install(name: Name, handler: Handler): InstallResult {
    const existing = this.handlers.get(name);
    if (existing) {
      return { outcome: "already-present", handler: existing };
    }
    this.handlers.set(name, handler);
    return { outcome: "installed", handler };
  }

  has(name: Name): boolean {
    return this.handlers.has(name);
  }

  names(): Name[] {
    return Array.from(this.handlers.keys());
  }

  get size(): number {
    return this.handlers.size;
  }
}
