// src/core/dispatch/capability.ts
// Side-effect-free "would this call succeed?" query

import type { FallbackResolver, Name } from "./types";
import type { DispatchTable } from "./table";

export type CapabilitySources = {
  table: DispatchTable;
  reserved: ReadonlySet<Name>;
  resolver?: FallbackResolver;
};

/**
 * Answer whether dispatching `name` would currently succeed.
 *
 * Installed names are capable. Reserved names without a handler are not
 * (they dispatch to the absent outcome). Everything else defers to the
 * resolver's `wouldResolve`; resolvers without one are never capable
 * for names they have not generated yet.
 */
export function canDispatch(sources: CapabilitySources, name: Name): boolean {
  if (sources.table.has(name)) return true;
  if (sources.reserved.has(name)) return false;
  return sources.resolver?.wouldResolve?.(name) ?? false;
}
