// src/core/dispatch/reserved.ts
// Names that never reach the fallback resolver

import type { Name } from "./types";

/**
 * Default reserved names: teardown hooks, introspection hooks, the
 * promise-adoption probe (`then`) and module-import hooks.
 */
export const DEFAULT_RESERVED_NAMES: readonly Name[] = [
  "dispose",
  "asyncDispose",
  "inspect",
  "toJSON",
  "then",
  "import",
  "unimport",
];

/**
 * Build the reserved set for a domain.
 */
export function reservedSet(names: Iterable<Name> = DEFAULT_RESERVED_NAMES): ReadonlySet<Name> {
  return new Set(names);
}
