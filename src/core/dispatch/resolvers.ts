// src/core/dispatch/resolvers.ts
// Resolution constructors and stock fallback resolvers

import type { CallContext, FallbackResolver, Handler, MaybePromise, Name, Resolution } from "./types";

// ─────────────────────────────────────────────────────────────────
// Resolution Constructors
// ─────────────────────────────────────────────────────────────────

/**
 * Install `handler` for the name and invoke it.
 */
export function generate(handler: Handler): Resolution {
  return { tag: "generate", handler };
}

/**
 * Answer this one call without caching anything.
 */
export function answer(value: unknown): Resolution {
  return { tag: "answer", value };
}

export function decline(reason?: string): Resolution {
  return reason === undefined ? { tag: "decline" } : { tag: "decline", reason };
}

// ─────────────────────────────────────────────────────────────────
// Stock Resolvers
// ─────────────────────────────────────────────────────────────────

/**
 * Wrap a plain function as a resolver.
 */
export function functionResolver(
  resolve: (context: CallContext) => MaybePromise<Resolution>,
  wouldResolve?: (name: Name) => boolean
): FallbackResolver {
  return wouldResolve ? { resolve, wouldResolve } : { resolve };
}

/**
 * HandlerFactory: Builds the handler for a name on first use.
 */
export type HandlerFactory = (name: Name, context: CallContext) => Handler;

/**
 * Generate handlers lazily from a fixed set of factories.
 */
export function tableResolver(factories: Readonly<Record<Name, HandlerFactory>>): FallbackResolver {
  const owns = (name: Name): boolean => Object.prototype.hasOwnProperty.call(factories, name);
  return {
    resolve(context) {
      const factory = owns(context.name) ? factories[context.name] : undefined;
      return factory ? generate(factory(context.name, context)) : decline(`no factory for '${context.name}'`);
    },
    wouldResolve: owns,
  };
}

/**
 * Generate handlers for names matching `pattern`.
 * The factory receives the match, so capture groups can pick the member
 * (e.g. `/^get_(\w+)$/` for accessors).
 */
export function patternResolver(
  pattern: RegExp,
  factory: (match: RegExpExecArray, context: CallContext) => Handler
): FallbackResolver {
  const matcher = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
  return {
    resolve(context) {
      const match = matcher.exec(context.name);
      return match ? generate(factory(match, context)) : decline(`'${context.name}' does not match ${pattern}`);
    },
    wouldResolve: name => matcher.test(name),
  };
}

/**
 * Try resolvers in order; the first one that does not decline wins.
 * Members whose `wouldResolve` rejects the name are skipped, so the chain
 * resolves exactly the names its capability answer reports.
 */
export function chainResolvers(...resolvers: FallbackResolver[]): FallbackResolver {
  return {
    async resolve(context) {
      const reasons: string[] = [];
      for (const resolver of resolvers) {
        if (resolver.wouldResolve && !resolver.wouldResolve(context.name)) continue;
        const resolution = await resolver.resolve(context);
        if (resolution.tag !== "decline") {
          return resolution;
        }
        if (resolution.reason) reasons.push(resolution.reason);
      }
      return decline(reasons.length > 0 ? reasons.join("; ") : undefined);
    },
    wouldResolve: name => resolvers.some(r => r.wouldResolve?.(name) ?? false),
  };
}
