// src/core/dispatch/delegation.ts
// Delegation adapter: a fallback resolver that forwards to a wrapped target

import type { Logger } from "pino";
import type { FallbackResolver, Handler, Name } from "./types";
import { DelegationTargetMissingError } from "./errors";
import { generate } from "./resolvers";

export type DelegationOptions = {
  logger?: Logger;
  /** Called once per name, when its forwarding handler is generated */
  onGenerate?: (name: Name, args: readonly unknown[]) => void;
};

function memberOf(target: object, name: Name): Function | undefined {
  const member: unknown = Reflect.get(target, name);
  return typeof member === "function" ? member : undefined;
}

/**
 * Create a resolver that delegates missed names to `target`.
 *
 * The first call to a name is logged and instrumented, then answered by
 * generating a forwarding handler; every later call to that name hits the
 * dispatch table and is not logged again. The forwarding handler passes
 * arguments through unchanged, calls the member with `this` bound to the
 * target and returns its result verbatim. Errors thrown by the target
 * propagate untouched.
 *
 * A target without the member fails the call with
 * `DelegationTargetMissingError`; nothing is installed. Inside
 * `chainResolvers` such names are skipped through `wouldResolve` instead.
 */
export function createDelegationResolver(target: object, options: DelegationOptions = {}): FallbackResolver {
  const { logger, onGenerate } = options;

  const forwarder = (name: Name): Handler => (args) => {
    const method = memberOf(target, name);
    if (!method) {
      throw new DelegationTargetMissingError(name);
    }
    return Reflect.apply(method, target, args);
  };

  return {
    resolve(context) {
      if (!memberOf(target, context.name)) {
        logger?.warn({ member: context.name }, "delegation target has no such method");
        throw new DelegationTargetMissingError(context.name);
      }
      logger?.debug({ member: context.name, args: context.args, arity: context.arity }, "delegating");
      onGenerate?.(context.name, context.args);
      return generate(forwarder(context.name));
    },
    wouldResolve: name => memberOf(target, name) !== undefined,
  };
}
