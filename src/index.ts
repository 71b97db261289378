// src/index.ts
// fallback-dispatch - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// DISPATCH DOMAIN
// ═══════════════════════════════════════════════════════════════════════════════

export {
  DispatchDomain,
  createDispatchDomain,
  type DispatchDomainOptions,
  type CallOptions,
} from "./core/dispatch/domain";
export { createDynamicObject, type DynamicObject } from "./core/dispatch/proxy";

// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXTS, HANDLERS & OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  Name,
  ResultArity,
  CallContext,
  LineageEntry,
  Handler,
  InstallOutcome,
  InstallResult,
  Resolution,
  FallbackResolver,
  DispatchOutcome,
  DispatchOptions,
  DispatchEvent,
  DispatchEventTag,
  DispatchStats,
} from "./core/dispatch/types";
export { createCallContext, currentResolution, type CallContextOptions, type ResolutionFrame } from "./core/dispatch/context";
export { DEFAULT_RESERVED_NAMES } from "./core/dispatch/reserved";

// ═══════════════════════════════════════════════════════════════════════════════
// RESOLVERS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  generate,
  answer,
  decline,
  functionResolver,
  tableResolver,
  patternResolver,
  chainResolvers,
  type HandlerFactory,
} from "./core/dispatch/resolvers";
export { createDelegationResolver, type DelegationOptions } from "./core/dispatch/delegation";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  DispatchError,
  NameNotFoundError,
  RecursiveFallbackError,
  GenerationTimeoutError,
  DelegationTargetMissingError,
  CallAbortedError,
  InvalidNameError,
  isDispatchError,
  type DispatchErrorCode,
} from "./core/dispatch/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION & LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { createLogger, loggingResolver, logger, type Logger, type LoggerOptions } from "./adapters/logging";
