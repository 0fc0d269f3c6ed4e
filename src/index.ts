export type * from "./core/types.js";
export {
  ref,
  splat,
  countIndex,
  unknown,
  template,
  isToken,
  containsUnknown,
  resolveExpression,
  toJsonValue,
  parseTemplateString,
  decodeExpression,
  type Expression,
  type JsonValue,
  type Token,
} from "./core/tokens.js";
export { formatAddress, parseAddress, compareAddresses } from "./core/address.js";
export {
  formatValidationError,
  formatEngineError,
  transientError,
  fatalError,
  notFoundError,
  type ValidationError,
  type ValidationErrorCode,
  type ProviderError,
  type StateError,
  type EngineError,
} from "./core/errors.js";
export { expandDeclarations } from "./core/expand.js";
export { resolveReferences, type Reference } from "./core/resolver.js";
export {
  buildGraph,
  dependenciesOf,
  dependentsOf,
  reachableFrom,
  applyOrder,
  destroyOrder,
  toDot,
  type DependencyGraph,
} from "./core/graph.js";
export { parseSchemas, DEFAULT_TYPE_SCHEMA } from "./core/schema.js";
export { parseDeclarations, readDeclarations } from "./core/declarations.js";
export { plan, analyze, planSummary, isEmptyPlan, type PlanOptions } from "./core/planner.js";
export { apply, DEFAULT_PARALLELISM, type ApplyContext } from "./core/executor.js";
export { refreshState, type RefreshResult } from "./core/refresh.js";
export { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./core/retry.js";
export { emptyState, decodeState, encodeState, JsonValueSchema } from "./core/state.js";
export { StateWriter } from "./core/state-writer.js";
export {
  runPlan,
  runApply,
  type EngineInput,
  type EngineEvent,
  type PlanOutcome,
  type ApplyOutcome,
} from "./core/engine.js";
export type {
  ResourceProvider,
  ProviderRegistry,
  ProviderAttributes,
  CreatedObject,
} from "./core/provider.js";
export { LocalBackend, MemoryBackend, type StateBackend } from "./backends/index.js";
