import type { Expression, JsonValue } from "./tokens.js";

// --- Declarations ---

export type LifecycleDef = {
  readonly createBeforeDestroy?: boolean;
  readonly preventDestroy?: boolean;
  readonly ignoreChanges?: readonly string[] | "all";
};

/** One record handed over by the declaration parser. */
export type ResourceDeclaration = {
  readonly type: string;
  readonly name: string;
  readonly attributes: Readonly<Record<string, Expression>>;
  readonly dependsOn?: readonly string[];
  readonly count?: number;
  readonly lifecycle?: LifecycleDef;
};

export type ResourceNode = {
  readonly address: string;
  readonly type: string;
  readonly name: string;
  readonly index?: number;
  readonly attributes: Readonly<Record<string, Expression>>;
  readonly dependsOn: readonly string[];
  readonly lifecycle: LifecycleDef;
};

export type DeclaredResource =
  | { readonly kind: "single" }
  | { readonly kind: "collection"; readonly count: number };

export type ExpandedResources = {
  readonly nodes: readonly ResourceNode[];
  /** Keyed by `type.name`, including collections expanded to zero instances. */
  readonly declared: ReadonlyMap<string, DeclaredResource>;
};

// --- Resource type schemas ---

export type ResourceTypeSchema = {
  readonly mutableAttributes: readonly string[];
  readonly createBeforeDestroy: boolean;
};

export type ResourceSchemas = Readonly<Record<string, ResourceTypeSchema>>;

// --- State ---

export type StateAttributes = Readonly<Record<string, JsonValue>>;

export type StateEntry = {
  readonly type: string;
  readonly id: string;
  readonly attributes: StateAttributes;
  readonly dependencies: readonly string[];
};

/** A prior object kept alive while its create-before-destroy replacement completes. */
export type DeposedObject = StateEntry & {
  readonly address: string;
};

export type StateSnapshot = {
  readonly version: 1;
  readonly serial: number;
  readonly lineage: string;
  readonly resources: Readonly<Record<string, StateEntry>>;
  readonly deposed: readonly DeposedObject[];
};

export type LockRequest = {
  readonly ttlMs: number;
  readonly who: string;
  readonly operation: string;
};

export type LockInfo = {
  readonly id: string;
  readonly who: string;
  readonly operation: string;
  readonly createdAt: string;
  readonly expiresAt: string;
};

// --- Plans ---

export type ChangeAction = "create" | "update" | "replace" | "delete" | "noop";

export type ReplaceOrder = "create_before_destroy" | "destroy_before_create";

export type ResourceChange = {
  readonly address: string;
  readonly type: string;
  readonly action: ChangeAction;
  readonly replaceOrder?: ReplaceOrder;
  readonly changedAttributes: readonly string[];
  readonly forcesReplacement: readonly string[];
  readonly before?: StateAttributes;
  readonly after?: Readonly<Record<string, Expression>>;
  /** Provider id of the deposed object this change removes. */
  readonly deposedId?: string;
};

export type StepOperation = "create" | "update" | "delete" | "noop";

export type PlanStep = {
  readonly id: string;
  readonly address: string;
  readonly type: string;
  readonly operation: StepOperation;
  readonly action: ChangeAction;
  readonly dependsOn: readonly string[];
  readonly attributes: Readonly<Record<string, Expression>>;
  /** Resource addresses recorded as this object's dependencies in state. */
  readonly dependencies: readonly string[];
  readonly priorId?: string;
  readonly priorAttributes?: StateAttributes;
  readonly deposed: boolean;
  readonly replace?: ReplaceOrder;
};

export type Diagnostic = {
  readonly severity: "warning" | "error";
  readonly address: string;
  readonly message: string;
};

export type Plan = {
  readonly changes: readonly ResourceChange[];
  readonly steps: readonly PlanStep[];
  readonly diagnostics: readonly Diagnostic[];
  /** Instance counts of `count` declarations, for expanding `[*]` references at apply time. */
  readonly collections: Readonly<Record<string, number>>;
  readonly stateSerial: number;
  readonly stateLineage: string;
};

// --- Apply ---

export type StepStatus =
  | "pending"
  | "ready"
  | "running"
  | "applied"
  | "failed"
  | "skipped"
  | "cancelled";

export type TerminalStatus = Extract<StepStatus, "applied" | "failed" | "skipped" | "cancelled">;

export type StepReport = {
  readonly id: string;
  readonly address: string;
  readonly operation: StepOperation;
  readonly status: TerminalStatus;
  readonly attempts: number;
  readonly error?: string;
};

export type ApplyResult = "success" | "partial_failure" | "cancelled" | "failed";

export type ApplyReport = {
  readonly result: ApplyResult;
  readonly steps: readonly StepReport[];
  readonly errors: readonly string[];
  readonly durationMs: number;
};

export type ApplyEvent =
  | { readonly type: "step_start"; readonly step: PlanStep; readonly attempt: number }
  | {
      readonly type: "step_retry";
      readonly step: PlanStep;
      readonly attempt: number;
      readonly delayMs: number;
      readonly message: string;
    }
  | { readonly type: "step_applied"; readonly step: PlanStep; readonly attempts: number }
  | { readonly type: "step_failed"; readonly step: PlanStep; readonly message: string }
  | { readonly type: "step_skipped"; readonly step: PlanStep; readonly cause: string }
  | { readonly type: "step_cancelled"; readonly step: PlanStep };
