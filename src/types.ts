/**
 * Lifecycle Reconciler Core Types
 *
 * Declared retention model, provider-side state, diff and outcome shapes,
 * and the typed error taxonomy shared by every component.
 */

// =============================================================================
// Result
// =============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// =============================================================================
// Target
// =============================================================================

/**
 * Storage container a policy applies to. Frozen once created.
 */
export type Target = Readonly<{
  bucket: string;
  region?: string;
}>;

export function createTarget(bucket: string, region?: string): Target {
  return Object.freeze(region ? { bucket, region } : { bucket });
}

/** Identity used for locking and audit lookups */
export function targetKey(target: Target): string {
  return `${target.region ?? "default"}/${target.bucket}`;
}

// =============================================================================
// Declared Model
// =============================================================================

export const STORAGE_CLASSES = ["STANDARD", "INFREQUENT_ACCESS", "ARCHIVE", "DEEP_ARCHIVE"] as const;

export type StorageClass = (typeof STORAGE_CLASSES)[number];

/** Warm → cold. A transition may never move to a lower rank than a prior one. */
export const STORAGE_CLASS_RANK: Record<StorageClass, number> = {
  STANDARD: 0,
  INFREQUENT_ACCESS: 1,
  ARCHIVE: 2,
  DEEP_ARCHIVE: 3,
};

export function isStorageClass(value: unknown): value is StorageClass {
  return typeof value === "string" && STORAGE_CLASSES.some((c) => c === value);
}

export type RuleStatus = "ENABLED" | "DISABLED";

export type Transition = {
  afterDays: number;
  storageClass: StorageClass;
};

export type Expiration = {
  afterDays: number;
};

export type LifecycleRule = {
  id: string;
  /** Empty string matches every object */
  prefixFilter: string;
  status: RuleStatus;
  transitions: Transition[];
  expiration?: Expiration;
  requiresHook: boolean;
};

export type RuleSet = readonly LifecycleRule[];

/** The fields that are compared against the provider and hashed into snapshots */
export type RuleShape = Pick<LifecycleRule, "id" | "prefixFilter" | "status" | "transitions" | "expiration">;

// =============================================================================
// Provider State
// =============================================================================

/**
 * A rule as the provider reports it. `raw` is the provider's own record and is
 * written back untouched apart from the declared fields.
 */
export type ProviderRule<TRaw = unknown> = RuleShape & {
  /** The provider rule uses clauses the declared model cannot express */
  opaque?: boolean;
  raw?: TRaw;
};

export type ProviderState<TRaw = unknown> = {
  rules: ProviderRule<TRaw>[];
  /** Provider rules without an id: never diffed, always written back */
  anonymous: TRaw[];
  /** Configuration-level provider fields passed through on write */
  attributes: Readonly<Record<string, string>>;
};

export function emptyProviderState<TRaw = unknown>(): ProviderState<TRaw> {
  return { rules: [], anonymous: [], attributes: {} };
}

// =============================================================================
// Diff
// =============================================================================

export type RuleField = "prefixFilter" | "status" | "transitions" | "expiration" | "representation";

export type RuleFieldChange = {
  field: RuleField;
  expected: unknown;
  actual: unknown;
};

export type DiffSummary = {
  toCreate: string[];
  toUpdate: string[];
  toDelete: string[];
  unchanged: string[];
};

export type DiffResult<TRaw = unknown> = DiffSummary & {
  changes: Record<string, RuleFieldChange[]>;
  desired: ReadonlyMap<string, LifecycleRule>;
  current: ProviderState<TRaw>;
};

// =============================================================================
// Errors
// =============================================================================

export type FetchErrorKind = "NotFound" | "Transient" | "PermissionDenied";
export type ApplyErrorKind = "Transient" | "Terminal";
export type HookErrorKind = "Rejected" | "Timeout";

export type FetchError = { kind: FetchErrorKind; message: string; code?: string };
export type ApplyError = { kind: ApplyErrorKind; message: string; code?: string };
export type HookError = { kind: HookErrorKind; message: string };
export type LogError = { kind: "LogError"; message: string };

export type ErrorKind = FetchErrorKind | ApplyErrorKind | HookErrorKind;

export type OutcomeError = { kind: ErrorKind; message: string; code?: string };

export type ValidationErrorCode =
  | "SCHEMA"
  | "DUPLICATE_ID"
  | "INVALID_ID"
  | "INVALID_PREFIX"
  | "INVALID_DAYS"
  | "INVALID_STORAGE_CLASS"
  | "TRANSITION_ORDER"
  | "STORAGE_CLASS_ORDER"
  | "EXPIRATION_ORDER"
  | "EMPTY_RULE"
  | "TOO_MANY_RULES";

export type ValidationError = {
  code: ValidationErrorCode;
  ruleId?: string;
  /** JSON-pointer style location, e.g. `/rules/2/transitions/1` */
  path: string;
  message: string;
};

export type ConflictWarning = {
  code: "PREFIX_CONFLICT";
  ruleIds: [string, string];
  message: string;
};

// =============================================================================
// Apply
// =============================================================================

export type ApplyAction = "Created" | "Updated" | "Deleted" | "Skipped" | "Failed";

export type ApplyOutcome = {
  ruleId: string;
  action: ApplyAction;
  /** Provider write attempts that carried this rule */
  attempts: number;
  error?: OutcomeError;
  detail?: string;
};

export type FinalState = {
  hash: string;
  ruleIds: string[];
};
