/**
 * Error taxonomy for the governance engine.
 *
 * Every error carries a stable `code` so the CLI can map it to an exit code
 * and emit it in JSONL diagnostics without string matching on messages.
 * "Not yet approved" is never an error: it is a PolicyResult with
 * action `require_approval`.
 */
export class GovernanceBaseError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid policy reference, malformed configuration file. */
export class ConfigurationError extends GovernanceBaseError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "CONFIGURATION_ERROR", details);
  }
}

/** Unknown policy value. */
export class GovernanceError extends GovernanceBaseError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "GOVERNANCE_ERROR", details);
  }
}

export type ReviewFailure = "not_found" | "unauthorized" | "invalid_transition" | "invalid_request";

export class ReviewWorkflowError extends GovernanceBaseError {
  constructor(
    message: string,
    readonly reason: ReviewFailure,
    details: Record<string, unknown> = {},
  ) {
    super(message, `REVIEW_${reason.toUpperCase()}`, details);
  }
}

/** Lookup of a service or plan that was never registered. */
export class DependencyAnalysisError extends GovernanceBaseError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "DEPENDENCY_ANALYSIS_ERROR", details);
  }
}

/** Store or audit write failure while tracking a change. */
export class ChangeTrackingError extends GovernanceBaseError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown, code = "CHANGE_TRACKING_ERROR") {
    super(message, code, details, { cause });
  }
}

/** The external breaking-change detector failed or produced unreadable output. */
export class BreakingChangeDetectionError extends GovernanceBaseError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown, code = "DETECTION_FAILED") {
    super(message, code, details, { cause });
  }
}

export class ClassifierTimeoutError extends BreakingChangeDetectionError {
  constructor(readonly timeoutMs: number) {
    super(`Breaking change detection timed out after ${timeoutMs}ms`, { timeout_ms: timeoutMs }, undefined, "DETECTION_TIMEOUT");
  }
}

/** Unreadable or schema-invalid record in the store, or an I/O failure beneath it. */
export class StoreError extends GovernanceBaseError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown, code = "STORE_ERROR") {
    super(message, code, details, { cause });
  }
}

/** Compare-and-swap lost against a concurrent writer. */
export class ConcurrencyConflictError extends GovernanceBaseError {
  constructor(
    readonly collection: string,
    readonly key: string,
    readonly expectedVersion: number,
    readonly actualVersion: number | null,
  ) {
    super(
      `Concurrent modification of ${collection}/${key} (expected v${expectedVersion}, found ${actualVersion === null ? "none" : `v${actualVersion}`})`,
      "CONCURRENT_CONFLICT",
      { collection, key },
    );
  }
}

/** Bad or missing command arguments. */
export class UsageError extends GovernanceBaseError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, "INVALID_ARGS", details);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
