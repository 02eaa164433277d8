import {
  BreakingChangeDetectionError,
  ChangeTrackingError,
  ConcurrencyConflictError,
  ConfigurationError,
  DependencyAnalysisError,
  GovernanceError,
  ReviewWorkflowError,
  StoreError,
  UsageError,
} from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  POLICY_BLOCKED: 1,
  APPROVAL_REQUIRED: 2,
  INVALID_ARGS: 3,
  CONCURRENT_CONFLICT: 4,
  CONFIG_INVALID: 5,
  DETECTION_FAILED: 6,
  NOT_FOUND: 7,
  INTERNAL: 10,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** A lost compare-and-swap or a lock another writer held too long. */
function isContention(e: unknown): boolean {
  return e instanceof ConcurrencyConflictError || (e instanceof StoreError && e.code === "LOCK_TIMEOUT");
}

export function exitCodeFor(e: unknown): ExitCode {
  if (isContention(e)) return EXIT.CONCURRENT_CONFLICT;
  if (e instanceof ChangeTrackingError && isContention(e.cause)) return EXIT.CONCURRENT_CONFLICT;
  if (e instanceof ConfigurationError || e instanceof GovernanceError) return EXIT.CONFIG_INVALID;
  if (e instanceof BreakingChangeDetectionError) return EXIT.DETECTION_FAILED;
  if (e instanceof DependencyAnalysisError || e instanceof UsageError) return EXIT.INVALID_ARGS;
  if (e instanceof ChangeTrackingError && e.code === "CHANGE_NOT_FOUND") return EXIT.NOT_FOUND;
  if (e instanceof ReviewWorkflowError) {
    if (e.reason === "not_found") return EXIT.NOT_FOUND;
    if (e.reason === "invalid_request") return EXIT.INVALID_ARGS;
    return EXIT.POLICY_BLOCKED;
  }
  return EXIT.INTERNAL;
}
