import { GovernanceBaseError, errorMessage } from "../errors.js";
import { exitCodeFor, type ExitCode } from "./exit-codes.js";

export type CommandError = {
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

export type CommandResult<T> = { ok: true; value: T } | { ok: false; error: CommandError; exitCode: ExitCode };

/** Turn a thrown error into the failure branch, keeping its stable code. */
export function failure(e: unknown): { ok: false; error: CommandError; exitCode: ExitCode } {
  if (e instanceof GovernanceBaseError) {
    return { ok: false, error: { code: e.code, message: e.message, details: e.details }, exitCode: exitCodeFor(e) };
  }
  return { ok: false, error: { code: "INTERNAL_ERROR", message: errorMessage(e) }, exitCode: exitCodeFor(e) };
}

export async function runCommand<T>(fn: () => Promise<T>): Promise<CommandResult<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (e) {
    return failure(e);
  }
}
