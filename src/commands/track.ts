import { GitOperations } from "../git/operations.js";
import type { TrackChangeInput } from "../tracker/tracker.js";
import type { ChangeRecord } from "../types/change.js";
import type { ChangeType } from "../types/governance.js";
import type { Engine } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { runCommand, type CommandResult } from "./result.js";

export const CHANGE_TYPES: readonly ChangeType[] = ["addition", "modification", "removal"];

export type TrackOptions = {
  target: string;
  changeType: ChangeType;
  repository: string;
  author?: string;
  description?: string;
  team?: string;
  affectedTeams?: string[];
  tags?: string[];
  /** Input handed to the classifier. */
  input?: string;
  /** Baseline the classifier compares against. */
  against?: string;
  /** Read commit, branch and changed .proto files from this checkout. */
  git?: GitOperations | null;
  /** Base ref for the changed-file list. */
  gitBase?: string;
};

/** blocked → 1, waiting on a review → 2, otherwise 0. */
export function trackExitCode(record: ChangeRecord): ExitCode {
  if (record.blocked) return EXIT.POLICY_BLOCKED;
  if (record.review_required && record.approval_status === "pending") return EXIT.APPROVAL_REQUIRED;
  return EXIT.SUCCESS;
}

export async function track(engine: Engine, opts: TrackOptions): Promise<CommandResult<ChangeRecord>> {
  return runCommand(async () => {
    const git = opts.git === undefined ? new GitOperations(process.cwd()) : opts.git;
    const ctx = git ? await git.readContext(opts.gitBase) : null;

    const input: TrackChangeInput = {
      target: opts.target,
      change_type: opts.changeType,
      repository: opts.repository,
      author: opts.author,
      description: opts.description,
      owning_team: opts.team,
      affected_teams: opts.affectedTeams,
      tags: opts.tags,
      current_ref: opts.input,
      baseline_ref: opts.against,
      commit_hash: ctx?.commit_hash ?? null,
      branch: ctx?.branch ?? null,
      files_changed: ctx?.files_changed ?? [],
    };
    return engine.tracker.trackSchemaChange(input);
  });
}

export async function showChange(engine: Engine, changeId: string, sync = false): Promise<CommandResult<ChangeRecord>> {
  return runCommand(() => (sync ? engine.tracker.syncReviewStatus(changeId) : engine.tracker.getChange(changeId)));
}

export async function history(
  engine: Engine,
  filter: { target?: string; team?: string; since?: string; limit?: number },
): Promise<CommandResult<ChangeRecord[]>> {
  return runCommand(() => engine.tracker.getChangeHistory(filter));
}
