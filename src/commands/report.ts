import { renderMigrationGuide } from "../classifier/summary.js";
import type { ChangeReport } from "../tracker/report.js";
import type { Engine } from "./context.js";
import { runCommand, type CommandResult } from "./result.js";

export async function changeReport(
  engine: Engine,
  opts: { timeframe?: string; team?: string },
): Promise<CommandResult<ChangeReport>> {
  return runCommand(() => engine.tracker.generateChangeReport(opts.timeframe, opts.team ?? null));
}

/** Markdown migration guide for the breaking changes of a tracked change. */
export async function migrationGuide(
  engine: Engine,
  changeId: string,
): Promise<CommandResult<{ change_id: string; guide: string }>> {
  return runCommand(async () => {
    const record = await engine.tracker.getChange(changeId);
    return {
      change_id: changeId,
      guide: renderMigrationGuide(record.breaking_changes, record.change.repository, record.created_at),
    };
  });
}
