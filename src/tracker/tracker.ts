import { randomUUID } from "node:crypto";
import type { BreakingChangeClassifier } from "../classifier/classifier.js";
import { summarizeBreakingChanges } from "../classifier/summary.js";
import { ChangeTrackingError, ConfigurationError, GovernanceBaseError, GovernanceError, errorMessage } from "../errors.js";
import { isHighImpact, maxImpact } from "../impact/levels.js";
import type { ImpactAnalysis, ImpactAnalyzer } from "../impact/service.js";
import type { GovernanceService } from "../policy/service.js";
import type { ReviewWorkflow } from "../review/workflow.js";
import { DEFAULT_MAX_RETRIES, mutate, type Collection, type GovernanceStore } from "../store/store.js";
import { parseReviewer, type TeamDirectory } from "../teams/directory.js";
import type { ApprovalState, ChangeNotificationPayload, ChangeRecord, NotificationLogEntry } from "../types/change.js";
import type { AuditRecord, BreakingChange, ChangeType, ImpactLevel, SchemaChange } from "../types/governance.js";
import type { Notifier } from "./notifier.js";
import { buildChangeReport, reportSince, type ChangeReport } from "./report.js";

export type TrackChangeInput = {
  target: string;
  change_type: ChangeType;
  repository: string;
  author?: string;
  description?: string;
  owning_team?: string | null;
  affected_teams?: string[];
  commit_hash?: string | null;
  branch?: string | null;
  files_changed?: string[];
  tags?: string[];
  /** Input handed to the classifier; defaults to the working directory. */
  current_ref?: string;
  /** Baseline the classifier compares against; defaults to the repository. */
  baseline_ref?: string;
  signal?: AbortSignal;
};

export type ChangeHistoryFilter = {
  target?: string;
  team?: string;
  since?: string;
  limit?: number;
};

export type ChangeTrackerDeps = {
  store: GovernanceStore;
  classifier: BreakingChangeClassifier;
  directory: TeamDirectory;
  impact: ImpactAnalyzer;
  governance: GovernanceService;
  reviews: ReviewWorkflow;
  notifier: Notifier;
  clock?: () => Date;
  maxRetries?: number;
  historyLimit?: number;
};

export const DEFAULT_HISTORY_LIMIT = 100;

const MIGRATION_TIME: Readonly<Record<ImpactLevel, string>> = {
  none: "0 hours",
  low: "2-4 hours",
  medium: "1-2 days",
  high: "3-5 days",
  critical: "1-2 weeks",
};

export function newChangeId(now: Date): string {
  return `CHG_${Math.floor(now.getTime() / 1000)}_${randomUUID().slice(0, 8)}`;
}

export function estimateMigrationTime(breaking: readonly BreakingChange[], impact: ImpactLevel): string {
  return breaking.length === 0 ? "0 hours" : MIGRATION_TIME[impact];
}

/** Worst of the breaking-change tier and every team impact; never below `low`. */
export function overallImpact(breaking: readonly BreakingChange[], analysis: ImpactAnalysis): ImpactLevel {
  let level = maxImpact("low", summarizeBreakingChanges(breaking).overall_impact);
  for (const t of analysis.team_impacts) level = maxImpact(level, t.impact_level);
  return level;
}

export class ChangeTracker {
  private readonly clock: () => Date;
  private readonly maxRetries: number;
  private readonly historyLimit: number;

  constructor(private readonly deps: ChangeTrackerDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.maxRetries = deps.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.historyLimit = deps.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  /**
   * Classify, analyze, decide and persist one change, then notify.
   * Detection failures surface as BreakingChangeDetectionError; store and
   * audit failures as ChangeTrackingError, after the writes already made for
   * the change are deleted again.
   */
  async trackSchemaChange(input: TrackChangeInput): Promise<ChangeRecord> {
    const { store, classifier, directory, impact, governance } = this.deps;
    const now = this.clock();
    const id = newChangeId(now);
    const owningTeam = input.owning_team ?? (await directory.findOwningTeam(input.repository));

    const breaking =
      input.change_type === "modification"
        ? await classifier.detect(input.current_ref ?? ".", input.baseline_ref ?? input.repository, {
            repository: input.repository,
            signal: input.signal,
          })
        : [];

    const analysis = await this.guard("impact analysis", id, () => impact.analyze(input.target, breaking));
    const affectedTeams = unique([...analysis.team_impacts.map((t) => t.team_name), ...(input.affected_teams ?? [])]);
    const level = overallImpact(breaking, analysis);

    const change: SchemaChange = Object.freeze({
      id,
      target: input.target,
      change_type: input.change_type,
      description: input.description ?? `${input.change_type} of ${input.target}`,
      author: input.author ?? "unknown",
      timestamp: now.toISOString(),
      repository: input.repository,
      owning_team: owningTeam,
      affected_teams: Object.freeze([...affectedTeams]),
      breaking: breaking.length > 0,
    });

    const breakingDecision = await this.guard("breaking policy", id, () =>
      governance.decideBreaking(breaking, { team: owningTeam, target: input.target }),
    );
    const reviewDecision = await this.guard("review policy", id, () => governance.decideReview(change, []));

    const teamSettings = owningTeam ? await directory.teamSettings(owningTeam) : {};
    const reviewRequired =
      breaking.length > 0 ||
      isHighImpact(level) ||
      teamSettings.require_review_all_changes === true ||
      breakingDecision.result.action === "require_approval" ||
      reviewDecision.result.action === "require_approval";

    // Everything written here is removed again if a later step fails, so a
    // change never becomes visible without its audit entries.
    const record = await this.withRollback(id, async (undo) => {
      let reviewId: string | null = null;
      let approvalStatus: ApprovalState = "not_required";
      if (reviewRequired) {
        approvalStatus = "pending";
        const reviewers = this.reviewersFor(owningTeam, affectedTeams, level, reviewDecision.result.required_approvers);
        if (reviewers.length > 0) {
          const review = await this.guard("review creation", id, () =>
            this.deps.reviews.createReviewRequest({
              target: input.target,
              reviewers,
              approval_count: isHighImpact(level) ? 2 : 1,
              description: `Review for ${input.change_type} of ${input.target}`,
              created_by: change.author,
              change_id: id,
            }),
          );
          reviewId = review.id;
          undo.push({ what: `review ${review.id}`, run: () => discard(store.reviews, review.id) });
        } else {
          console.warn(`[tracker] ${id}: review required but no reviewers could be determined`);
        }
      }

      let migrationPlanId: string | null = null;
      if (breaking.length > 0) {
        await this.guard("migration plan", id, () => impact.generateMigrationPlan(id, input.target, breaking));
        migrationPlanId = id;
        undo.push({ what: `migration plan ${id}`, run: () => discard(store.migrationPlans, id) });
      }

      const record: ChangeRecord = {
        id,
        change,
        commit_hash: input.commit_hash ?? null,
        branch: input.branch ?? null,
        files_changed: input.files_changed ?? [],
        tags: input.tags ?? [],
        breaking_changes: breaking,
        impact_level: level,
        affected_teams: affectedTeams,
        affected_services: analysis.affected_services.map((s) => s.service_name),
        migration_required: breaking.length > 0,
        review_required: reviewRequired,
        blocked: breakingDecision.result.action === "error",
        review_id: reviewId,
        approval_status: approvalStatus,
        policy: {
          review: { action: reviewDecision.result.action, reason: reviewDecision.result.reason },
          breaking: { action: breakingDecision.result.action, reason: breakingDecision.result.reason },
        },
        migration_plan_id: migrationPlanId,
        estimated_migration_time: estimateMigrationTime(breaking, level),
        notifications: [],
        created_at: now.toISOString(),
        updated_at: now.toISOString(),
      };

      await this.guard("persist change record", id, () => store.changes.compareAndSwap(id, 0, record));
      undo.push({ what: `change record ${id}`, run: () => discard(store.changes, id) });

      const audits: AuditRecord[] = [];
      if (breakingDecision.audit) audits.push(breakingDecision.audit);
      if (reviewDecision.audit) audits.push(reviewDecision.audit);
      if (breaking.length > 0) {
        audits.push(this.audit("breaking_changes_detected", record, "success", { breaking_count: breaking.length }));
      }
      audits.push(
        this.audit("schema_change", record, record.blocked ? "failure" : "success", {
          change_type: change.change_type,
          description: change.description,
          breaking: change.breaking,
          impact_level: level,
          review_id: reviewId,
        }),
      );
      for (const entry of audits) {
        await this.guard("append audit", id, () => store.appendAudit(entry));
      }
      return record;
    });

    console.info(`[tracker] Tracked schema change ${id}: ${input.target} (${input.change_type}, impact ${level})`);
    return this.notifyAffectedTeams(record, analysis);
  }

  /**
   * One payload per distinct owning or affected team. Delivery failures are
   * logged on the record and never undo the change.
   */
  async notifyAffectedTeams(
    record: ChangeRecord,
    analysis: ImpactAnalysis,
    type = "change_detected",
  ): Promise<ChangeRecord> {
    const teams = unique([...(record.change.owning_team ? [record.change.owning_team] : []), ...record.affected_teams]);
    if (teams.length === 0) return record;

    const recommendations = this.recommendationsFor(record, analysis);
    const log: NotificationLogEntry[] = [];
    for (const team of teams) {
      const payload = this.payloadFor(record, analysis, team, type, recommendations);
      try {
        await this.deps.notifier.notify(team, payload);
        log.push({ team, type, timestamp: payload.timestamp, status: "sent", error: null });
      } catch (e) {
        console.warn(`[tracker] Notification to ${team} for ${record.id} failed: ${errorMessage(e)}`);
        log.push({ team, type, timestamp: payload.timestamp, status: "failed", error: errorMessage(e) });
      }
    }

    const sent = log.filter((l) => l.status === "sent").length;
    console.info(`[tracker] Notified ${sent}/${teams.length} teams for change ${record.id}`);
    return this.update(record.id, (current) => ({
      ...current,
      notifications: [...current.notifications, ...log],
      updated_at: this.clock().toISOString(),
    }));
  }

  /** Copy the linked review's status onto the change record. */
  async syncReviewStatus(changeId: string): Promise<ChangeRecord> {
    const record = await this.getChange(changeId);
    if (!record.review_id) return record;

    const review = await this.deps.reviews.getReview(record.review_id);
    if (!review) {
      throw new ChangeTrackingError(`Review ${record.review_id} linked to ${changeId} no longer exists`, {
        change_id: changeId,
        review_id: record.review_id,
      });
    }
    if (review.status === record.approval_status) return record;

    const synced = await this.update(changeId, (current) =>
      current.approval_status === review.status
        ? null
        : { ...current, approval_status: review.status, updated_at: this.clock().toISOString() },
    );
    console.info(`[tracker] Change ${changeId} review status: ${synced.approval_status}`);
    return synced;
  }

  async getChange(changeId: string): Promise<ChangeRecord> {
    const entry = await this.deps.store.changes.get(changeId);
    if (!entry) throw changeNotFound(changeId);
    return entry.value;
  }

  /** Newest first. `team` matches the owning team or any affected team. */
  async getChangeHistory(filter: ChangeHistoryFilter = {}): Promise<ChangeRecord[]> {
    const rows = await this.deps.store.changes.list();
    return rows
      .map((r) => r.entry.value)
      .filter((r) => {
        if (filter.target && r.change.target !== filter.target) return false;
        if (filter.team && r.change.owning_team !== filter.team && !r.affected_teams.includes(filter.team)) return false;
        if (filter.since && r.created_at < filter.since) return false;
        return true;
      })
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .slice(0, filter.limit ?? this.historyLimit);
  }

  async generateChangeReport(timeframe = "7d", team: string | null = null): Promise<ChangeReport> {
    const now = this.clock();
    const changes = await this.getChangeHistory({
      team: team ?? undefined,
      since: reportSince(timeframe, now),
      limit: Number.POSITIVE_INFINITY,
    });
    return buildChangeReport(changes, { timeframe, team, now });
  }

  private reviewersFor(
    owningTeam: string | null,
    affectedTeams: readonly string[],
    level: ImpactLevel,
    policyReviewers: readonly string[],
  ): string[] {
    const reviewers: string[] = [];
    if (owningTeam) reviewers.push(`@${owningTeam}`);
    if (isHighImpact(level)) {
      for (const team of affectedTeams) if (team !== owningTeam) reviewers.push(`@${team}`);
    }
    if (reviewers.length > 0) return unique(reviewers);
    return unique(policyReviewers.filter((r) => parseReviewer(r).name.length > 0));
  }

  private recommendationsFor(record: ChangeRecord, analysis: ImpactAnalysis): string[] {
    const out = [...summarizeBreakingChanges(record.breaking_changes).recommendations, ...analysis.recommendations];
    if (record.migration_required) out.push("Coordinate migration timing with affected teams");
    if (isHighImpact(record.impact_level)) {
      out.push("Consider phased rollout to minimize impact", "Prepare rollback plan before deployment");
    }
    return unique(out);
  }

  private payloadFor(
    record: ChangeRecord,
    analysis: ImpactAnalysis,
    team: string,
    type: string,
    recommendations: string[],
  ): ChangeNotificationPayload {
    const teamImpact = analysis.team_impacts.find((t) => t.team_name === team);
    return {
      type,
      change_id: record.id,
      schema_target: record.change.target,
      change_type: record.change.change_type,
      repository: record.change.repository,
      impact_level: record.impact_level,
      team_role: team === record.change.owning_team ? "owner" : "affected",
      team_impact: teamImpact
        ? {
            impact_level: teamImpact.impact_level,
            affected_services: teamImpact.affected_services,
            required_actions: teamImpact.required_actions,
          }
        : null,
      breaking_changes_count: record.breaking_changes.length,
      migration_required: record.migration_required,
      review_required: record.review_required,
      review_id: record.review_id,
      recommendations,
      created_by: record.change.author,
      timestamp: this.clock().toISOString(),
    };
  }

  private audit(
    action: string,
    record: ChangeRecord,
    result: AuditRecord["result"],
    details: Record<string, unknown>,
  ): AuditRecord {
    return {
      action,
      target: record.change.target,
      actor: record.change.author,
      timestamp: this.clock().toISOString(),
      result,
      details: { change_id: record.id, repository: record.change.repository, team: record.change.owning_team, ...details },
    };
  }

  private async update(changeId: string, fn: (current: ChangeRecord) => ChangeRecord | null): Promise<ChangeRecord> {
    const res = await this.guard("update change record", changeId, () =>
      mutate(
        this.deps.store.changes,
        changeId,
        (current) => {
          if (!current) throw changeNotFound(changeId);
          return fn(current);
        },
        this.maxRetries,
      ),
    );
    if (!res.value) throw changeNotFound(changeId);
    return res.value;
  }

  private async withRollback<R>(changeId: string, fn: (undo: UndoStep[]) => Promise<R>): Promise<R> {
    const undo: UndoStep[] = [];
    try {
      return await fn(undo);
    } catch (e) {
      for (const step of [...undo].reverse()) {
        try {
          await step.run();
          console.info(`[tracker] ${changeId}: rolled back ${step.what}`);
        } catch (undoErr) {
          console.warn(`[tracker] ${changeId}: could not roll back ${step.what}: ${errorMessage(undoErr)}`);
        }
      }
      throw e;
    }
  }

  /** Policy and configuration errors pass through; everything else fails the change. */
  private async guard<R>(step: string, changeId: string, fn: () => Promise<R>): Promise<R> {
    try {
      return await fn();
    } catch (e) {
      if (e instanceof ChangeTrackingError || e instanceof ConfigurationError || e instanceof GovernanceError) throw e;
      const code = e instanceof GovernanceBaseError ? e.code : undefined;
      throw new ChangeTrackingError(`Failed to track change ${changeId}: ${step}: ${errorMessage(e)}`, { change_id: changeId, step, code }, e);
    }
  }
}

type UndoStep = { what: string; run: () => Promise<void> };

async function discard<T>(collection: Collection<T>, key: string): Promise<void> {
  const current = await collection.get(key);
  if (current) await collection.delete(key, current.version);
}

function changeNotFound(changeId: string): ChangeTrackingError {
  return new ChangeTrackingError(`Change ${changeId} not found`, { change_id: changeId }, undefined, "CHANGE_NOT_FOUND");
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}
