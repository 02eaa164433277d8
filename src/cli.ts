#!/usr/bin/env node

import { Command } from "commander";
import { COMMENT_TYPES, approveReview, cancelReview, commentOnReview, createReview, listReviews, rejectReview, reviewStatus, showReview } from "./commands/review.js";
import { csv, oneOf, positiveInt, requireOneOf } from "./commands/args.js";
import { openEngine, type Engine } from "./commands/context.js";
import {
  COMPLEXITIES,
  DEPENDENCY_KINDS,
  STRENGTHS,
  USAGE_PATTERNS,
  dependencyGraph,
  describeService,
  impactAnalysis,
  migrationPlan,
  registerDependency,
  registerService,
} from "./commands/deps.js";
import { EXIT, type ExitCode } from "./commands/exit-codes.js";
import { approveBreaking, checkChange, compliance, detectBreaking, policyExitCode } from "./commands/policy.js";
import { changeReport, migrationGuide } from "./commands/report.js";
import { failure, type CommandResult } from "./commands/result.js";
import { CHANGE_TYPES, history, showChange, track, trackExitCode } from "./commands/track.js";
import { validateAll } from "./commands/validate.js";
import { GitOperations } from "./git/operations.js";
import type { ChangeRecord } from "./types/change.js";
import type { PolicyResult } from "./types/governance.js";
import type { ReviewRequest } from "./types/review.js";

type Format = "human" | "jsonl";
type CommonOpts = { config: string; env?: string; store?: string; format: Format };

const program = new Command();

program
  .name("schemagov")
  .description("Schema change governance: breaking-change policy, impact analysis and reviews")
  .version("0.1.0");

function common(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory", "config")
    .option("--env <name>", "Config layer merged over base.yaml")
    .option("--store <path>", "Store directory (default: store_dir from config)")
    .option("--format <format>", "Output format: human|jsonl", "human");
}

function fail(format: Format, res: { error: { code: string; message: string }; exitCode: ExitCode }): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code: res.error.code, message: res.error.message }) + "\n");
  } else {
    console.error(res.error.message);
  }
  process.exit(res.exitCode);
}

/** Print the value (or one JSONL line per item for lists) and exit with `exitCode`. */
function emit<T>(format: Format, res: CommandResult<T>, human: (value: T) => string, exitCode?: (value: T) => ExitCode): void {
  if (!res.ok) fail(format, res);
  const value = res.value;
  if (format === "jsonl") {
    const items: unknown[] = Array.isArray(value) ? value : [value];
    for (const item of items) process.stdout.write(JSON.stringify(item) + "\n");
  } else {
    console.log(human(value));
  }
  const code = exitCode ? exitCode(value) : EXIT.SUCCESS;
  if (code !== EXIT.SUCCESS) process.exit(code);
}

async function engineFor(opts: CommonOpts): Promise<Engine> {
  try {
    return await openEngine({ configDir: opts.config, env: opts.env, storeDir: opts.store });
  } catch (e) {
    fail(opts.format, failure(e));
  }
}

/** Argument errors raised while parsing flags go out like any other failure. */
function parsed<T>(format: Format, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    fail(format, failure(e));
  }
}

const pretty = (value: unknown): string => JSON.stringify(value, null, 2);

function describeChange(r: ChangeRecord): string {
  const lines = [
    `Change ${r.id}: ${r.change.change_type} of ${r.change.target} (${r.change.repository})`,
    `  impact: ${r.impact_level}  breaking: ${r.breaking_changes.length}  migration: ${r.estimated_migration_time}`,
    `  breaking policy: ${r.policy.breaking.action} (${r.policy.breaking.reason})`,
    `  review: ${r.review_id ?? "none"}  status: ${r.approval_status}`,
  ];
  if (r.affected_teams.length > 0) lines.push(`  affected teams: ${r.affected_teams.join(", ")}`);
  if (r.blocked) lines.push("  BLOCKED by breaking change policy");
  return lines.join("\n");
}

function describeReview(r: ReviewRequest): string {
  return `${r.id}  ${r.status}  ${r.target}  ${r.approvals.length}/${r.approval_count}  reviewers: ${r.reviewers.join(", ")}`;
}

function describePolicy(label: string, p: PolicyResult): string {
  const lines = [`${label}: ${p.action} (${p.reason})`];
  for (const v of p.violations) lines.push(`  - ${v}`);
  return lines.join("\n");
}

// --- validation ---

program
  .command("validate")
  .description("Validate config and (optionally) store records")
  .option("--config <path>", "Path to config directory", "config")
  .option("--env <name>", "Config layer merged over base.yaml")
  .option("--store <path>", "Store directory to validate")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: CommonOpts) => {
    const res = await validateAll({ configDir: opts.config, env: opts.env, storeDir: opts.store });
    const diagnostics = res.ok ? res.warnings : res.errors;

    if (opts.format === "jsonl") {
      for (const d of diagnostics) process.stdout.write(JSON.stringify(d) + "\n");
    } else {
      for (const d of diagnostics) console.error(`${d.level}: ${d.message}`);
    }
    if (!res.ok) process.exit(EXIT.CONFIG_INVALID);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

// --- change tracking ---

common(
  program
    .command("track")
    .description("Track a schema change: classify, analyze impact, apply policy, request review")
    .argument("<target>", "Schema target, e.g. buf.build/acme/payments")
    .requiredOption("--type <type>", "Change type: addition|modification|removal")
    .requiredOption("--repository <repo>", "Repository the change lives in")
    .option("--author <name>", "Change author")
    .option("--description <text>", "Change description")
    .option("--team <name>", "Owning team (default: looked up from the repository)")
    .option("--affected-teams <list>", "Comma-separated teams to notify")
    .option("--tags <list>", "Comma-separated tags")
    .option("--input <ref>", "Classifier input (default: .)")
    .option("--against <ref>", "Classifier baseline (default: the repository)")
    .option("--git-base <ref>", "Base ref for the changed .proto file list")
    .option("--no-git", "Do not read commit and branch from git"),
).action(
  async (
    target: string,
    opts: CommonOpts & {
      type: string;
      repository: string;
      author?: string;
      description?: string;
      team?: string;
      affectedTeams?: string;
      tags?: string;
      input?: string;
      against?: string;
      gitBase?: string;
      git: boolean;
    },
  ) => {
    const changeType = parsed(opts.format, () => requireOneOf("--type", CHANGE_TYPES, opts.type));
    const engine = await engineFor(opts);
    const res = await track(engine, {
      target,
      changeType,
      repository: opts.repository,
      author: opts.author,
      description: opts.description,
      team: opts.team,
      affectedTeams: csv(opts.affectedTeams),
      tags: csv(opts.tags),
      input: opts.input,
      against: opts.against,
      git: opts.git ? new GitOperations(process.cwd()) : null,
      gitBase: opts.gitBase,
    });
    emit(opts.format, res, describeChange, trackExitCode);
  },
);

common(
  program
    .command("show")
    .description("Show a tracked change")
    .argument("<change-id>", "Change id")
    .option("--sync", "Refresh the approval status from the linked review first"),
).action(async (changeId: string, opts: CommonOpts & { sync?: boolean }) => {
  const engine = await engineFor(opts);
  emit(opts.format, await showChange(engine, changeId, opts.sync), describeChange);
});

common(
  program
    .command("history")
    .description("List tracked changes, newest first")
    .option("--target <target>", "Only changes to this schema target")
    .option("--team <name>", "Only changes owned by or affecting this team")
    .option("--since <iso>", "Only changes created at or after this time")
    .option("--limit <n>", "Maximum number of changes"),
).action(async (opts: CommonOpts & { target?: string; team?: string; since?: string; limit?: string }) => {
  const limit = parsed(opts.format, () => positiveInt("--limit", opts.limit));
  const engine = await engineFor(opts);
  const res = await history(engine, { target: opts.target, team: opts.team, since: opts.since, limit });
  emit(opts.format, res, (list) =>
    list.length === 0
      ? "No changes found."
      : list.map((r) => `${r.id}  ${r.created_at}  ${r.change.target}  ${r.impact_level}  ${r.approval_status}`).join("\n"),
  );
});

common(
  program
    .command("report")
    .description("Change activity report")
    .option("--timeframe <window>", "1d|7d|30d", "7d")
    .option("--team <name>", "Only changes owned by or affecting this team"),
).action(async (opts: CommonOpts & { timeframe: string; team?: string }) => {
  const engine = await engineFor(opts);
  emit(opts.format, await changeReport(engine, { timeframe: opts.timeframe, team: opts.team }), pretty);
});

common(
  program.command("guide").description("Markdown migration guide for a tracked change").argument("<change-id>", "Change id"),
).action(async (changeId: string, opts: CommonOpts) => {
  const engine = await engineFor(opts);
  emit(opts.format, await migrationGuide(engine, changeId), (g) => g.guide.trimEnd());
});

// --- reviews ---

const review = program.command("review").description("Review requests");

common(
  review
    .command("create")
    .description("Create a review request")
    .argument("<target>", "Schema target under review")
    .requiredOption("--reviewers <list>", "Comma-separated users and @teams")
    .option("--approvals <n>", "Approvals required", "1")
    .option("--description <text>", "Description")
    .option("--by <user>", "Requested by")
    .option("--change <id>", "Tracked change this review belongs to"),
).action(
  async (
    target: string,
    opts: CommonOpts & { reviewers: string; approvals: string; description?: string; by?: string; change?: string },
  ) => {
    const approvals = parsed(opts.format, () => positiveInt("--approvals", opts.approvals));
    const engine = await engineFor(opts);
    const res = await createReview(engine, {
      target,
      reviewers: csv(opts.reviewers) ?? [],
      approvals,
      description: opts.description,
      by: opts.by,
      changeId: opts.change,
    });
    emit(opts.format, res, describeReview);
  },
);

common(
  review
    .command("approve")
    .description("Approve a review request")
    .argument("<review-id>", "Review id")
    .requiredOption("--reviewer <user>", "Approving user")
    .option("--comment <text>", "Approval comment"),
).action(async (id: string, opts: CommonOpts & { reviewer: string; comment?: string }) => {
  const engine = await engineFor(opts);
  const res = await approveReview(engine, { id, reviewer: opts.reviewer, comment: opts.comment });
  emit(opts.format, res, ({ review: r, recorded }) => (recorded ? describeReview(r) : `${opts.reviewer} already approved ${r.id}`));
});

common(
  review
    .command("reject")
    .description("Reject a review request")
    .argument("<review-id>", "Review id")
    .requiredOption("--reviewer <user>", "Rejecting user")
    .requiredOption("--reason <text>", "Reason"),
).action(async (id: string, opts: CommonOpts & { reviewer: string; reason: string }) => {
  const engine = await engineFor(opts);
  emit(opts.format, await rejectReview(engine, { id, reviewer: opts.reviewer, reason: opts.reason }), describeReview);
});

common(
  review
    .command("cancel")
    .description("Cancel a review request")
    .argument("<review-id>", "Review id")
    .requiredOption("--by <user>", "Cancelling user")
    .option("--reason <text>", "Reason"),
).action(async (id: string, opts: CommonOpts & { by: string; reason?: string }) => {
  const engine = await engineFor(opts);
  emit(opts.format, await cancelReview(engine, { id, actor: opts.by, reason: opts.reason }), describeReview);
});

common(
  review
    .command("comment")
    .description("Comment on a review request")
    .argument("<review-id>", "Review id")
    .requiredOption("--author <user>", "Comment author")
    .requiredOption("--content <text>", "Comment text")
    .option("--type <type>", "general|approval|rejection|question", "general"),
).action(async (id: string, opts: CommonOpts & { author: string; content: string; type: string }) => {
  const type = parsed(opts.format, () => oneOf("--type", COMMENT_TYPES, opts.type));
  const engine = await engineFor(opts);
  const res = await commentOnReview(engine, { id, author: opts.author, content: opts.content, type });
  emit(opts.format, res, (c) => `Comment ${c.id} added to ${id}`);
});

common(
  review.command("status").description("Approval status of a review").argument("<review-id>", "Review id"),
).action(async (id: string, opts: CommonOpts) => {
  const engine = await engineFor(opts);
  emit(opts.format, await reviewStatus(engine, id), (s) =>
    [
      `${s.review_id}: ${s.status} (${s.approval_count}/${s.required_count})`,
      `  approvers: ${s.approvers.join(", ") || "none"}`,
      `  pending: ${s.pending_reviewers.join(", ") || "none"}`,
    ].join("\n"),
  );
});

common(
  review.command("list").description("Pending review requests").option("--reviewer <user>", "Only reviews this user can approve"),
).action(async (opts: CommonOpts & { reviewer?: string }) => {
  const engine = await engineFor(opts);
  emit(opts.format, await listReviews(engine, opts.reviewer), (list) =>
    list.length === 0 ? "No pending reviews." : list.map(describeReview).join("\n"),
  );
});

common(
  review.command("show").description("Review request with comments").argument("<review-id>", "Review id"),
).action(async (id: string, opts: CommonOpts) => {
  const engine = await engineFor(opts);
  emit(opts.format, await showReview(engine, id), pretty);
});

// --- policy ---

const policy = program.command("policy").description("Governance policy checks and approvals");

common(
  policy.command("check").description("Re-evaluate policies for a tracked change").argument("<change-id>", "Change id"),
).action(async (changeId: string, opts: CommonOpts) => {
  const engine = await engineFor(opts);
  emit(
    opts.format,
    await checkChange(engine, changeId),
    (c) => [describePolicy("breaking", c.breaking), describePolicy("review", c.review)].join("\n"),
    (c) => policyExitCode(c.breaking, c.review),
  );
});

common(
  policy
    .command("detect")
    .description("Run breaking change detection and apply the breaking change policy")
    .requiredOption("--repository <repo>", "Repository being checked")
    .option("--input <ref>", "Classifier input", ".")
    .option("--against <ref>", "Classifier baseline (default: the repository)")
    .option("--target <target>", "Schema target recorded in the audit trail")
    .option("--team <name>", "Owning team (default: looked up from the repository)")
    .option("--policy <value>", "Policy to apply instead of the configured one"),
).action(
  async (opts: CommonOpts & { repository: string; input: string; against?: string; target?: string; team?: string; policy?: string }) => {
    const engine = await engineFor(opts);
    const res = await detectBreaking(engine, {
      input: opts.input,
      against: opts.against ?? opts.repository,
      repository: opts.repository,
      target: opts.target,
      team: opts.team,
      policy: opts.policy,
    });
    emit(
      opts.format,
      res,
      (d) =>
        [
          `${d.breaking_changes.length} breaking changes (overall impact: ${d.summary.overall_impact})`,
          ...d.breaking_changes.map((c) => `  ${c.impact}  ${c.type}  ${c.location}: ${c.description}`),
          describePolicy("policy", d.policy),
        ].join("\n"),
      (d) => policyExitCode(d.policy),
    );
  },
);

common(
  policy
    .command("approve-breaking")
    .description("Approve breaking changes of a tracked change, or one location")
    .requiredOption("--reviewer <user>", "Approving user")
    .option("--change <id>", "Approve every breaking location of this change")
    .option("--target <target>", "Schema target")
    .option("--repository <repo>", "Repository")
    .option("--location <loc>", "Location (default: the target)"),
).action(
  async (opts: CommonOpts & { reviewer: string; change?: string; target?: string; repository?: string; location?: string }) => {
    const engine = await engineFor(opts);
    const res = await approveBreaking(engine, {
      reviewer: opts.reviewer,
      changeId: opts.change,
      target: opts.target,
      repository: opts.repository,
      location: opts.location,
    });
    emit(opts.format, res, (list) =>
      list
        .map(({ approval, created }) =>
          created
            ? `Approved ${approval.repository}:${approval.location}`
            : `${approval.repository}:${approval.location} already approved by ${approval.approver}`,
        )
        .join("\n"),
    );
  },
);

common(
  policy
    .command("compliance")
    .description("Compliance summary of the audit trail")
    .option("--timeframe <window>", "e.g. 7d, 12h", "7d")
    .option("--team <name>", "Only audit records for this team"),
).action(async (opts: CommonOpts & { timeframe: string; team?: string }) => {
  const engine = await engineFor(opts);
  emit(opts.format, await compliance(engine, { timeframe: opts.timeframe, team: opts.team }), pretty);
});

// --- dependencies ---

const deps = program.command("deps").description("Dependency registry and impact analysis");

common(
  deps
    .command("register")
    .description("Register a service as a dependent of a schema target")
    .argument("<target>", "Schema target")
    .requiredOption("--service <name>", "Dependent service")
    .option("--repository <repo>", "Service repository")
    .option("--strength <s>", "weak|medium|strong|critical", "medium")
    .option("--kind <k>", "direct|transitive|optional", "direct")
    .option("--usage <u>", "consumer|producer|both", "consumer")
    .option("--team <name>", "Owning team")
    .option("--files <list>", "Comma-separated schema files used")
    .option("--complexity <c>", "Migration complexity: low|medium|high|critical", "medium")
    .option("--contact <contact>", "Contact"),
).action(
  async (
    target: string,
    opts: CommonOpts & {
      service: string;
      repository?: string;
      strength: string;
      kind: string;
      usage: string;
      team?: string;
      files?: string;
      complexity: string;
      contact?: string;
    },
  ) => {
    const input = parsed(opts.format, () => ({
      service_name: opts.service,
      service_repository: opts.repository,
      strength: oneOf("--strength", STRENGTHS, opts.strength),
      dependency_type: oneOf("--kind", DEPENDENCY_KINDS, opts.kind),
      usage_pattern: oneOf("--usage", USAGE_PATTERNS, opts.usage),
      team_owner: opts.team ?? null,
      schema_files: csv(opts.files),
      migration_complexity: oneOf("--complexity", COMPLEXITIES, opts.complexity),
      contact: opts.contact ?? null,
    }));
    const engine = await engineFor(opts);
    emit(opts.format, await registerDependency(engine, target, input), (d) => `Registered ${d.service_name} -> ${target} (${d.strength})`);
  },
);

common(
  deps
    .command("register-service")
    .description("Add or update a service catalog entry")
    .argument("<service>", "Service name")
    .option("--system <name>", "System the service belongs to")
    .option("--team <name>", "Owning team")
    .option("--schemas <list>", "Comma-separated schema targets the service consumes"),
).action(async (service: string, opts: CommonOpts & { system?: string; team?: string; schemas?: string }) => {
  const engine = await engineFor(opts);
  const res = await registerService(engine, service, {
    system: opts.system,
    team_owner: opts.team,
    schema_dependencies: csv(opts.schemas),
  });
  emit(opts.format, res, (e) => `Registered service ${e.service_name} (system: ${e.system})`);
});

common(
  deps.command("service").description("Catalog entry and consumed schemas of a service").argument("<service>", "Service name"),
).action(async (service: string, opts: CommonOpts) => {
  const engine = await engineFor(opts);
  emit(opts.format, await describeService(engine, service), pretty);
});

common(
  deps.command("graph").description("Dependency graph of a schema target").argument("<target>", "Schema target"),
).action(async (target: string, opts: CommonOpts) => {
  const engine = await engineFor(opts);
  emit(opts.format, await dependencyGraph(engine, target), (g) =>
    [
      `${g.schema_target}: ${g.metadata.total_affected_services} services, ${g.metadata.teams_affected} teams, complexity ${g.metadata.complexity_score}`,
      ...g.direct_dependencies.map((d) => `  direct      ${d.strength.padEnd(8)} ${d.service_name}`),
      ...g.transitive_dependencies.map((d) => `  transitive  ${d.strength.padEnd(8)} ${d.service_name}`),
    ].join("\n"),
  );
});

common(
  deps
    .command("impact")
    .description("Impact analysis of a schema target")
    .argument("<target>", "Schema target")
    .option("--change <id>", "Use the breaking changes of this tracked change"),
).action(async (target: string, opts: CommonOpts & { change?: string }) => {
  const engine = await engineFor(opts);
  emit(opts.format, await impactAnalysis(engine, target, opts.change), pretty);
});

common(
  deps
    .command("plan")
    .description("Migration plan of a tracked change (generated on first request)")
    .argument("<change-id>", "Change id")
    .option("--regenerate", "Rebuild from the current registry"),
).action(async (changeId: string, opts: CommonOpts & { regenerate?: boolean }) => {
  const engine = await engineFor(opts);
  emit(opts.format, await migrationPlan(engine, { changeId, regenerate: opts.regenerate }), (p) =>
    [
      `Migration plan for ${p.change_id}: ${p.strategy} (risk: ${p.risk_assessment.overall_risk_level})`,
      ...p.phases.map((ph) => `  ${ph.phase}. ${ph.name}  ${ph.duration}  ${ph.services.join(", ")}`),
      `  migration window: ${p.timeline.migration_window}`,
    ].join("\n"),
  );
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INTERNAL);
});
