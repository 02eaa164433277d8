import type { BreakingChangeClassifier, DetectOptions } from "../src/classifier/classifier.js";
import { createEngine, type Engine } from "../src/commands/context.js";
import { MemoryStore } from "../src/store/memory-store.js";
import type { Notifier } from "../src/tracker/notifier.js";
import type { NotificationPayload } from "../src/types/change.js";
import type { GovernanceConfig, GovernanceSection, TeamConfig } from "../src/types/config.js";
import type { DependencyStrength, ServiceDependency } from "../src/types/dependency.js";
import type { BreakingChange, SchemaChange } from "../src/types/governance.js";

export const T0 = "2026-03-02T10:00:00.000Z";

/** Clock that advances one second per call, starting at `start`. */
export function steppingClock(start = T0): () => Date {
  let ms = Date.parse(start);
  return () => {
    const d = new Date(ms);
    ms += 1000;
    return d;
  };
}

export const fixedClock = (iso = T0) => () => new Date(iso);

export const TEAMS: Record<string, TeamConfig> = {
  payments: {
    members: [
      { username: "alice", role: "maintainer" },
      { username: "bob", role: "admin" },
      { username: "carol", role: "contributor" },
    ],
    repositories: ["github.com/acme/payments*"],
  },
  orders: {
    members: [
      { username: "dave", role: "maintainer" },
      { username: "erin", role: "viewer" },
    ],
    repositories: ["github.com/acme/orders"],
    settings: { require_review_all_changes: true },
  },
};

export function section(overrides: Partial<GovernanceSection> = {}): GovernanceSection {
  return {
    review_policies: {
      default: { required_reviewers: [], approval_count: 1, auto_approve_minor: false },
    },
    breaking_change_policies: { default: "error" },
    team_overrides: {},
    ...overrides,
  };
}

export function config(overrides: Partial<GovernanceSection> = {}, teams: Record<string, TeamConfig> = TEAMS): GovernanceConfig {
  return {
    schema_version: "1.0.0",
    store_dir: ".schemagov/test-store",
    schema_governance: section(overrides),
    teams,
  };
}

export function breaking(fields: Partial<BreakingChange> = {}): BreakingChange {
  return {
    type: "FIELD_NO_DELETE",
    description: 'Previously present field "2" with name "amount" on message "Payment" was deleted.',
    location: "proto/acme/payments/v1/payment.proto:12",
    impact: "high",
    repository: "github.com/acme/payments",
    ...fields,
  };
}

export function schemaChange(fields: Partial<SchemaChange> = {}): SchemaChange {
  return {
    id: "CHG_1",
    target: "buf.build/acme/payments",
    change_type: "modification",
    description: "Add refund reason",
    author: "alice",
    timestamp: T0,
    repository: "github.com/acme/payments",
    owning_team: "payments",
    affected_teams: [],
    breaking: false,
    ...fields,
  };
}

/** Returns a fixed list, or throws `error` when set. */
export class FakeClassifier implements BreakingChangeClassifier {
  calls: Array<{ currentRef: string; baselineRef: string; opts?: DetectOptions }> = [];

  constructor(
    public result: BreakingChange[] = [],
    public error: Error | null = null,
  ) {}

  async detect(currentRef: string, baselineRef: string, opts?: DetectOptions): Promise<BreakingChange[]> {
    this.calls.push({ currentRef, baselineRef, opts });
    if (this.error) throw this.error;
    return this.result;
  }
}

export class RecordingNotifier implements Notifier {
  sent: Array<{ team: string; payload: NotificationPayload }> = [];

  constructor(private readonly failFor: ReadonlySet<string> = new Set()) {}

  async notify(team: string, payload: NotificationPayload): Promise<void> {
    if (this.failFor.has(team)) throw new Error(`channel for ${team} unavailable`);
    this.sent.push({ team, payload });
  }
}

export function memoryEngine(
  opts: {
    overrides?: Partial<GovernanceSection>;
    classifier?: BreakingChangeClassifier;
    notifier?: Notifier;
    store?: MemoryStore;
  } = {},
): Engine & { store: MemoryStore } {
  const store = opts.store ?? new MemoryStore();
  const engine = createEngine(config(opts.overrides), {
    store,
    classifier: opts.classifier ?? new FakeClassifier(),
    notifier: opts.notifier ?? new RecordingNotifier(),
    clock: steppingClock(),
  });
  return { ...engine, store };
}

export function dependency(name: string, strength: DependencyStrength, team: string | null = null): ServiceDependency {
  return {
    service_name: name,
    service_repository: `github.com/acme/${name}`,
    dependency_type: "direct",
    usage_pattern: "consumer",
    strength,
    team_owner: team,
    schema_files: [],
    migration_complexity: "medium",
    contact: null,
    registered_at: T0,
  };
}
