import path from "node:path";
import { BufBreakingClassifier, type BreakingChangeClassifier } from "../classifier/classifier.js";
import { loadConfig } from "../config/validator.js";
import { ImpactAnalyzer } from "../impact/service.js";
import { GovernanceService } from "../policy/service.js";
import { reviewEventNotifier } from "../review/notify.js";
import { ReviewWorkflow } from "../review/workflow.js";
import { FileStore } from "../store/file-store.js";
import type { GovernanceStore } from "../store/store.js";
import { ConfigTeamDirectory, type TeamDirectory } from "../teams/directory.js";
import { CompositeNotifier, JsonlStdoutNotifier, OutboxFileNotifier, type Notifier } from "../tracker/notifier.js";
import { ChangeTracker } from "../tracker/tracker.js";
import type { GovernanceConfig } from "../types/config.js";

/** Every service the commands need, wired from one configuration. */
export type Engine = {
  config: GovernanceConfig;
  store: GovernanceStore;
  directory: TeamDirectory;
  classifier: BreakingChangeClassifier;
  notifier: Notifier;
  impact: ImpactAnalyzer;
  governance: GovernanceService;
  reviews: ReviewWorkflow;
  tracker: ChangeTracker;
};

export type EngineDeps = {
  store: GovernanceStore;
  classifier?: BreakingChangeClassifier;
  directory?: TeamDirectory;
  notifier?: Notifier;
  clock?: () => Date;
};

/**
 * Notifier from `notification_settings`: `stdout` in the default channels
 * writes JSONL to stdout, `outbox_path` appends to a file. With neither,
 * notifications go to stdout.
 */
export function notifierFromConfig(config: GovernanceConfig, baseDir = process.cwd()): Notifier {
  const settings = config.schema_governance.notification_settings ?? {};
  const lockTimeoutMs = config.schema_governance.global_settings?.lock_timeout_ms;
  const notifiers: Notifier[] = [];
  if ((settings.default_channels ?? []).includes("stdout")) notifiers.push(new JsonlStdoutNotifier());
  if (settings.outbox_path) notifiers.push(new OutboxFileNotifier(path.resolve(baseDir, settings.outbox_path), lockTimeoutMs));
  if (notifiers.length === 0) return new JsonlStdoutNotifier();
  return notifiers.length === 1 ? notifiers[0] : new CompositeNotifier(notifiers);
}

export function createEngine(config: GovernanceConfig, deps: EngineDeps): Engine {
  const globals = config.schema_governance.global_settings ?? {};
  const clock = deps.clock;
  const maxRetries = globals.max_update_retries;
  const store = deps.store;
  const directory = deps.directory ?? new ConfigTeamDirectory(config.teams);
  const classifier = deps.classifier ?? BufBreakingClassifier.fromConfig(config.classifier);
  const notifier = deps.notifier ?? notifierFromConfig(config);

  const impact = new ImpactAnalyzer(store, { clock, maxRetries });
  const governance = new GovernanceService(store, config.schema_governance, directory, { clock });
  const reviews = new ReviewWorkflow(store, directory, { clock, maxRetries, listener: reviewEventNotifier(store, notifier) });
  const tracker = new ChangeTracker({
    store,
    classifier,
    directory,
    impact,
    governance,
    reviews,
    notifier,
    clock,
    maxRetries,
    historyLimit: globals.change_history_limit,
  });

  return { config, store, directory, classifier, notifier, impact, governance, reviews, tracker };
}

export type OpenEngineOptions = {
  configDir?: string;
  env?: string;
  /** Overrides `store_dir` from the configuration. */
  storeDir?: string;
  schemaDir?: string;
};

/** Load and validate the configuration, then open the file store it names. */
export async function openEngine(opts: OpenEngineOptions = {}): Promise<Engine> {
  const config = await loadConfig({ env: opts.env, configDir: opts.configDir, schemaDir: opts.schemaDir });
  const store = await FileStore.open(path.resolve(opts.storeDir ?? config.store_dir), {
    lockTimeoutMs: config.schema_governance.global_settings?.lock_timeout_ms,
    schemaDir: opts.schemaDir,
  });
  return createEngine(config, { store });
}
