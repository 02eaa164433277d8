import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { minimatch } from "minimatch";
import { BreakingChangeDetectionError, ClassifierTimeoutError, errorMessage } from "../errors.js";
import type { ClassifierConfig } from "../types/config.js";
import type { BreakingChange } from "../types/governance.js";
import { parseBufJsonLines, parseBufJunit, type RawViolation } from "./buf-output.js";
import { classifyViolation, loadBreakingRules, type BreakingRuleTable } from "./severity.js";

const pExecFile = promisify(execFile);

export const DEFAULT_TIMEOUT_MS = 60000;

/** buf exits 100 when it found violations and ran otherwise cleanly. */
const VIOLATIONS_FOUND_EXIT = 100;

export type DetectOptions = {
  repository?: string;
  cwd?: string;
  signal?: AbortSignal;
};

export interface BreakingChangeClassifier {
  /** Deterministic for identical inputs. Throws BreakingChangeDetectionError on tool failure. */
  detect(currentRef: string, baselineRef: string, opts?: DetectOptions): Promise<BreakingChange[]>;
}

export type CommandResult = { exitCode: number; stdout: string; stderr: string };

export type CommandRunner = (
  command: string,
  args: string[],
  opts: { cwd?: string; signal: AbortSignal },
) => Promise<CommandResult>;

function isExitFailure(e: unknown): e is { code: number; stdout: string; stderr: string } {
  return (
    typeof e === "object" &&
    e !== null &&
    "code" in e &&
    typeof e.code === "number" &&
    "stdout" in e &&
    typeof e.stdout === "string" &&
    "stderr" in e &&
    typeof e.stderr === "string"
  );
}

/** Runs the command; a non-zero exit resolves, spawn failures and aborts reject. */
export const execFileRunner: CommandRunner = async (command, args, opts) => {
  try {
    const { stdout, stderr } = await pExecFile(command, args, {
      cwd: opts.cwd,
      signal: opts.signal,
      maxBuffer: 16 * 1024 * 1024,
    });
    return { exitCode: 0, stdout, stderr };
  } catch (e) {
    if (isExitFailure(e)) return { exitCode: e.code, stdout: e.stdout, stderr: e.stderr };
    throw e;
  }
};

export type BufClassifierOptions = {
  command?: string;
  timeoutMs?: number;
  errorFormat?: "json" | "junit";
  ignorePatterns?: string[];
  runner?: CommandRunner;
  rules?: BreakingRuleTable;
};

/**
 * Breaking change classifier backed by `buf breaking`.
 * The detector runs under a bounded timeout; the caller's signal aborts it too.
 */
export class BufBreakingClassifier implements BreakingChangeClassifier {
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly errorFormat: "json" | "junit";
  private readonly ignorePatterns: string[];
  private readonly runner: CommandRunner;
  private readonly rules: BreakingRuleTable;

  constructor(opts: BufClassifierOptions = {}) {
    this.command = opts.command ?? "buf";
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.errorFormat = opts.errorFormat ?? "json";
    this.ignorePatterns = opts.ignorePatterns ?? [];
    this.runner = opts.runner ?? execFileRunner;
    this.rules = opts.rules ?? loadBreakingRules();
  }

  static fromConfig(config: ClassifierConfig | undefined, runner?: CommandRunner): BufBreakingClassifier {
    return new BufBreakingClassifier({
      command: config?.command,
      timeoutMs: config?.timeout_ms,
      errorFormat: config?.error_format,
      ignorePatterns: config?.ignore_patterns,
      runner,
    });
  }

  async detect(currentRef: string, baselineRef: string, opts: DetectOptions = {}): Promise<BreakingChange[]> {
    const args = ["breaking", currentRef, "--against", baselineRef, "--error-format", this.errorFormat];
    const result = await this.runWithTimeout(args, opts);

    if (result.exitCode !== 0 && result.exitCode !== VIOLATIONS_FOUND_EXIT) {
      throw new BreakingChangeDetectionError(`${this.command} breaking exited with code ${result.exitCode}`, {
        exit_code: result.exitCode,
        stderr: result.stderr.trim().slice(0, 2000),
      });
    }
    if (result.stderr.trim().length > 0) {
      console.warn(`[classifier] ${this.command} stderr: ${result.stderr.trim()}`);
    }

    const raw = this.errorFormat === "junit" ? parseBufJunit(result.stdout) : parseBufJsonLines(result.stdout);
    if (result.exitCode === VIOLATIONS_FOUND_EXIT && raw.length === 0) {
      throw new BreakingChangeDetectionError(`${this.command} reported violations but printed none`, {
        exit_code: result.exitCode,
      });
    }

    const repository = opts.repository ?? currentRef;
    return this.withoutIgnored(raw).map((v) => classifyViolation(v, repository, this.rules));
  }

  private withoutIgnored(raw: RawViolation[]): RawViolation[] {
    if (this.ignorePatterns.length === 0) return raw;
    return raw.filter((v) => !this.ignorePatterns.some((p) => minimatch(v.path, p)));
  }

  private async runWithTimeout(args: string[], opts: DetectOptions): Promise<CommandResult> {
    if (opts.signal?.aborted) {
      throw new BreakingChangeDetectionError("Breaking change detection cancelled", {}, opts.signal.reason, "DETECTION_CANCELLED");
    }
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    opts.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      return await this.runner(this.command, args, { cwd: opts.cwd, signal: controller.signal });
    } catch (e) {
      if (timedOut) throw new ClassifierTimeoutError(this.timeoutMs);
      if (controller.signal.aborted) {
        throw new BreakingChangeDetectionError("Breaking change detection cancelled", {}, e, "DETECTION_CANCELLED");
      }
      throw new BreakingChangeDetectionError(`Failed to run ${this.command}: ${errorMessage(e)}`, { command: this.command }, e);
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
