import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { withFsLock } from "../store/fs-lock.js";
import type { NotificationPayload } from "../types/change.js";

/**
 * Accept-for-delivery: resolving means the notification was handed off,
 * not that anyone read it. Retries belong to the implementation.
 */
export interface Notifier {
  notify(team: string, payload: NotificationPayload): Promise<void>;
}

type Line = { team: string; payload: NotificationPayload };

/** One JSON object per line on stdout (or any writer). */
export class JsonlStdoutNotifier implements Notifier {
  constructor(private readonly write: (line: string) => void = (line) => process.stdout.write(line)) {}

  async notify(team: string, payload: NotificationPayload): Promise<void> {
    const line: Line = { team, payload };
    this.write(JSON.stringify(line) + "\n");
  }
}

/** Appends to a JSONL outbox file that a delivery process drains. */
export class OutboxFileNotifier implements Notifier {
  constructor(
    private readonly file: string,
    private readonly lockTimeoutMs = 5000,
  ) {}

  async notify(team: string, payload: NotificationPayload): Promise<void> {
    const line: Line = { team, payload };
    await mkdir(path.dirname(this.file), { recursive: true });
    await withFsLock(`${this.file}.lock`, this.lockTimeoutMs, () => appendFile(this.file, JSON.stringify(line) + "\n", "utf8"));
  }
}

/** Fans out to every notifier; the first failure is rethrown after all have run. */
export class CompositeNotifier implements Notifier {
  constructor(private readonly notifiers: readonly Notifier[]) {}

  async notify(team: string, payload: NotificationPayload): Promise<void> {
    const results = await Promise.allSettled(this.notifiers.map((n) => n.notify(team, payload)));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
    if (failed) throw failed.reason;
  }
}
