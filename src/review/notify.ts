import { errorMessage } from "../errors.js";
import type { GovernanceStore } from "../store/store.js";
import type { Notifier } from "../tracker/notifier.js";
import type { ReviewNotificationPayload } from "../types/change.js";
import type { ReviewListener, ReviewNotification } from "./workflow.js";

/**
 * Forwards review events to the notifier. A review opened for a tracked
 * change reaches that change's owning and affected teams; any other review
 * reaches the teams it names. The tracker's own change notification already
 * announces the reviews it opens, so those `review_requested` events are
 * skipped.
 */
export function reviewEventNotifier(store: GovernanceStore, notifier: Notifier): ReviewListener {
  return async (event) => {
    if (event.event_type === "review_requested" && event.change_id) return;

    const teams = await teamsFor(store, event);
    if (teams.length === 0) return;

    const payload: ReviewNotificationPayload = {
      type: event.event_type,
      review_id: event.review_id,
      change_id: event.change_id,
      schema_target: event.target,
      reviewers: event.reviewers,
      actor: event.actor,
      reason: event.reason,
      timestamp: event.timestamp,
    };
    for (const team of teams) {
      try {
        await notifier.notify(team, payload);
      } catch (e) {
        console.warn(`[review] ${event.event_type} notification to ${team} for ${event.review_id} failed: ${errorMessage(e)}`);
      }
    }
  };
}

async function teamsFor(store: GovernanceStore, event: ReviewNotification): Promise<string[]> {
  if (event.change_id) {
    const change = await store.changes.get(event.change_id);
    if (change) {
      const owning = change.value.change.owning_team;
      return [...new Set([...(owning ? [owning] : []), ...change.value.affected_teams])];
    }
  }
  return event.teams;
}
