import { minimatch } from "minimatch";
import type { TeamConfig, TeamMember, TeamRole, TeamSettings } from "../types/config.js";
import type { Reviewer } from "../types/review.js";

/** Roles whose members may approve on behalf of a team. */
export const QUALIFYING_ROLES: ReadonlySet<TeamRole> = new Set<TeamRole>(["maintainer", "admin"]);

export interface TeamDirectory {
  /** Current members, or null when the team is unknown. */
  resolveTeam(name: string): Promise<TeamMember[] | null>;
  findOwningTeam(repository: string): Promise<string | null>;
  teamSettings(name: string): Promise<TeamSettings>;
}

/** Team directory backed by the `teams` section of the configuration. */
export class ConfigTeamDirectory implements TeamDirectory {
  constructor(private readonly teams: Record<string, TeamConfig> = {}) {}

  async resolveTeam(name: string): Promise<TeamMember[] | null> {
    const team = this.find(name);
    return team ? team.members.map((m) => ({ ...m })) : null;
  }

  /** First team (in configuration order) with a repository pattern matching `repository`. */
  async findOwningTeam(repository: string): Promise<string | null> {
    for (const [name, team] of Object.entries(this.teams)) {
      if ((team.repositories ?? []).some((pattern) => minimatch(repository, pattern))) return name;
    }
    return null;
  }

  async teamSettings(name: string): Promise<TeamSettings> {
    return { ...(this.find(name)?.settings ?? {}) };
  }

  private find(name: string): TeamConfig | undefined {
    return Object.hasOwn(this.teams, name) ? this.teams[name] : undefined;
  }
}

/** `@platform` → team reference, anything else → individual. */
export function parseReviewer(entry: string): Reviewer {
  const trimmed = entry.trim();
  return trimmed.startsWith("@") ? { kind: "team", name: trimmed.slice(1) } : { kind: "individual", name: trimmed };
}

export function formatReviewer(reviewer: Reviewer): string {
  return reviewer.kind === "team" ? `@${reviewer.name}` : reviewer.name;
}

/** Usernames of a team's members with a qualifying role, or null for an unknown team. */
export async function qualifyingMembers(directory: TeamDirectory, team: string): Promise<string[] | null> {
  const members = await directory.resolveTeam(team);
  if (!members) return null;
  return members.filter((m) => QUALIFYING_ROLES.has(m.role)).map((m) => m.username);
}

/** True when `username` satisfies at least one of `reviewers`, resolving teams now. */
export async function isAuthorizedReviewer(
  directory: TeamDirectory,
  username: string,
  reviewers: readonly Reviewer[],
): Promise<boolean> {
  for (const reviewer of reviewers) {
    if (reviewer.kind === "individual") {
      if (reviewer.name === username) return true;
      continue;
    }
    const members = await qualifyingMembers(directory, reviewer.name);
    if (members?.includes(username)) return true;
  }
  return false;
}
