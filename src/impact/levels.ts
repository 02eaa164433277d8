import type { DependencyStrength } from "../types/dependency.js";
import type { ImpactLevel } from "../types/governance.js";

export const IMPACT_RANK: Readonly<Record<ImpactLevel, number>> = { none: 0, low: 1, medium: 2, high: 3, critical: 4 };

export const STRENGTH_SCORE: Readonly<Record<DependencyStrength, number>> = { weak: 1, medium: 2, strong: 3, critical: 4 };

export function maxImpact(a: ImpactLevel, b: ImpactLevel): ImpactLevel {
  return IMPACT_RANK[b] > IMPACT_RANK[a] ? b : a;
}

export const isHighImpact = (level: ImpactLevel): boolean => level === "high" || level === "critical";
