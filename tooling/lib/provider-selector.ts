/**
 * Provider Selection and Ranking
 * Chooses which existing implementation to reuse for each (generator, type)
 * pair, preferring implementations closer to the module being generated
 */

import { KnownProvider, QualifiedName, ResolvedGenerator, ResolvedType } from "./types";
import { matchPattern } from "./pattern";
import { describeType } from "./resolved-type";
import { formatQualifiedName, sameQualifiedName } from "./utils";

export type ProviderScope =
  | "module-local"
  | "imported-project"
  | "imported-dependency"
  | "dependency"
  | "project-wide"
  | "hard-coded";

/** Highest priority first */
export const SCOPE_PRIORITY: readonly ProviderScope[] = [
  "module-local",
  "imported-project",
  "imported-dependency",
  "dependency",
  "project-wide",
  "hard-coded",
];

export interface ProviderCandidate {
  generatorId: string;
  location: QualifiedName;
  declaredType: ResolvedType;
  scope: ProviderScope;
}

export interface ProviderRanking {
  provider: KnownProvider;
  scope: ProviderScope;
  location: string;
  childText: string;
  alternatives: string[];
}

export function scopeRank(scope: ProviderScope): number {
  return SCOPE_PRIORITY.indexOf(scope);
}

/**
 * Dependency code is only trusted when the generator blesses it
 */
export function isEligible(candidate: ProviderCandidate, generator: ResolvedGenerator): boolean {
  if (candidate.scope !== "dependency") {
    return true;
  }
  return generator.blessed.some((blessed) => sameQualifiedName(blessed, candidate.location));
}

/**
 * Rank candidates and keep the best one per generator and generated type.
 * Ties keep the input order.
 */
export function rankProviders(candidates: ProviderCandidate[], generators: ResolvedGenerator[]): ProviderRanking[] {
  const groups = new Map<string, { childText: string; members: ProviderCandidate[] }>();

  for (const candidate of candidates) {
    const generator = generators.find((g) => g.id === candidate.generatorId);
    if (!generator || !isEligible(candidate, generator)) continue;

    const child = matchPattern(generator.searchPattern, candidate.declaredType);
    if (!child) continue;

    const childText = describeType(child);
    const key = `${candidate.generatorId}\u0000${childText}`;
    const group = groups.get(key) ?? { childText, members: [] };
    group.members.push(candidate);
    groups.set(key, group);
  }

  const rankings: ProviderRanking[] = [];
  for (const { childText, members } of groups.values()) {
    const [best, ...rest] = [...members].sort((a, b) => scopeRank(a.scope) - scopeRank(b.scope));
    rankings.push({
      provider: { generatorId: best.generatorId, location: best.location, declaredType: best.declaredType },
      scope: best.scope,
      location: formatQualifiedName(best.location),
      childText,
      alternatives: rest.map((candidate) => formatQualifiedName(candidate.location)),
    });
  }

  return rankings;
}

export function selectProviders(candidates: ProviderCandidate[], generators: ResolvedGenerator[]): KnownProvider[] {
  return rankProviders(candidates, generators).map((ranking) => ranking.provider);
}

/**
 * Format a ranking for display
 */
export function formatProviderRanking(ranking: ProviderRanking, index: number = 0): string {
  const lines = [
    `Provider ${index + 1}: ${ranking.location}`,
    `  Generator: ${ranking.provider.generatorId}`,
    `  Type: ${ranking.childText}`,
    `  Scope: ${ranking.scope}`,
  ];

  if (ranking.alternatives.length > 0) {
    lines.push(`  Shadowed: ${ranking.alternatives.join(", ")}`);
  }

  return lines.join("\n");
}
