/**
 * Audit Trail System
 * Tracks provider reuse, resolver applications, emitted declarations and
 * failures for each derivation
 */

import { ProviderRanking } from "./provider-selector";
import { Resolver } from "./types";

export type AuditEntryType =
  | "provider_used"
  | "resolver_applied"
  | "declaration_emitted"
  | "generation_failed"
  | "providers_ranked";

export interface AuditEntry {
  timestamp: string;
  type: AuditEntryType;
  generatorId: string;
  typeText: string;
  details: Record<string, unknown>;
}

export interface ResolverAudit {
  resolverKind: Resolver["kind"];
  typeText: string;
  count: number;
  lastUsedAt: string;
}

export interface FailureAudit {
  typeText: string;
  error: string;
  at: string;
}

export class AuditLog {
  private entries: AuditEntry[] = [];
  private resolverAudits: Map<string, ResolverAudit> = new Map();
  private failures: Map<string, FailureAudit[]> = new Map();
  private declarations: Map<string, string[]> = new Map();

  recordProviderUse(generatorId: string, typeText: string, provider: string): void {
    this.push("provider_used", generatorId, typeText, { provider });
  }

  recordResolver(generatorId: string, typeText: string, resolverKind: Resolver["kind"]): void {
    const now = new Date().toISOString();
    const key = `${generatorId}:${resolverKind}:${typeText}`;
    const existing = this.resolverAudits.get(key);

    if (existing) {
      existing.count += 1;
      existing.lastUsedAt = now;
    } else {
      this.resolverAudits.set(key, { resolverKind, typeText, count: 1, lastUsedAt: now });
    }

    this.push("resolver_applied", generatorId, typeText, { resolverKind });
  }

  recordDeclaration(generatorId: string, typeText: string, name: string): void {
    const names = this.declarations.get(generatorId) ?? [];
    names.push(name);
    this.declarations.set(generatorId, names);
    this.push("declaration_emitted", generatorId, typeText, { name });
  }

  recordFailure(generatorId: string, typeText: string, error: string): void {
    const failure: FailureAudit = { typeText, error, at: new Date().toISOString() };
    const list = this.failures.get(generatorId) ?? [];
    list.push(failure);
    this.failures.set(generatorId, list);
    this.push("generation_failed", generatorId, typeText, { error });
  }

  recordProviderRanking(ranking: ProviderRanking[]): void {
    for (const entry of ranking) {
      this.push("providers_ranked", entry.provider.generatorId, entry.childText, {
        selected: entry.location,
        scope: entry.scope,
        alternatives: entry.alternatives,
      });
    }
  }

  private push(type: AuditEntryType, generatorId: string, typeText: string, details: Record<string, unknown>): void {
    this.entries.push({ timestamp: new Date().toISOString(), type, generatorId, typeText, details });
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getEntriesForType(typeText: string): AuditEntry[] {
    return this.entries.filter((entry) => entry.typeText === typeText);
  }

  getResolverAudits(): ResolverAudit[] {
    return Array.from(this.resolverAudits.values());
  }

  getFailures(generatorId: string): FailureAudit[] {
    return this.failures.get(generatorId) ?? [];
  }

  getDeclarations(generatorId: string): string[] {
    return this.declarations.get(generatorId) ?? [];
  }

  getSummary(): {
    totalEntries: number;
    providersUsed: number;
    resolversApplied: number;
    declarationsEmitted: number;
    failures: number;
  } {
    const count = (type: AuditEntryType) => this.entries.filter((entry) => entry.type === type).length;
    return {
      totalEntries: this.entries.length,
      providersUsed: count("provider_used"),
      resolversApplied: count("resolver_applied"),
      declarationsEmitted: count("declaration_emitted"),
      failures: count("generation_failed"),
    };
  }

  /**
   * Export as JSON for persistence
   */
  toJSON(): {
    entries: AuditEntry[];
    resolverAudits: ResolverAudit[];
    failures: Record<string, FailureAudit[]>;
    declarations: Record<string, string[]>;
  } {
    return {
      entries: this.entries,
      resolverAudits: this.getResolverAudits(),
      failures: Object.fromEntries(this.failures),
      declarations: Object.fromEntries(this.declarations),
    };
  }

  clear(): void {
    this.entries = [];
    this.resolverAudits.clear();
    this.failures.clear();
    this.declarations.clear();
  }
}

/**
 * Global audit log instance
 */
export const globalAuditLog = new AuditLog();
