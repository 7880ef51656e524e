/**
 * Utility functions used across the derivation engine
 */

import { QualifiedName } from "./types";

/**
 * Sanitize identifier for use as variable/function name
 */
export function sanitizeIdentifier(raw: string): string {
  return raw
    .replace(/[^a-zA-Z0-9_$]/g, "_")
    .replace(/^(\d)/, "_$1")
    .substring(0, 100);
}

export function capitalize(text: string): string {
  return text.length === 0 ? text : text[0].toUpperCase() + text.slice(1);
}

export function uncapitalize(text: string): string {
  return text.length === 0 ? text : text[0].toLowerCase() + text.slice(1);
}

export function qualifiedName(modulePath: string[] | string, name: string): QualifiedName {
  return {
    modulePath: typeof modulePath === "string" ? modulePath.split(".").filter((p) => p.length > 0) : [...modulePath],
    name,
  };
}

/**
 * Parse a dotted name; the last segment is the name
 */
export function parseQualifiedName(dotted: string): QualifiedName {
  const segments = dotted.split(".");
  const name = segments.pop() ?? "";
  return { modulePath: segments, name };
}

/**
 * Dotted form, e.g. `Basics.Int`; bare name when the module path is empty
 */
export function formatQualifiedName(ref: QualifiedName): string {
  return ref.modulePath.length === 0 ? ref.name : `${ref.modulePath.join(".")}.${ref.name}`;
}

export function sameQualifiedName(a: QualifiedName, b: QualifiedName): boolean {
  return (
    a.name === b.name &&
    a.modulePath.length === b.modulePath.length &&
    a.modulePath.every((segment, index) => segment === b.modulePath[index])
  );
}

/**
 * Pick `base`, or `base2`, `base3`, ... when taken
 */
export function uniqueName(base: string, taken: (candidate: string) => boolean): string {
  if (!taken(base)) {
    return base;
  }
  for (let suffix = 2; ; suffix += 1) {
    const candidate = `${base}${suffix}`;
    if (!taken(candidate)) {
      return candidate;
    }
  }
}

/**
 * Check if value is a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
