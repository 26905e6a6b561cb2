/**
 * Helpers for requirement-list values such as `install_requires`
 */

import { compareOrdinal } from "../core/newline.js";
import type { EntryValue } from "./IniDocument.js";

const REQUIREMENT_NAME = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/;

/**
 * The distribution name of a requirement: everything before extras,
 * version comparisons or markers. A line without a recognisable name is
 * its own name.
 */
export function requirementName(requirement: string): string {
  const match = REQUIREMENT_NAME.exec(requirement);
  return match ? match[1] : requirement.trim();
}

/**
 * Names compare case-insensitively
 */
export function requirementKey(requirement: string): string {
  return requirementName(requirement).toLowerCase();
}

export function toRequirementList(value: EntryValue | undefined): string[] {
  if (value === undefined) return [];
  if (Array.isArray(value)) return value;
  return value
    .split("\n")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

/**
 * Case-insensitive order, ties broken by byte order so the result is total
 */
export function compareRequirements(a: string, b: string): number {
  const folded = compareOrdinal(a.toLowerCase(), b.toLowerCase());
  return folded !== 0 ? folded : compareOrdinal(a, b);
}

/**
 * Union of two requirement lists keyed by name.
 *
 * Every target requirement is kept as written; template requirements are
 * added only for names the target doesn't mention.
 */
export function mergeRequirementLists(template: string[], target: string[]): string[] {
  const merged = new Set<string>(target);
  const seenNames = new Set(target.map(requirementKey));

  for (const requirement of template) {
    const key = requirementKey(requirement);
    if (!seenNames.has(key)) {
      seenNames.add(key);
      merged.add(requirement);
    }
  }

  return [...merged].sort(compareRequirements);
}
