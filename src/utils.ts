// Shared utilities for the DSA Interview Coach.
//
// Deterministic helpers used by the follow-up composer, the summary builder
// and the answer analyzer.

/**
 * Joins items into a human-readable list: "a", "a and b", "a, b and c".
 */
export function joinList(items: readonly string[]): string {
  if (items.length === 0) return "";
  if (items.length === 1) return items[0];
  return `${items.slice(0, -1).join(", ")} and ${items[items.length - 1]}`;
}

/** Case- and whitespace-insensitive key for a concept name. */
export function conceptKey(concept: string): string {
  return concept.trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Trims concept names, drops blanks and removes case-insensitive duplicates,
 * keeping the first spelling seen.
 */
export function normalizeConcepts(concepts: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of concepts) {
    const concept = raw.trim().replace(/\s+/g, " ");
    if (concept.length === 0) continue;
    const key = conceptKey(concept);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(concept);
  }
  return result;
}

/**
 * Ranks items by how often they occur (case-insensitive), most frequent first.
 * Ties keep the order of first appearance. The first spelling seen is returned.
 */
export function rankByFrequency(items: readonly string[], limit?: number): string[] {
  const counts = new Map<string, { label: string; count: number; firstIndex: number }>();

  items.forEach((item, index) => {
    const label = item.trim();
    if (label.length === 0) return;
    const key = conceptKey(label);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { label, count: 1, firstIndex: index });
    }
  });

  const ranked = [...counts.values()]
    .sort((a, b) => b.count - a.count || a.firstIndex - b.firstIndex)
    .map((entry) => entry.label);

  return limit === undefined ? ranked : ranked.slice(0, limit);
}

/** Rounds to a fixed number of decimal places. */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
