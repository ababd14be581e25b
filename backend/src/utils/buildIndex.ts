// utils/buildIndex.ts
import type { QuestionIndex } from "../llm/types";

type IndexPair = [linkId: string, text: string];

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

const asList = (v: unknown): unknown[] => (Array.isArray(v) ? v : []);

/** `properties.item.items`, or [] when any step of the path is missing */
export function topLevelItems(schema: unknown): unknown[] {
  if (!isRecord(schema)) return [];
  const properties = schema.properties;
  if (!isRecord(properties)) return [];
  const item = properties.item;
  if (!isRecord(item)) return [];
  return asList(item.items);
}

// Depth first, parent before children. Items without a string linkId and
// text are dropped together with their subtree.
function collectPairs(items: unknown[]): IndexPair[] {
  return items.flatMap((item): IndexPair[] => {
    if (!isRecord(item)) return [];
    const { linkId, text } = item;
    if (typeof linkId !== "string" || typeof text !== "string") return [];
    return [[linkId, text], ...collectPairs(asList(item.item))];
  });
}

/**
 * Flattens the questionnaire tree into linkId -> question text.
 * Never throws; a malformed schema gives an empty index.
 * A linkId seen twice keeps the text of its last occurrence.
 */
export function buildIndex(schema: unknown): QuestionIndex {
  return new Map(collectPairs(topLevelItems(schema)));
}

/** linkIds that occur more than once, in first-seen order */
export function findDuplicateLinkIds(schema: unknown): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const [linkId] of collectPairs(topLevelItems(schema))) {
    if (seen.has(linkId)) dupes.add(linkId);
    seen.add(linkId);
  }
  return [...dupes];
}
