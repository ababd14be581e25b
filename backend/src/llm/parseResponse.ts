import { ExtractionFormatError } from "./errors";
import { responseSchema, type RawAnswer } from "./schema";
import type { AnswerEntry } from "./types";

function toLinkId(v: unknown): string | null {
  if (typeof v === "string") return v;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return null;
}

function toEntry(raw: RawAnswer): AnswerEntry {
  const linkId = toLinkId(raw.linkId);
  const answer = raw.answer;
  if (Array.isArray(answer)) {
    return { kind: "list", linkId, answer: [...answer] };
  }
  return { kind: "scalar", linkId, answer };
}

/**
 * Turns the model output into answer entries. Accepts either a bare JSON
 * array or `{ "answers": [...] }`. Anything else throws
 * ExtractionFormatError with the raw text attached.
 */
export function parseResponse(rawModelOutput: string): AnswerEntry[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(rawModelOutput);
  } catch (cause) {
    throw new ExtractionFormatError(rawModelOutput, "invalid JSON", { cause });
  }

  const result = responseSchema.safeParse(decoded);
  if (!result.success) {
    throw new ExtractionFormatError(rawModelOutput, "unexpected response format", {
      cause: result.error,
    });
  }

  const list = Array.isArray(result.data) ? result.data : result.data.answers;
  return list.map(toEntry);
}
