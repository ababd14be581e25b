import { ValidationError } from "../llm/errors";
import type {
  AnswerEntry,
  QuestionIndex,
  ResultRow,
  ResultSet,
} from "../llm/types";

/** String form of an answer value as shown to the user and exported. */
export function answerText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value) ?? "";
}

/** Default every multi-choice answer to its first candidate. */
export function normalize(entries: readonly AnswerEntry[]): ResultSet {
  return entries.map((entry) => {
    if (entry.kind !== "list") return entry;
    if (entry.selectedAnswer !== undefined || entry.answer.length === 0) return entry;
    return { ...entry, selectedAnswer: answerText(entry.answer[0]) };
  });
}

// Apply a user override to one multi-choice answer
export function selectAnswer(
  resultSet: ResultSet,
  position: number,
  value: string
): ResultSet {
  const entry = resultSet[position];
  if (!Number.isInteger(position) || entry === undefined) {
    throw new ValidationError(`No answer at position ${position}`);
  }
  if (entry.kind !== "list") {
    throw new ValidationError(
      `Answer at position ${position} has no candidates to choose from`
    );
  }
  if (!entry.answer.some((candidate) => answerText(candidate) === value)) {
    throw new ValidationError(
      `"${value}" is not one of the candidates for ${entry.linkId ?? `position ${position}`}`
    );
  }
  return resultSet.map((e, i) =>
    i === position ? { ...entry, selectedAnswer: value } : e
  );
}

export function questionText(entry: AnswerEntry, index: QuestionIndex): string {
  if (entry.linkId === null) return "";
  return index.get(entry.linkId) ?? entry.linkId;
}

/** selectedAnswer, else the joined candidates, else the scalar value */
export function resolvedAnswer(entry: AnswerEntry): string {
  if (entry.kind === "list") {
    return entry.selectedAnswer ?? entry.answer.map(answerText).join(", ");
  }
  return answerText(entry.answer);
}

export function describeResults(
  resultSet: ResultSet,
  index: QuestionIndex
): ResultRow[] {
  return resultSet.map((entry, position) => {
    const row: ResultRow = {
      position,
      linkId: entry.linkId,
      question: questionText(entry, index),
      answer: resolvedAnswer(entry),
    };
    if (entry.kind === "list") {
      row.options = entry.answer.map(answerText);
      if (entry.selectedAnswer !== undefined) row.selectedAnswer = entry.selectedAnswer;
    }
    return row;
  });
}
