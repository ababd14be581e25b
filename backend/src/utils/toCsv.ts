// utils/toCsv.ts
import { stringify } from "csv-stringify/sync";
import { questionText, resolvedAnswer } from "../helper/helper";
import type { QuestionIndex, ResultSet } from "../llm/types";

export const CSV_FILE_NAME = "anamnesis_results.csv";

const HEADER = ["Question", "Answer"];

/** One row per answer, never skipping any; fields are quoted only when needed. */
export function toCsv(resultSet: ResultSet, index: QuestionIndex): string {
  const rows = [
    HEADER,
    ...resultSet.map((entry) => [questionText(entry, index), resolvedAnswer(entry)]),
  ];
  return stringify(rows);
}
