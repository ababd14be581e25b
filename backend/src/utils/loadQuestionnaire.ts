// utils/loadQuestionnaire.ts
import fs from "fs";
import { QuestionnaireLoadError } from "../llm/errors";
import type { QuestionnaireDocument, QuestionnaireSource } from "../llm/types";

/** Reads the questionnaire JSON from disk on every load, no caching. */
export function fileQuestionnaireSource(filePath: string): QuestionnaireSource {
  return {
    async load(): Promise<QuestionnaireDocument> {
      let text: string;
      try {
        text = await fs.promises.readFile(filePath, "utf8");
      } catch (cause) {
        throw new QuestionnaireLoadError(`Cannot read questionnaire at ${filePath}`, {
          cause,
        });
      }
      return { text, schema: decodeQuestionnaire(text, filePath) };
    },
  };
}

export function decodeQuestionnaire(text: string, origin = "questionnaire"): unknown {
  try {
    return JSON.parse(text);
  } catch (cause) {
    throw new QuestionnaireLoadError(`${origin} is not valid JSON`, { cause });
  }
}

export async function readSampleTranscript(filePath: string): Promise<string> {
  const sample = await fs.promises.readFile(filePath, "utf8");
  return sample.trim();
}
