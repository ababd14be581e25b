import { GoogleGenAI, type GenerateContentParameters } from "@google/genai";
import { ExtractionTransportError } from "./errors";
import { EXTRACTION_SYSTEM_INSTRUCTION } from "./extractorPrompt";
import type { ExtractionClient } from "./types";

export type GenerateContent = (
  params: GenerateContentParameters
) => Promise<{ text?: string }>;

export type GeminiExtractionOptions = {
  model: string;
  temperature: number;
  maxOutputTokens: number;
  /** swapped out in tests; defaults to a fresh GoogleGenAI client per key */
  connect?: (apiKey: string) => GenerateContent;
};

const connectGemini = (apiKey: string): GenerateContent => {
  const ai = new GoogleGenAI({ apiKey });
  return (params) => ai.models.generateContent(params);
};

function statusOf(err: unknown): number | null {
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return null;
}

/**
 * Sends the extraction prompt to Gemini and hands back the raw text.
 * Does not interpret the text and does not retry.
 */
export class GeminiExtractionClient implements ExtractionClient {
  private readonly connect: (apiKey: string) => GenerateContent;

  constructor(private readonly options: GeminiExtractionOptions) {
    this.connect = options.connect ?? connectGemini;
  }

  async extract(promptText: string, credential: string): Promise<string> {
    const generate = this.connect(credential);
    let response: { text?: string };
    try {
      response = await generate({
        model: this.options.model,
        contents: [{ role: "user", parts: [{ text: promptText }] }],
        config: {
          systemInstruction: EXTRACTION_SYSTEM_INSTRUCTION,
          temperature: this.options.temperature,
          maxOutputTokens: this.options.maxOutputTokens,
        },
      });
    } catch (err) {
      const body = err instanceof Error ? err.message : String(err);
      throw new ExtractionTransportError(statusOf(err), body, { cause: err });
    }
    return response.text ?? "";
  }
}
