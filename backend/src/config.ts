import path from "path";
import { z } from "zod";
import { ConfigError } from "./llm/errors";

const ASSETS_DIR = path.join(process.cwd(), "backend", "assets");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8585),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default("gemini-2.5-flash"),
  EXTRACTION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  EXTRACTION_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  QUESTIONNAIRE_PATH: z
    .string()
    .default(path.join(ASSETS_DIR, "questionnaire.json")),
  SAMPLE_TRANSCRIPT_PATH: z
    .string()
    .default(path.join(ASSETS_DIR, "sample_transcript.txt")),
});

export type AppConfig = {
  port: number;
  geminiApiKey: string | null;
  model: string;
  temperature: number;
  maxOutputTokens: number;
  questionnairePath: string;
  sampleTranscriptPath: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;
  const key = e.GEMINI_API_KEY?.trim();
  return {
    port: e.PORT,
    geminiApiKey: key ? key : null,
    model: e.GEMINI_MODEL,
    temperature: e.EXTRACTION_TEMPERATURE,
    maxOutputTokens: e.EXTRACTION_MAX_TOKENS,
    questionnairePath: path.resolve(e.QUESTIONNAIRE_PATH),
    sampleTranscriptPath: path.resolve(e.SAMPLE_TRANSCRIPT_PATH),
  };
}

/** Resolved per analysis so a missing key only fails the request, not boot. */
export function credentialFrom(config: AppConfig): () => string {
  return () => {
    if (!config.geminiApiKey) {
      throw new ConfigError("GEMINI_API_KEY environment variable is not set");
    }
    return config.geminiApiKey;
  };
}
