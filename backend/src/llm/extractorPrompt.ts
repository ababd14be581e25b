export const EXTRACTION_SYSTEM_INSTRUCTION = "You are a helpful assistant.";

const EXTRACTOR_INSTRUCTIONS = `You are a trained nurse in a hospital. You are specifically trained to take anamneses (medical histories) from patients.
Please analyze which questions from the JSON were addressed in the transcript and what the answers are. Only include questions that were actually addressed.
For some questions, the JSON provides a list of possible answers. In these cases, choose exactly one of them.
Return your answers as a JSON array of objects, each with the question's "linkId" and your "answer". An object with an "answers" array of the same entries is also accepted.
Do not provide any explanations for your answers. Only return the JSON, with no explanation, no markdown, and no code block. Do not include any text before or after the JSON.`;

/**
 * Embeds the questionnaire exactly as it was stored (not a re-serialized
 * tree) and the transcript exactly as given. Same inputs, same bytes.
 */
export function buildPrompt(schemaText: string, transcriptText: string): string {
  return (
    EXTRACTOR_INSTRUCTIONS +
    "\n\nQuestionnaire JSON:\n" +
    schemaText +
    "\n\nTranscript:\n" +
    transcriptText
  );
}
