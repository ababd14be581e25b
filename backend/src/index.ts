import http from "http";
import dotenv from "dotenv";
import { createApp } from "./app";
import { credentialFrom, loadConfig } from "./config";
import { attachLiveServer } from "./live";
import { GeminiExtractionClient } from "./llm/extract";
import { SessionStore } from "./session/sessionStore";
import {
  fileQuestionnaireSource,
  readSampleTranscript,
} from "./utils/loadQuestionnaire";

dotenv.config();

const config = loadConfig();
if (!config.geminiApiKey) {
  console.error("GEMINI_API_KEY environment variable is not set! Analyses will fail.");
}

const sessions = new SessionStore({
  questionnaire: fileQuestionnaireSource(config.questionnairePath),
  client: new GeminiExtractionClient({
    model: config.model,
    temperature: config.temperature,
    maxOutputTokens: config.maxOutputTokens,
  }),
  credential: credentialFrom(config),
});

const app = createApp({
  sessions,
  sampleTranscript: () => readSampleTranscript(config.sampleTranscriptPath),
});

const server = http.createServer(app);
attachLiveServer(server, sessions);

server.listen(config.port, () =>
  console.log(`Server listening on :${config.port} (model ${config.model})`)
);
