import { randomUUID } from "crypto";
import { describeResults, normalize, selectAnswer } from "../helper/helper";
import { BusyError } from "../llm/errors";
import { buildPrompt } from "../llm/extractorPrompt";
import { parseResponse } from "../llm/parseResponse";
import type {
  ExtractionClient,
  QuestionIndex,
  QuestionnaireSource,
  ResultSet,
  SessionEvent,
  SessionSnapshot,
} from "../llm/types";
import { buildIndex, findDuplicateLinkIds } from "../utils/buildIndex";
import { toCsv } from "../utils/toCsv";

export type SessionDeps = {
  questionnaire: QuestionnaireSource;
  client: ExtractionClient;
  credential: () => string | Promise<string>;
};

type Listener = (event: SessionEvent) => void;

/**
 * Owns one user's index and answers. At most one analysis runs at a time;
 * a second call while one is pending fails with BusyError.
 */
export class AnalysisSession {
  readonly id: string;
  private index: QuestionIndex = new Map();
  private results: ResultSet = [];
  private loading = false;
  private error: string | null = null;
  private readonly listeners = new Set<Listener>();

  constructor(private readonly deps: SessionDeps, id: string = randomUUID()) {
    this.id = id;
  }

  get resultSet(): ResultSet {
    return this.results;
  }

  get questionIndex(): QuestionIndex {
    return this.index;
  }

  onEvent(cb: Listener): () => void {
    this.listeners.add(cb);
    return () => {
      this.listeners.delete(cb);
    };
  }

  // a failing subscriber must not leave the session stuck in loading
  private emit(event: SessionEvent) {
    for (const cb of this.listeners) {
      try {
        cb(event);
      } catch (err) {
        console.error(`Session ${this.id}: ${event.type} listener failed:`, err);
      }
    }
  }

  async analyze(transcript: string): Promise<ResultSet> {
    if (this.loading) throw new BusyError(this.id);
    this.loading = true;
    this.error = null;
    this.results = [];
    this.emit({ type: "analysis_started", sessionId: this.id });

    try {
      const { text, schema } = await this.deps.questionnaire.load();
      const index = buildIndex(schema);
      const dupes = findDuplicateLinkIds(schema);
      if (dupes.length > 0) {
        console.log(`Duplicate linkIds in questionnaire, last one wins: ${dupes.join(", ")}`);
      }

      const prompt = buildPrompt(text, transcript.trim());
      const credential = await this.deps.credential();
      const raw = await this.deps.client.extract(prompt, credential.trim());
      const results = normalize(parseResponse(raw));

      this.index = index;
      this.results = results;
      console.log(`Session ${this.id}: extracted ${results.length} answers`);
      this.emit({
        type: "analysis_completed",
        sessionId: this.id,
        results: describeResults(results, index),
      });
      return results;
    } catch (err) {
      this.results = [];
      this.error = err instanceof Error ? err.message : String(err);
      console.error(`Session ${this.id}: analysis failed:`, err);
      this.emit({ type: "analysis_failed", sessionId: this.id, error: this.error });
      throw err;
    } finally {
      this.loading = false;
    }
  }

  selectAnswer(position: number, value: string): ResultSet {
    this.results = selectAnswer(this.results, position, value);
    this.emit({ type: "answer_selected", sessionId: this.id, position, value });
    return this.results;
  }

  exportCsv(): string {
    return toCsv(this.results, this.index);
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      loading: this.loading,
      error: this.error,
      results: describeResults(this.results, this.index),
    };
  }
}
