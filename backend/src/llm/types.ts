export type QuestionNode = {
  linkId: string;
  text: string;
  item?: QuestionNode[];
};

/** linkId -> display text, rebuilt for every analysis */
export type QuestionIndex = ReadonlyMap<string, string>;

export type ScalarAnswerEntry = {
  kind: "scalar";
  linkId: string | null;
  answer: unknown;
};

export type ListAnswerEntry = {
  kind: "list";
  linkId: string | null;
  answer: readonly unknown[];
  selectedAnswer?: string;
};

export type AnswerEntry = ScalarAnswerEntry | ListAnswerEntry;

export type ResultSet = readonly AnswerEntry[];

export type QuestionnaireDocument = {
  /** the file exactly as stored; embedded verbatim in the prompt */
  text: string;
  schema: unknown;
};

export interface QuestionnaireSource {
  load(): Promise<QuestionnaireDocument>;
}

export interface ExtractionClient {
  extract(promptText: string, credential: string): Promise<string>;
}

export type ResultRow = {
  position: number;
  linkId: string | null;
  question: string;
  answer: string;
  options?: string[];
  selectedAnswer?: string;
};

export type SessionSnapshot = {
  id: string;
  loading: boolean;
  error: string | null;
  results: ResultRow[];
};

export type SessionEvent =
  | { type: "analysis_started"; sessionId: string }
  | { type: "analysis_completed"; sessionId: string; results: ResultRow[] }
  | { type: "analysis_failed"; sessionId: string; error: string }
  | {
      type: "answer_selected";
      sessionId: string;
      position: number;
      value: string;
    };
