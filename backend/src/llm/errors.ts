export type IntakeErrorKind =
  | "extraction_transport"
  | "extraction_format"
  | "busy"
  | "validation"
  | "questionnaire_load"
  | "config"
  | "session_not_found";

/**
 * Base class for every failure the pipeline reports. `kind` lets callers
 * tell a retryable network problem from unusable model output.
 */
export class IntakeError extends Error {
  public readonly kind: IntakeErrorKind;

  constructor(kind: IntakeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IntakeError";
    this.kind = kind;
  }
}

/** The model backend call did not complete (non-2xx or network failure). */
export class ExtractionTransportError extends IntakeError {
  /** HTTP status reported by the SDK, null when the request never got one */
  public readonly status: number | null;
  public readonly body: string;

  constructor(status: number | null, body: string, options?: { cause?: unknown }) {
    super(
      "extraction_transport",
      `Extraction backend error: ${status ?? "network"} ${body}`,
      options
    );
    this.name = "ExtractionTransportError";
    this.status = status;
    this.body = body;
  }
}

/** The backend answered but the body is not the expected JSON shape. */
export class ExtractionFormatError extends IntakeError {
  public readonly raw: string;

  constructor(raw: string, reason: string, options?: { cause?: unknown }) {
    super("extraction_format", `Failed to parse response (${reason}): ${raw}`, options);
    this.name = "ExtractionFormatError";
    this.raw = raw;
  }
}

export class BusyError extends IntakeError {
  constructor(sessionId: string) {
    super("busy", `Session ${sessionId} already has an analysis in flight`);
    this.name = "BusyError";
  }
}

export class ValidationError extends IntakeError {
  constructor(message: string) {
    super("validation", message);
    this.name = "ValidationError";
  }
}

export class QuestionnaireLoadError extends IntakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("questionnaire_load", message, options);
    this.name = "QuestionnaireLoadError";
  }
}

export class ConfigError extends IntakeError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

export class SessionNotFoundError extends IntakeError {
  constructor(sessionId: string) {
    super("session_not_found", `Unknown session: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}
