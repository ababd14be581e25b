import express, {
  type ErrorRequestHandler,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import cors from "cors";
import multer from "multer";
import { z } from "zod";
import {
  ExtractionFormatError,
  ExtractionTransportError,
  IntakeError,
  ValidationError,
  type IntakeErrorKind,
} from "./llm/errors";
import type { SessionStore } from "./session/sessionStore";
import { CSV_FILE_NAME } from "./utils/toCsv";

export type AppDeps = {
  sessions: SessionStore;
  sampleTranscript: () => Promise<string>;
};

const STATUS_BY_KIND: Record<IntakeErrorKind, number> = {
  validation: 400,
  session_not_found: 404,
  busy: 409,
  extraction_format: 422,
  extraction_transport: 502,
  questionnaire_load: 500,
  config: 500,
};

const analyzeBody = z.object({ transcript: z.string() });
const selectBody = z.object({ value: z.string() });
const positionParam = z
  .string()
  .regex(/^\d+$/, "position must be a non-negative integer")
  .transform(Number);

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

const wrap =
  (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

function parseBody<T, I>(schema: z.ZodType<T, z.ZodTypeDef, I>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data;
}

// body-parser and friends tag their errors with a 4xx status
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  const status =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  if (typeof status === "number" && status >= 400 && status < 500) return status;
  return null;
}

const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof multer.MulterError) {
    return res.status(400).json({ error: { kind: "validation", message: err.message } });
  }
  if (err instanceof IntakeError) {
    const body: Record<string, unknown> = { kind: err.kind, message: err.message };
    if (err instanceof ExtractionFormatError) body.raw = err.raw;
    if (err instanceof ExtractionTransportError) body.status = err.status;
    return res.status(STATUS_BY_KIND[err.kind]).json({ error: body });
  }
  const status = clientErrorStatus(err);
  if (status !== null) {
    const message = err instanceof Error ? err.message : "Bad request";
    return res.status(status).json({ error: { kind: "validation", message } });
  }
  console.error("Unhandled error:", err);
  return res.status(500).json({ error: { kind: "internal", message: "Internal error" } });
};

export function createApp({ sessions, sampleTranscript }: AppDeps) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  // transcripts may also arrive as an uploaded text file
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: 2 * 1024 * 1024 },
  });

  app.get("/health-check", (_req, res) => res.send("ok"));

  app.get(
    "/api/sample-transcript",
    wrap(async (_req, res) => res.json({ transcript: await sampleTranscript() }))
  );

  app.post("/api/sessions", (_req, res) => {
    const session = sessions.create();
    res.status(201).json({ sessionId: session.id });
  });

  app.get(
    "/api/sessions/:id",
    wrap(async (req, res) => res.json(sessions.get(req.params.id).snapshot()))
  );

  app.delete(
    "/api/sessions/:id",
    wrap(async (req, res) => {
      sessions.get(req.params.id);
      sessions.delete(req.params.id);
      res.status(204).end();
    })
  );

  // POST /api/sessions/:id/analyze
  // json: { transcript } or form-data: transcript=<text file>
  app.post(
    "/api/sessions/:id/analyze",
    upload.single("transcript"),
    wrap(async (req, res) => {
      const session = sessions.get(req.params.id);
      const transcript = req.file
        ? req.file.buffer.toString("utf8")
        : parseBody(analyzeBody, req.body).transcript;
      await session.analyze(transcript);
      res.json(session.snapshot());
    })
  );

  app.put(
    "/api/sessions/:id/answers/:position",
    wrap(async (req, res) => {
      const session = sessions.get(req.params.id);
      const position = parseBody(positionParam, req.params.position);
      const { value } = parseBody(selectBody, req.body);
      session.selectAnswer(position, value);
      res.json(session.snapshot());
    })
  );

  app.get(
    "/api/sessions/:id/export.csv",
    wrap(async (req, res) => {
      const session = sessions.get(req.params.id);
      if (session.resultSet.length === 0) {
        return res
          .status(404)
          .json({ error: { kind: "no_results", message: "Nothing to export yet" } });
      }
      res
        .type("text/csv")
        .attachment(CSV_FILE_NAME)
        .send(session.exportCsv());
    })
  );

  app.use(errorHandler);
  return app;
}
