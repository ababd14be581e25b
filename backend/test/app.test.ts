import http from "http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import WebSocket from "ws";
import { z } from "zod";
import { createApp } from "../src/app";
import { attachLiveServer } from "../src/live";
import { ExtractionTransportError } from "../src/llm/errors";
import { SessionStore } from "../src/session/sessionStore";
import { FakeExtractionClient, staticQuestionnaire } from "./fakes";

const REPLY = '[{"linkId":"pain","answer":["Yes","No"]},{"linkId":"fever","answer":"no"}]';

let server: http.Server;
let baseUrl: string;
let client: FakeExtractionClient;

async function start(...replies: Array<string | Error>) {
  client = new FakeExtractionClient(...replies);
  const sessions = new SessionStore({
    questionnaire: staticQuestionnaire(),
    client,
    credential: () => "test-secret",
  });
  server = http.createServer(
    createApp({ sessions, sampleTranscript: async () => "Nurse: Hello" })
  );
  attachLiveServer(server, sessions);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server not listening");
  baseUrl = `http://127.0.0.1:${address.port}`;
}

async function createSession(): Promise<string> {
  const res = await fetch(`${baseUrl}/api/sessions`, { method: "POST" });
  expect(res.status).toBe(201);
  return z.object({ sessionId: z.string() }).parse(await res.json()).sessionId;
}

const postJson = (url: string, body: unknown, method = "POST") =>
  fetch(url, {
    method,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });

describe("http api", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("answers the health check and serves the sample transcript", async () => {
    await start();
    expect(await (await fetch(`${baseUrl}/health-check`)).text()).toBe("ok");
    expect(await (await fetch(`${baseUrl}/api/sample-transcript`)).json()).toEqual({
      transcript: "Nurse: Hello",
    });
  });

  it("analyzes, overrides and exports", async () => {
    await start(REPLY);
    const id = await createSession();

    const analyzed = await postJson(`${baseUrl}/api/sessions/${id}/analyze`, {
      transcript: "Patient: it hurts",
    });
    expect(analyzed.status).toBe(200);
    expect(await analyzed.json()).toMatchObject({
      loading: false,
      error: null,
      results: [{ answer: "Yes", options: ["Yes", "No"] }, { answer: "no" }],
    });

    const selected = await postJson(`${baseUrl}/api/sessions/${id}/answers/0`, { value: "No" }, "PUT");
    expect(selected.status).toBe(200);

    const csv = await fetch(`${baseUrl}/api/sessions/${id}/export.csv`);
    expect(csv.status).toBe(200);
    expect(csv.headers.get("content-type")).toMatch(/^text\/csv/);
    expect(csv.headers.get("content-disposition")).toBe(
      'attachment; filename="anamnesis_results.csv"'
    );
    expect(await csv.text()).toBe(
      "Question,Answer\nAre you in pain?,No\nHave you had a fever?,no\n"
    );
  });

  it("accepts the transcript as an uploaded file", async () => {
    await start(REPLY);
    const id = await createSession();
    const form = new FormData();
    form.append("transcript", new Blob(["Patient: it hurts"], { type: "text/plain" }), "t.txt");

    const res = await fetch(`${baseUrl}/api/sessions/${id}/analyze`, { method: "POST", body: form });

    expect(res.status).toBe(200);
    expect(client.calls[0].prompt.endsWith("Transcript:\nPatient: it hurts")).toBe(true);
  });

  it("maps pipeline errors to status codes", async () => {
    await start("no json here", new ExtractionTransportError(500, "boom"));
    const id = await createSession();

    const format = await postJson(`${baseUrl}/api/sessions/${id}/analyze`, { transcript: "t" });
    expect(format.status).toBe(422);
    expect(await format.json()).toEqual({
      error: {
        kind: "extraction_format",
        message: "Failed to parse response (invalid JSON): no json here",
        raw: "no json here",
      },
    });

    const transport = await postJson(`${baseUrl}/api/sessions/${id}/analyze`, { transcript: "t" });
    expect(transport.status).toBe(502);
    expect(await transport.json()).toEqual({
      error: {
        kind: "extraction_transport",
        message: "Extraction backend error: 500 boom",
        status: 500,
      },
    });

    const empty = await fetch(`${baseUrl}/api/sessions/${id}/export.csv`);
    expect(empty.status).toBe(404);
  });

  it("answers 400 for malformed JSON bodies", async () => {
    await start(REPLY);
    const id = await createSession();

    const res = await fetch(`${baseUrl}/api/sessions/${id}/analyze`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{bad",
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { kind: "validation" } });
    expect(client.calls).toHaveLength(0);
  });

  it("only accepts decimal answer positions", async () => {
    await start(REPLY);
    const id = await createSession();
    await postJson(`${baseUrl}/api/sessions/${id}/analyze`, { transcript: "t" });

    for (const position of ["%20", "0x1", "-1", "1.0"]) {
      const res = await postJson(
        `${baseUrl}/api/sessions/${id}/answers/${position}`,
        { value: "No" },
        "PUT"
      );
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { kind: "validation", message: "position must be a non-negative integer" },
      });
    }

    const snapshot = await (await fetch(`${baseUrl}/api/sessions/${id}`)).json();
    expect(snapshot).toMatchObject({ results: [{ selectedAnswer: "Yes" }, { answer: "no" }] });
  });

  it("survives a malformed frame on the live socket", async () => {
    await start();
    const ws = new WebSocket(`${baseUrl.replace("http", "ws")}/api/live`);
    ws.on("error", () => {});
    await new Promise<void>((resolve) => ws.once("open", () => resolve()));

    const closed = new Promise<number>((resolve) => ws.once("close", (code) => resolve(code)));
    ws.send(Buffer.from([0xff, 0xfe, 0xfd]), { binary: false });

    expect(await closed).toBe(1007);
    expect(await (await fetch(`${baseUrl}/health-check`)).text()).toBe("ok");
    expect(console.error).toHaveBeenCalledWith("Live socket error:", expect.any(Error));
  });

  it("validates requests", async () => {
    await start(REPLY);
    const id = await createSession();

    expect((await fetch(`${baseUrl}/api/sessions/nope`)).status).toBe(404);
    expect((await postJson(`${baseUrl}/api/sessions/${id}/analyze`, {})).status).toBe(400);

    await postJson(`${baseUrl}/api/sessions/${id}/analyze`, { transcript: "t" });
    const bad = await postJson(`${baseUrl}/api/sessions/${id}/answers/0`, { value: "Maybe" }, "PUT");
    expect(bad.status).toBe(400);
    expect(await bad.json()).toMatchObject({ error: { kind: "validation" } });

    expect((await fetch(`${baseUrl}/api/sessions/${id}`, { method: "DELETE" })).status).toBe(204);
    expect((await fetch(`${baseUrl}/api/sessions/${id}`)).status).toBe(404);
  });

  it("streams session events over the live socket", async () => {
    await start(REPLY);
    const id = await createSession();
    const ws = new WebSocket(`${baseUrl.replace("http", "ws")}/api/live`);
    const messages: Array<{ type: string }> = [];
    ws.on("message", (data) => messages.push(JSON.parse(String(data))));
    await new Promise<void>((resolve) => ws.once("open", () => resolve()));

    ws.send(JSON.stringify({ type: "bootstrap", sessionId: id }));
    await vi.waitFor(() => expect(messages.map((m) => m.type)).toEqual(["ready"]));

    await postJson(`${baseUrl}/api/sessions/${id}/analyze`, { transcript: "t" });
    ws.send(JSON.stringify({ type: "select", position: 0, value: "No" }));

    await vi.waitFor(() =>
      expect(messages.map((m) => m.type)).toEqual([
        "ready",
        "analysis_started",
        "analysis_completed",
        "answer_selected",
      ])
    );
    const closed = new Promise<void>((resolve) => ws.once("close", () => resolve()));
    ws.close();
    await closed;
  });
});
