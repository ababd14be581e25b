import type http from "http";
import { WebSocketServer, type WebSocket } from "ws";
import { z } from "zod";
import { IntakeError } from "./llm/errors";
import type { SessionStore } from "./session/sessionStore";

const clientMessage = z.discriminatedUnion("type", [
  z.object({ type: z.literal("bootstrap"), sessionId: z.string() }),
  z.object({
    type: z.literal("select"),
    position: z.number().int(),
    value: z.string(),
  }),
  z.object({ type: z.literal("stop") }),
]);

function send(ws: WebSocket, msg: unknown) {
  ws.send(JSON.stringify(msg));
}

/**
 * Live view of a session. Client messages:
 *  - {type:"bootstrap", sessionId}       -> {type:"ready", snapshot}
 *  - {type:"select", position, value}    -> override a multi-choice answer
 *  - {type:"stop"}
 * Every session event is forwarded as-is after bootstrap.
 */
export function attachLiveServer(server: http.Server, sessions: SessionStore) {
  const wss = new WebSocketServer({ server, path: "/api/live" });

  wss.on("connection", (ws) => {
    let sessionId: string | null = null;
    let unsubscribe: (() => void) | null = null;

    ws.on("message", (raw, isBinary) => {
      if (isBinary) return;
      let decoded: unknown;
      try {
        decoded = JSON.parse(String(raw));
      } catch {
        send(ws, { type: "error", error: "message is not JSON" });
        return;
      }
      const parsed = clientMessage.safeParse(decoded);
      if (!parsed.success) {
        send(ws, { type: "error", error: "unknown message" });
        return;
      }
      const msg = parsed.data;

      try {
        if (msg.type === "bootstrap") {
          const session = sessions.get(msg.sessionId);
          unsubscribe?.();
          sessionId = session.id;
          unsubscribe = session.onEvent((evt) => send(ws, evt));
          send(ws, { type: "ready", snapshot: session.snapshot() });
          return;
        }

        if (msg.type === "select") {
          if (!sessionId) {
            send(ws, { type: "error", error: "bootstrap first" });
            return;
          }
          sessions.get(sessionId).selectAnswer(msg.position, msg.value);
          return;
        }

        ws.close();
      } catch (e) {
        if (e instanceof IntakeError) {
          send(ws, { type: "error", kind: e.kind, error: e.message });
          return;
        }
        console.error("Live message failed:", e);
        send(ws, { type: "error", error: "internal error" });
      }
    });

    ws.on("close", () => {
      unsubscribe?.();
    });

    // malformed frames (bad UTF-8, oversized payloads) end only this socket
    ws.on("error", (err) => {
      console.error("Live socket error:", err);
      unsubscribe?.();
    });
  });

  return wss;
}
