import { SessionNotFoundError } from "../llm/errors";
import { AnalysisSession, type SessionDeps } from "./analysisSession";

// Sessions live in process memory until DELETE /api/sessions/:id or restart
export class SessionStore {
  private readonly sessions = new Map<string, AnalysisSession>();

  constructor(private readonly deps: SessionDeps) {}

  create(): AnalysisSession {
    const session = new AnalysisSession(this.deps);
    this.sessions.set(session.id, session);
    return session;
  }

  get(sessionId: string): AnalysisSession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }
}
