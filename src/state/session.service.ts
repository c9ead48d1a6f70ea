import { randomUUID } from "node:crypto";
import { ScreeningError } from "../shared/errors";
import type { ConversationEngine } from "../screening/conversation.engine";

export interface ScreeningSession {
  readonly id: string;
  readonly createdAt: string;
  engine: ConversationEngine;
}

export type EngineFactory = (sessionId: string) => ConversationEngine;

/**
 * Owns one conversation engine per screening session. Sessions live in memory
 * for the lifetime of the process.
 */
export class SessionService {
  private readonly sessions = new Map<string, ScreeningSession>();
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly engineFactory: EngineFactory,
    private readonly idFactory: () => string = randomUUID,
  ) {}

  create(): ScreeningSession {
    const id = this.idFactory();
    const session: ScreeningSession = {
      id,
      createdAt: new Date().toISOString(),
      engine: this.engineFactory(id),
    };
    this.sessions.set(id, session);
    return session;
  }

  get(sessionId: string): ScreeningSession | null {
    return this.sessions.get(sessionId) ?? null;
  }

  getRequired(sessionId: string): ScreeningSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new ScreeningError("session_not_found", `Screening session not found: ${sessionId}`);
    }
    return session;
  }

  /** Drops transcript, profile, phase, generated questions and mood by swapping in a fresh engine. */
  reset(sessionId: string): ScreeningSession {
    const session = this.getRequired(sessionId);
    session.engine = this.engineFactory(sessionId);
    return session;
  }

  delete(sessionId: string): boolean {
    this.inFlight.delete(sessionId);
    return this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }

  /** Serializes turns: a second call for the same session fails while one is running. */
  async runExclusive<T>(sessionId: string, work: (session: ScreeningSession) => Promise<T>): Promise<T> {
    const session = this.getRequired(sessionId);
    if (this.inFlight.has(sessionId)) {
      throw new ScreeningError("session_busy", "Another message for this session is still being processed.");
    }
    this.inFlight.add(sessionId);
    try {
      return await work(session);
    } finally {
      this.inFlight.delete(sessionId);
    }
  }
}
