import { randomUUID } from "crypto";
import { SessionNotFoundError } from "../ai/core/errors";
import type { Session, SessionEvent, SessionStore, TurnCommit } from "../ai/types/session";

interface Entry {
  session: Session;
  events: SessionEvent[];
}

// Process-local store; returns copies so callers never share state with it
export class MemorySessionStore implements SessionStore {
  private entries = new Map<string, Entry>();

  async create(input: { customerId: string; tags?: string[] }): Promise<Session> {
    const now = new Date().toISOString();
    const session: Session = {
      id: randomUUID(),
      customerId: input.customerId,
      tags: input.tags ?? [],
      eventCount: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.entries.set(session.id, { session, events: [] });
    return structuredClone(session);
  }

  async get(sessionId: string): Promise<Session | null> {
    const entry = this.entries.get(sessionId);
    return entry ? structuredClone(entry.session) : null;
  }

  async listEvents(sessionId: string): Promise<SessionEvent[]> {
    const entry = this.entries.get(sessionId);
    return entry ? structuredClone(entry.events) : [];
  }

  async commitTurn(sessionId: string, commit: TurnCommit): Promise<Session> {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      throw new SessionNotFoundError(sessionId);
    }
    const now = new Date().toISOString();
    const events: SessionEvent[] = commit.events.map((payload, idx) => ({
      ...payload,
      id: randomUUID(),
      offset: entry.session.eventCount + idx,
      turnId: commit.turnId,
      createdAt: now,
    }));

    entry.events.push(...structuredClone(events));
    entry.session = {
      ...entry.session,
      journey: structuredClone(commit.journey),
      eventCount: entry.session.eventCount + events.length,
      updatedAt: now,
    };
    return structuredClone(entry.session);
  }
}
