import { randomUUID } from "crypto";
import logger from "jet-logger";
import { z } from "zod";
import { getDb } from "../firebase";
import { eventsCollection, sessionDoc, sessionsCollection } from "../constants";
import { SessionNotFoundError } from "../../ai/core/errors";
import { TOOL_STATUSES } from "../../ai/types/tool";
import { COMPOSITION_STATUSES } from "../../ai/types/composition";
import type { JourneyInstance } from "../../ai/types/journey";
import type { Session, SessionEvent, SessionStore, TurnCommit } from "../../ai/types/session";

const JourneyInstanceSchema = z.object({
  journeyId: z.string(),
  stateId: z.string(),
  phase: z.enum(["pending", "presented"]),
  status: z.enum(["active", "completed", "abandoned"]),
  facts: z.record(z.string()),
  path: z.array(z.string()),
  activatedAt: z.string(),
});

const SessionDocSchema = z.object({
  customerId: z.string(),
  tags: z.array(z.string()).default([]),
  journey: JourneyInstanceSchema.nullable().default(null),
  eventCount: z.number().int().nonnegative().default(0),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const EventPayloadSchema = z.union([
  z.object({ kind: z.literal("message"), source: z.literal("customer"), text: z.string() }),
  z.object({ kind: z.literal("message"), source: z.literal("agent"), text: z.string(), status: z.enum(COMPOSITION_STATUSES) }),
  z.object({ kind: z.literal("tool"), source: z.literal("agent"), toolName: z.string(), status: z.enum(TOOL_STATUSES) }),
  z.object({ kind: z.literal("status"), source: z.literal("system"), status: z.string(), detail: z.string().optional() }),
]);

const EventDocSchema = z.intersection(
  EventPayloadSchema,
  z.object({ id: z.string(), offset: z.number().int(), turnId: z.string(), createdAt: z.string() })
);

function toSession(id: string, data: unknown): Session {
  const parsed = SessionDocSchema.parse(data);
  const journey: JourneyInstance | undefined = parsed.journey ?? undefined;
  return { id, ...parsed, journey };
}

/**
 * Sessions under agents/{agent}/sessions with an events subcollection.
 * A turn's events and the journey pointer are written in one transaction;
 * offsets continue from the stored event count.
 */
export class FirestoreSessionStore implements SessionStore {
  constructor(private readonly agent: string) {}

  async create(input: { customerId: string; tags?: string[] }): Promise<Session> {
    const now = new Date().toISOString();
    const ref = getDb().collection(sessionsCollection(this.agent)).doc(randomUUID());
    const data = {
      customerId: input.customerId,
      tags: input.tags ?? [],
      journey: null,
      eventCount: 0,
      createdAt: now,
      updatedAt: now,
    };
    await ref.set(data);
    logger.info(`[Sessions] Created session ${ref.id} for customer ${input.customerId}`);
    return toSession(ref.id, data);
  }

  async get(sessionId: string): Promise<Session | null> {
    const snapshot = await getDb().doc(sessionDoc(this.agent, sessionId)).get();
    if (!snapshot.exists) return null;
    return toSession(snapshot.id, snapshot.data());
  }

  async listEvents(sessionId: string): Promise<SessionEvent[]> {
    const snapshot = await getDb()
      .collection(eventsCollection(this.agent, sessionId))
      .orderBy("offset", "asc")
      .get();
    return snapshot.docs.map(doc => EventDocSchema.parse(doc.data()));
  }

  async commitTurn(sessionId: string, commit: TurnCommit): Promise<Session> {
    const db = getDb();
    const ref = db.doc(sessionDoc(this.agent, sessionId));

    return db.runTransaction(async tx => {
      const snapshot = await tx.get(ref);
      if (!snapshot.exists) {
        throw new SessionNotFoundError(sessionId);
      }
      const current = toSession(snapshot.id, snapshot.data());
      const now = new Date().toISOString();

      commit.events.forEach((payload, idx) => {
        const eventRef = db.collection(eventsCollection(this.agent, sessionId)).doc();
        tx.set(eventRef, {
          ...payload,
          id: eventRef.id,
          offset: current.eventCount + idx,
          turnId: commit.turnId,
          createdAt: now,
        });
      });

      const eventCount = current.eventCount + commit.events.length;
      tx.update(ref, { journey: commit.journey ?? null, eventCount, updatedAt: now });
      return { ...current, journey: commit.journey, eventCount, updatedAt: now };
    });
  }
}
