import type { GuidelineAgent, TurnResult } from '../../lib/ai/guideline-agent';
import type { Session, SessionEvent } from '../../lib/ai/types/session';
import type { CreateSessionRequest } from './sessions.dto';

export interface SessionsService {
  createSession(body: CreateSessionRequest): Promise<Session>;
  getSession(sessionId: string): Promise<Session>;
  listEvents(sessionId: string): Promise<SessionEvent[]>;
  sendMessage(sessionId: string, message: string, signal: AbortSignal): Promise<TurnResult>;
}

export function createSessionsService(agent: GuidelineAgent): SessionsService {
  return {
    createSession: body => agent.createSession(body.customerId, body.tags),
    getSession: sessionId => agent.getSession(sessionId),
    listEvents: sessionId => agent.listEvents(sessionId),
    sendMessage: (sessionId, message, signal) => agent.processMessage(sessionId, message, { signal })
  };
}
