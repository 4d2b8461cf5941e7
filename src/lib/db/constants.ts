// Firestore collection and document path helpers

export const sessionsCollection = (agent: string) => `agents/${agent}/sessions`;
export const sessionDoc = (agent: string, sessionId: string) => `agents/${agent}/sessions/${sessionId}`;
export const eventsCollection = (agent: string, sessionId: string) => `agents/${agent}/sessions/${sessionId}/events`;
