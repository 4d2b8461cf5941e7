import { sessionsRoutes } from './sessions/sessions.router';
import { agentRoutes } from './agent/agent.router';

export { sessionsRoutes, agentRoutes };
