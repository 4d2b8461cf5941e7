import { Router, Request, Response } from "express";
import { sessionsRoutes, agentRoutes } from "./entities";
import type { GuidelineAgent } from "./lib/ai/guideline-agent";

export function createApiRouter(agent: GuidelineAgent): Router {
  const apiRouter = Router();

  apiRouter.get("/test", (_req: Request, res: Response) => {
    res.send("OK");
  });

  // Sessions and turns
  apiRouter.use("/sessions", sessionsRoutes(agent));

  // Agent configuration
  apiRouter.use("/agent", agentRoutes(agent));

  return apiRouter;
}
