import { Request, Response } from 'express';
import logger from 'jet-logger';
import HttpStatusCodes from '../../constants/HttpStatusCodes';
import { parseRequest } from '../../other/errorHandler';
import { CreateSessionSchema, SendMessageSchema } from './sessions.dto';
import type { SessionsService } from './sessions.service';

export function createSessionsController(service: SessionsService) {
  async function createSession(req: Request, res: Response) {
    const body = parseRequest(CreateSessionSchema, req.body);
    const session = await service.createSession(body);
    res.status(HttpStatusCodes.CREATED).json({ success: true, session });
  }

  async function getSession(req: Request<{ sessionId: string }>, res: Response) {
    const session = await service.getSession(req.params.sessionId);
    res.status(HttpStatusCodes.OK).json({ success: true, session });
  }

  async function listEvents(req: Request<{ sessionId: string }>, res: Response) {
    const events = await service.listEvents(req.params.sessionId);
    res.status(HttpStatusCodes.OK).json({ success: true, events, count: events.length });
  }

  // A client that disconnects mid-turn cancels it; nothing is committed
  async function sendMessage(req: Request<{ sessionId: string }>, res: Response) {
    const { message } = parseRequest(SendMessageSchema, req.body);
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        logger.warn(`[Sessions] Client left during turn for ${req.params.sessionId}; cancelling`);
        controller.abort();
      }
    });

    const result = await service.sendMessage(req.params.sessionId, message, controller.signal);
    res.status(HttpStatusCodes.OK).json({ success: true, ...result });
  }

  return { createSession, getSession, listEvents, sendMessage };
}
