// src/http/routes/sessionRoutes.ts

/**
 * Conversation session routes
 * ---------------------------
 * Thin HTTP boundary over Runtime: validate -> delegate -> return JSON.
 * Errors bubble to the global error handler.
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';

import type { ConversationTurn } from '../../dispatch/domain/Conversation';
import { parseChatMessageDto } from '../../dispatch/dto/ChatMessageDto';

export type SessionPort = {
  readonly sessionId: string;
  submitUserMessage(text: string): Promise<string>;
  getHistory(): readonly ConversationTurn[];
};

export type SessionRuntimePort = {
  createSession(): SessionPort;
  getSession(sessionId: string): SessionPort;
  closeSession(sessionId: string): void;
};

export function createSessionRoutes(runtime: SessionRuntimePort): Router {
  const router = Router();

  router.post('/v1/sessions', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const session = runtime.createSession();
      return res.status(201).json({ sessionId: session.sessionId });
    } catch (err) {
      return next(err);
    }
  });

  router.post(
    '/v1/sessions/:sessionId/messages',
    async (req: Request<{ sessionId: string }>, res: Response, next: NextFunction) => {
      try {
        const session = runtime.getSession(req.params.sessionId);
        const { text } = parseChatMessageDto(req.body);
        const reply = await session.submitUserMessage(text);
        return res.status(200).json({ sessionId: session.sessionId, reply });
      } catch (err) {
        return next(err);
      }
    },
  );

  router.get(
    '/v1/sessions/:sessionId/history',
    (req: Request<{ sessionId: string }>, res: Response, next: NextFunction) => {
      try {
        const session = runtime.getSession(req.params.sessionId);
        return res.status(200).json({ sessionId: session.sessionId, turns: session.getHistory() });
      } catch (err) {
        return next(err);
      }
    },
  );

  router.delete(
    '/v1/sessions/:sessionId',
    (req: Request<{ sessionId: string }>, res: Response, next: NextFunction) => {
      try {
        runtime.closeSession(req.params.sessionId);
        return res.status(204).send();
      } catch (err) {
        return next(err);
      }
    },
  );

  return router;
}
