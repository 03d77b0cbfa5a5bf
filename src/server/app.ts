import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { componentLogger } from '../logger';
import type { ChatSession } from '../session/chatSession';
import { ErrorCodes, TravelAgentError } from '../types/errors';
import { renderChatPage } from './render';

const log = componentLogger('http');

const MessageBody = z.object({
  text: z.string().trim().min(1, 'Missing text'),
});

const FormBody = z.object({
  message: z.string().optional(),
});

const STATUS_BY_CODE: Partial<Record<ErrorCodes, number>> = {
  [ErrorCodes.INVALID_REQUEST]: 400,
  [ErrorCodes.EMPTY_MESSAGE]: 400,
  [ErrorCodes.TURN_IN_PROGRESS]: 409,
};

// body-parser marks its errors (bad JSON, body too large) with an HTTP status
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createApp(session: ChatSession) {
  const app = express();

  // ---------- Chat page ----------
  app.get('/', (_req, res) => {
    res.type('html').send(renderChatPage({ profile: session.profile, turns: session.turns, busy: session.busy }));
  });

  // Form post: start the turn and go straight back to the page, which shows
  // the busy notice and refreshes until the reply is in
  app.post('/messages', express.urlencoded({ extended: false }), (req, res) => {
    const form = FormBody.safeParse(req.body);
    const message = form.success ? (form.data.message ?? '').trim() : '';
    if (message) {
      if (session.busy) {
        throw new TravelAgentError('A reply is still being prepared', ErrorCodes.TURN_IN_PROGRESS);
      }
      session.submit(message).catch((err: unknown) => {
        log.error({ err }, 'turn started from the chat page failed');
      });
    }
    res.redirect(303, '/');
  });

  // ---------- JSON API ----------
  const api = express.Router();
  api.use(cors());
  api.use(express.json({ limit: '1mb' }));

  api.get('/transcript', (_req, res) => {
    res.json({ profile: session.profile, busy: session.busy, turns: session.turns });
  });

  api.post(
    '/messages',
    asyncRoute(async (req, res) => {
      const body = MessageBody.safeParse(req.body ?? {});
      if (!body.success) {
        throw new TravelAgentError('Missing text', ErrorCodes.EMPTY_MESSAGE, body.error.issues);
      }
      const outcome = await session.submit(body.data.text);
      res.json({ outcome, turns: session.turns });
    }),
  );

  app.use('/api', api);

  // Health
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof TravelAgentError) {
      const status = STATUS_BY_CODE[err.code] ?? 500;
      if (status >= 500) log.error({ err }, 'request failed');
      res.status(status).json({ error: { code: err.code, message: err.message } });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      const message = status === 413 ? 'Request body too large' : 'Invalid request body';
      res.status(status).json({ error: { code: ErrorCodes.INVALID_REQUEST, message } });
      return;
    }
    log.error({ err }, 'unexpected error');
    res.status(500).json({ error: { code: 'INTERNAL', message: 'Unknown error' } });
  });

  return app;
}
