/**
 * Operator HTTP surface
 * GET /health, GET /status, POST /replies
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { ReplyProcessor, ReplyResult } from '../services/reply-processor';
import type { WorkerStatus } from '../services/status';
import { logError, logInfo } from '../observability/logger';

export interface HttpAppDeps {
  replies: ReplyProcessor;
  status: () => Promise<WorkerStatus>;
}

const replyBodySchema = z
  .object({
    alertId: z.string().min(1),
    action: z.string().optional(),
    text: z.string().optional(),
  })
  .refine((body) => body.action !== undefined || body.text !== undefined, {
    message: 'action or text is required',
  });

/** HTTP status per reply result. */
export function replyStatusCode(result: ReplyResult): number {
  switch (result.status) {
    case 'applied':
      return 200;
    case 'not_found':
      return 404;
    case 'terminal':
    case 'conflict':
      return 409;
    case 'invalid_action':
      return 422;
  }
}

export function createHttpApp(deps: HttpAppDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: '100kb' }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logInfo('HTTP request', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - start,
      });
    });
    next();
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.get('/status', async (_req, res, next) => {
    try {
      const status = await deps.status();
      res.status(status.fatalError ? 503 : 200).json(status);
    } catch (error) {
      next(error);
    }
  });

  app.post('/replies', async (req, res, next) => {
    const parsed = replyBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'invalid_body', issues: parsed.error.issues.map((i) => i.message) });
      return;
    }

    try {
      const result = await deps.replies.handleReply(parsed.data);
      res.status(replyStatusCode(result)).json(result);
    } catch (error) {
      next(error);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'not_found' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logError('Unhandled HTTP error', err, { path: req.path });
    res.status(500).json({ error: 'internal_server_error' });
  });

  return app;
}
