import 'dotenv/config';
import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import { loadConfig } from './config';
import { AppDependencies, createDependencies } from './container';
import { AbortedError, getErrorMessage, SessionStateError } from './utils/errors';
import { logger, moduleLogger } from './utils/logger';
import { MAX_MESSAGE_LENGTH, sanitizeInput } from './utils/sanitize';

const log = moduleLogger('server');

const chatSchema = z.object({
  message: z.string().min(1).max(MAX_MESSAGE_LENGTH),
  sessionId: z.string().min(1).max(128),
});

const clearSchema = z.object({
  sessionId: z.string().min(1).max(128),
});

const isBadRequest = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'status' in error && error.status === 400;

export const createApp = ({ config, core, sessions }: AppDependencies): express.Express => {
  const app = express();

  app.use(express.json({ limit: '100kb' }));
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || config.allowedOrigins.includes(origin)) {
          callback(null, origin ?? config.allowedOrigins[0]);
        } else {
          callback(new Error('Not allowed by CORS'));
        }
      },
      credentials: false,
    })
  );
  app.use(helmet());

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: 60,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  app.post('/api/chat', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = chatSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: getErrorMessage(parsed.error) });
    }
    const { sessionId } = parsed.data;
    const message = sanitizeInput(parsed.data.message);
    if (!message) {
      return res.status(400).json({ error: 'message: empty after sanitizing' });
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const result = await sessions.run(sessionId, (session) =>
        core.resolve(message, session, { signal: controller.signal })
      );
      log.info(`session=${sessionId} intent=${result.intent} state=${result.state}`);
      return res.json({ reply: result.reply, intent: result.intent, state: result.state });
    } catch (error) {
      if (error instanceof AbortedError) {
        log.info(`session=${sessionId} request aborted by client`);
        return undefined;
      }
      return next(error);
    }
  });

  app.post('/api/clear', (req: Request, res: Response) => {
    const parsed = clearSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: getErrorMessage(parsed.error) });
    }
    const cleared = sessions.clear(parsed.data.sessionId);
    return res.json({ status: 'ok', cleared });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBadRequest(error)) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }
    if (error instanceof SessionStateError) {
      log.error(`corrupt session state: ${error.message}`);
    } else {
      log.error(`unhandled error: ${getErrorMessage(error)}`);
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
};

const start = async (): Promise<void> => {
  const config = loadConfig();
  logger.level = config.logLevel;
  const app = createApp(await createDependencies(config));
  app.listen(config.port, () => {
    log.info(`chat core listening on http://localhost:${config.port}`);
  });
};

if (require.main === module) {
  start().catch((error: unknown) => {
    log.error(`startup failed: ${getErrorMessage(error)}`);
    process.exit(1);
  });
}
