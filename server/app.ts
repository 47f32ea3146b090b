import cors from 'cors';
import express, { type ErrorRequestHandler, type Express, type RequestHandler } from 'express';
import helmet from 'helmet';
import multer from 'multer';
import { ZodError } from 'zod';
import type { AppConfig } from './config';
import { HttpError, errorMessage } from './errors';
import { colors, createLogger, type Logger } from './logger';
import { createInsightsRouter } from './routes/insights';
import { createPageRouter } from './routes/page';
import { createStorageRouter } from './routes/storage';
import { createTranscriptionRouter } from './routes/transcription';
import type { InsightsService } from './services/llmService';
import type { SessionStore } from './services/sessionStore';
import type { Transcriber } from './services/transcriptionService';

export interface AppDeps {
  config: AppConfig;
  transcriber: Transcriber;
  insights: InsightsService;
  store: SessionStore;
  webRoot: string;
  now?: () => Date;
  log?: Logger;
}

const JSON_BODY_LIMIT = '10mb';

const requestLogger = (log: Logger): RequestHandler => (req, res, next) => {
  const start = performance.now();
  res.on('finish', () => {
    const duration = (performance.now() - start).toFixed(2);
    const color = res.statusCode >= 400 ? colors.red : colors.green;
    log.info(`${color}[${req.method}] ${res.statusCode} ${req.path}${colors.reset} (${duration}ms)`);
  });
  next();
};

const permissionsPolicy: RequestHandler = (_req, res, next) => {
  res.setHeader('Permissions-Policy', 'microphone=(self)');
  next();
};

const securityHeaders = () =>
  helmet({
    contentSecurityPolicy: {
      useDefaults: false,
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'"],
        connectSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'blob:'],
        styleSrc: ["'self'", "'unsafe-inline'", 'https://fonts.googleapis.com'],
        fontSrc: ['https://fonts.gstatic.com'],
        mediaSrc: ["'self'", 'blob:'],
        frameSrc: ["'none'"],
        frameAncestors: ["'none'"],
        baseUri: ["'self'"],
        formAction: ["'self'"]
      }
    },
    referrerPolicy: { policy: 'no-referrer' },
    crossOriginEmbedderPolicy: false
  });

const hasClientStatus = (error: unknown): error is { status: number; message: string } =>
  typeof error === 'object' &&
  error !== null &&
  'status' in error &&
  typeof error.status === 'number' &&
  error.status >= 400 &&
  error.status < 500 &&
  'message' in error &&
  typeof error.message === 'string';

export const errorHandler = (log: Logger): ErrorRequestHandler => (error, req, res, _next) => {
  if (error instanceof HttpError) {
    res.status(error.status).json({ error: error.message });
    return;
  }
  if (error instanceof ZodError) {
    res.status(400).json({
      error: 'Invalid request',
      issues: error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
    });
    return;
  }
  if (error instanceof multer.MulterError) {
    const tooLarge = error.code === 'LIMIT_FILE_SIZE';
    res.status(tooLarge ? 413 : 400).json({ error: tooLarge ? 'File too large' : error.message });
    return;
  }
  // body-parser failures (malformed JSON, oversized body) carry their own 4xx status.
  if (hasClientStatus(error)) {
    res.status(error.status).json({ error: error.message });
    return;
  }

  log.error(`${req.method} ${req.path} failed`, error);
  res.status(500).json({ error: errorMessage(error) });
};

export const createApp = ({ config, transcriber, insights, store, webRoot, now = () => new Date(), log = createLogger('http') }: AppDeps): Express => {
  const app = express();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: config.maxUploadBytes } });

  app.disable('x-powered-by');
  app.use(requestLogger(log));
  app.use(securityHeaders());
  app.use(permissionsPolicy);
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', provider: config.provider });
  });

  app.use(createTranscriptionRouter({ config, transcriber, store, upload, now, log }));
  app.use(createStorageRouter({ config, store, upload, now, log }));
  app.use(createInsightsRouter({ insights, log }));
  app.use(createPageRouter({ config, webRoot, log }));

  app.use(errorHandler(log));

  return app;
};
