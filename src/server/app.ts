import express from 'express';
import cors from 'cors';
import { healthRouter } from './routes/health.js';
import { voicebanksRouter } from './routes/voicebanks.js';
import { phonemizeRouter } from './routes/phonemize.js';
import { requireAuth } from './middleware/auth.js';
import { rateLimit } from './middleware/rateLimit.js';

export function createApp() {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // API Routes (auth-gated when AUTH_TOKEN is set)
  app.use('/api/health', healthRouter);
  app.use('/api/voicebanks', (req, res, next) => requireAuth(req, res, next), voicebanksRouter);
  app.use(
    '/api/phonemize',
    (req, res, next) => requireAuth(req, res, next),
    (req, res, next) => rateLimit(req, res, next),
    phonemizeRouter,
  );

  return app;
}
