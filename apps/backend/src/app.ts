import express, { type Express } from 'express';
import cors from 'cors';
import { requestLogger } from './middleware/logger.js';
import { createGovernanceRouter } from './routes/governance.js';
import { createHealthRouter } from './routes/health.js';
import type { GovernanceRuntime } from './runtime.js';

export function createApp(runtime: GovernanceRuntime): Express {
  const app = express();

  // ─── Middleware ──────────────────────────────────────────
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  // ─── Routes ─────────────────────────────────────────────
  app.use('/', createHealthRouter(runtime));
  app.use('/api/governance', createGovernanceRouter(runtime.engine));

  return app;
}
