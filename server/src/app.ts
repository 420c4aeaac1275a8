import cors from 'cors';
import express from 'express';
import type { ScanDefaults } from './config/scanConfig.js';
import { createRequestLogger } from './logger.js';
import { createLogsRouter } from './routes/logs.js';
import { createScanCancelRouter } from './routes/scanCancel.js';
import { createScanDecisionRouter } from './routes/scanDecision.js';
import { createScanResultsRouter } from './routes/scanResults.js';
import { createScanStartRouter } from './routes/scanStart.js';
import type { ScanDeps } from './scan/scanJob.js';
import { versionInfo } from './version.js';

export type AppOptions = {
  defaults?: ScanDefaults;
  deps?: ScanDeps;
  requestLogging?: boolean;
};

export function createApp({
  defaults,
  deps,
  requestLogging = true,
}: AppOptions = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json());
  if (requestLogging) app.use(createRequestLogger());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime(), timestamp: Date.now() });
  });

  app.get('/version', (_req, res) => {
    res.json(versionInfo('server'));
  });

  app.use('/logs', createLogsRouter());
  app.use('/', createScanStartRouter({ defaults, deps }));
  app.use('/', createScanDecisionRouter());
  app.use('/', createScanCancelRouter());
  app.use('/', createScanResultsRouter());

  return app;
}

export * from './scan/index.js';
export * from './config/scanConfig.js';
