import 'dotenv/config';
import { createApp } from './app.js';
import { baseLogger } from './logger.js';
import * as scanLock from './scan/lock.js';
import { cancelScan } from './scan/scanJob.js';

const PORT = process.env.PORT ?? '5010';
const app = createApp();

const server = app.listen(Number(PORT), () =>
  baseLogger.info({ port: PORT }, `Server on ${PORT}`),
);

const shutdown = (signal: NodeJS.Signals) => {
  baseLogger.info({ signal }, 'Shutting down');
  const active = scanLock.currentOwner();
  if (active) cancelScan(active);
  server.close(() => process.exit(0));
};

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
signals.forEach((sig) => {
  process.on(sig, () => shutdown(sig));
});
