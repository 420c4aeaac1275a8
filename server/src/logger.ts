import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import pino, { type Logger } from 'pino';
import { pinoHttp } from 'pino-http';
import { z } from 'zod';

const LogEnvSchema = z.object({
  LOG_FILE_PATH: z.string().trim().min(1).catch('./logs/dupsweep.log'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .catch('info'),
  LOG_BUFFER_MAX: z.coerce.number().int().positive().catch(5000),
});

export type LogConfig = {
  filePath: string;
  level: z.infer<typeof LogEnvSchema>['LOG_LEVEL'];
  bufferMax: number;
};

export function resolveLogConfig(
  env: NodeJS.ProcessEnv = process.env,
): LogConfig {
  const parsed = LogEnvSchema.parse({
    LOG_FILE_PATH: env.LOG_FILE_PATH,
    LOG_LEVEL: env.LOG_LEVEL,
    LOG_BUFFER_MAX: env.LOG_BUFFER_MAX,
  });
  return {
    filePath: parsed.LOG_FILE_PATH,
    level: parsed.LOG_LEVEL,
    bufferMax: parsed.LOG_BUFFER_MAX,
  };
}

const { filePath: logFilePath, level } = resolveLogConfig();
fs.mkdirSync(path.dirname(logFilePath), { recursive: true });

export const baseLogger = pino(
  {
    level,
    base: { app: 'dupsweep' },
  },
  pino.destination({ dest: logFilePath, sync: false }),
);

export type ScanLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export function createRequestLogger() {
  return pinoHttp({
    logger: baseLogger,
    genReqId: () => crypto.randomUUID(),
  });
}
