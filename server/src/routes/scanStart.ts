import { Router } from 'express';
import { z } from 'zod';
import {
  assertScanRoot,
  parseScanOptions,
  ScanOptionsSchema,
  type ScanDefaults,
} from '../config/scanConfig.js';
import { InvalidConfigurationError } from '../scan/errors.js';
import {
  getStatus,
  isBusy,
  startScan,
  type ScanDeps,
} from '../scan/scanJob.js';
import { sendScanError } from './scanErrors.js';

const StartBodySchema = ScanOptionsSchema.extend({
  mode: z.enum(['size', 'name']),
});

export function createScanStartRouter({
  defaults,
  deps = {},
}: {
  defaults?: ScanDefaults;
  deps?: ScanDeps;
} = {}) {
  const router = Router();

  router.post('/scan/start', async (req, res) => {
    try {
      const parsed = StartBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new InvalidConfigurationError(
          parsed.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          })),
        );
      }
      const { mode, ...rest } = parsed.data;
      const options = parseScanOptions(rest, defaults);
      await assertScanRoot(options.root);
      if (isBusy()) {
        return res.status(429).json({ status: 'error', code: 'BUSY' });
      }
      const runId = startScan({ mode, options }, deps);
      return res.status(202).json({ runId });
    } catch (err) {
      return sendScanError(res, err);
    }
  });

  router.get('/scan/status/:runId', (req, res) => {
    const status = getStatus(req.params.runId);
    if (!status)
      return res.status(404).json({ status: 'error', code: 'NOT_FOUND' });
    return res.json(status);
  });

  return router;
}
