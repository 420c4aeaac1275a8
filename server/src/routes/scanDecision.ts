import { isBudgetDecision } from '@dupsweep/common';
import { Router } from 'express';
import { decide } from '../scan/scanJob.js';
import { sendScanError } from './scanErrors.js';

export function createScanDecisionRouter() {
  const router = Router();

  router.post('/scan/:runId/decision', (req, res) => {
    const body: unknown = req.body;
    if (!isBudgetDecision(body)) {
      return res.status(400).json({
        status: 'error',
        code: 'INVALID_CONFIGURATION',
        issues: [
          {
            path: 'action',
            message:
              'expected { action: "continue" } or { action: "raise", minSize }',
          },
        ],
      });
    }
    try {
      decide(req.params.runId, body);
      return res.json({ status: 'ok' });
    } catch (err) {
      return sendScanError(res, err);
    }
  });

  return router;
}
