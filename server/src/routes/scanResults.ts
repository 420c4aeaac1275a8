import { Router } from 'express';
import { getResults, getStatus } from '../scan/scanJob.js';

export function createScanResultsRouter() {
  const router = Router();

  router.get('/scan/results/:runId', (req, res) => {
    const status = getStatus(req.params.runId);
    if (!status) {
      return res.status(404).json({ status: 'error', code: 'NOT_FOUND' });
    }
    const results = getResults(req.params.runId);
    if (!results) {
      return res.status(409).json({
        status: 'error',
        code: 'NOT_READY',
        state: status.state,
        lastError: status.lastError,
      });
    }
    return res.json(results);
  });

  return router;
}
