import { Router } from 'express';
import { cancelScan } from '../scan/scanJob.js';

export function createScanCancelRouter() {
  const router = Router();

  router.post('/scan/cancel/:runId', (req, res) => {
    const result = cancelScan(req.params.runId);
    if (!result.found) {
      return res.status(404).json({ status: 'error', code: 'NOT_FOUND' });
    }
    return res.json({ status: 'ok', state: result.state });
  });

  return router;
}
