import type { Response } from 'express';
import {
  describeError,
  InvalidConfigurationError,
  NoPendingDecisionError,
  ScanBusyError,
  ScanNotFoundError,
} from '../scan/errors.js';

export function sendScanError(res: Response, err: unknown) {
  if (err instanceof InvalidConfigurationError) {
    return res
      .status(400)
      .json({ status: 'error', code: err.code, issues: err.issues });
  }
  if (err instanceof ScanBusyError) {
    return res.status(429).json({
      status: 'error',
      code: err.code,
      activeRunId: err.activeRunId,
    });
  }
  if (err instanceof ScanNotFoundError) {
    return res.status(404).json({ status: 'error', code: err.code });
  }
  if (err instanceof NoPendingDecisionError) {
    return res.status(409).json({ status: 'error', code: err.code });
  }
  return res
    .status(500)
    .json({ status: 'error', message: describeError(err) });
}
