import { Request, Response, NextFunction } from 'express';
import '../types/http';
import { CreditsService } from '../services/creditsService';
import { formatApiResponse } from '../utils/formatApiResponse';

export function createCreditsController(credits: CreditsService) {
  async function me(req: Request, res: Response, next: NextFunction) {
    try {
      const report = await credits.checkEntitlement(req.uid, { email: req.email });
      res.json(formatApiResponse('success', 'Entitlement fetched', report));
    } catch (err) {
      next(err);
    }
  }

  async function recordUsage(req: Request, res: Response, next: NextFunction) {
    try {
      const result = await credits.recordUsage(req.uid, String(req.body.actionType));
      res.json(formatApiResponse('success', 'Usage recorded', result));
    } catch (err) {
      next(err);
    }
  }

  async function usage(req: Request, res: Response, next: NextFunction) {
    try {
      const entries = await credits.listUsage(req.uid);
      res.json(formatApiResponse('success', 'Usage fetched', { entries }));
    } catch (err) {
      next(err);
    }
  }

  return { me, recordUsage, usage };
}
