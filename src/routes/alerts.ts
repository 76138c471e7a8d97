import { Router } from 'express';
import type { Request, RequestHandler, Response } from 'express';
import { z } from 'zod';

import { AlertService, MAX_ALERT_LIMIT } from '../alerts/alertService';
import type { AlertRecord } from '../repositories/types';

const listAlertsQuerySchema = z
  .object({
    siloId: z.string().trim().min(1).optional(),
    minLevel: z.enum(['warning', 'critical']).optional(),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
    limit: z.coerce.number().int().min(1).max(MAX_ALERT_LIMIT).optional()
  })
  .refine(query => !query.from || !query.to || query.from.getTime() <= query.to.getTime(), {
    message: 'from must not be after to.',
    path: ['from']
  });

export function serializeAlert(alert: AlertRecord) {
  return {
    id: alert.id,
    siloId: alert.siloId,
    level: alert.level,
    message: alert.message,
    value: alert.value,
    timestamp: alert.timestamp.toISOString(),
    acknowledged: alert.acknowledged,
    ackBy: alert.ackBy,
    ackAt: alert.ackAt ? alert.ackAt.toISOString() : null
  };
}

export function createAlertsRouter(alertService: AlertService, authenticate: RequestHandler): Router {
  const router = Router();

  router.get('/', authenticate, async (req: Request, res: Response) => {
    const parseResult = listAlertsQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      res.status(400).json({ error: 'Invalid alert query.', details: parseResult.error.flatten() });
      return;
    }

    try {
      const alerts = await alertService.list(parseResult.data);
      res.status(200).json({ alerts: alerts.map(serializeAlert) });
    } catch (error) {
      req.log.error({ err: error }, 'Failed to list alerts');
      res.status(500).json({ error: 'Failed to list alerts.' });
    }
  });

  router.post('/:alertId/ack', authenticate, async (req: Request, res: Response) => {
    const { alertId } = req.params;
    const user = req.user;
    if (!user) {
      res.status(401).json({ error: 'Authentication required.' });
      return;
    }

    try {
      const outcome = await alertService.acknowledge(alertId, user.id);
      if (outcome.status === 'not_found') {
        res.status(404).json({ error: 'Alert not found.' });
        return;
      }

      req.log.info({ alertId, userId: user.id, outcome: outcome.status }, 'Alert acknowledgement processed');
      res.status(200).json({ status: outcome.status, alert: serializeAlert(outcome.alert) });
    } catch (error) {
      req.log.error({ err: error, alertId }, 'Failed to acknowledge alert');
      res.status(500).json({ error: 'Failed to acknowledge alert.' });
    }
  });

  return router;
}
