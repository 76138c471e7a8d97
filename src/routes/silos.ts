import { Router } from 'express';
import type { Request, RequestHandler, Response } from 'express';
import { z } from 'zod';

import type { SiloEventStore } from '../repositories/types';

const eventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100)
});

export function createSilosRouter(events: SiloEventStore, authenticate: RequestHandler): Router {
  const router = Router();

  router.get('/:siloId/events', authenticate, async (req: Request, res: Response) => {
    const { siloId } = req.params;
    const parseResult = eventsQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      res.status(400).json({ error: 'Invalid events query.', details: parseResult.error.flatten() });
      return;
    }

    try {
      const list = await events.listBySilo(siloId, parseResult.data.limit);
      res.status(200).json({
        events: list.map(event => ({
          id: event.id,
          siloId: event.siloId,
          eventType: event.eventType,
          payload: event.payload,
          timestamp: event.timestamp.toISOString()
        }))
      });
    } catch (error) {
      req.log.error({ err: error, siloId }, 'Failed to list silo events');
      res.status(500).json({ error: 'Failed to list silo events.' });
    }
  });

  return router;
}
