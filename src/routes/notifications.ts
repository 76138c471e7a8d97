import { Router } from 'express';
import type { Request, RequestHandler, Response } from 'express';
import { z } from 'zod';

import type { PushSubscriptionStore } from '../repositories/types';

const subscribeSchema = z.object({
  endpoint: z.string().trim().url('endpoint must be a URL.'),
  keys: z.object({
    p256dh: z.string().min(1, 'keys.p256dh is required.'),
    auth: z.string().min(1, 'keys.auth is required.')
  }),
  siloId: z
    .union([z.string(), z.null()])
    .optional()
    .transform(value => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : null;
    })
});

const unsubscribeSchema = z.object({
  endpoint: z.string().trim().min(1, 'endpoint is required.')
});

export function createNotificationsRouter(
  subscriptions: PushSubscriptionStore,
  vapidPublicKey: string | null,
  authenticate: RequestHandler
): Router {
  const router = Router();

  router.get('/vapid-public-key', (_req: Request, res: Response) => {
    if (!vapidPublicKey) {
      res.status(404).json({ error: 'Push notifications are not configured.' });
      return;
    }
    res.status(200).json({ publicKey: vapidPublicKey });
  });

  router.post('/subscriptions', authenticate, async (req: Request, res: Response) => {
    const parseResult = subscribeSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ error: 'Invalid push subscription.', details: parseResult.error.flatten() });
      return;
    }

    try {
      const stored = await subscriptions.upsert(parseResult.data);
      res.status(201).json({ id: stored.id, endpoint: stored.endpoint, siloId: stored.siloId });
    } catch (error) {
      req.log.error({ err: error }, 'Failed to store push subscription');
      res.status(500).json({ error: 'Failed to store push subscription.' });
    }
  });

  router.delete('/subscriptions', authenticate, async (req: Request, res: Response) => {
    const parseResult = unsubscribeSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ error: 'Invalid unsubscribe payload.', details: parseResult.error.flatten() });
      return;
    }

    try {
      await subscriptions.deleteByEndpoint(parseResult.data.endpoint);
      res.status(204).end();
    } catch (error) {
      req.log.error({ err: error }, 'Failed to remove push subscription');
      res.status(500).json({ error: 'Failed to remove push subscription.' });
    }
  });

  return router;
}
