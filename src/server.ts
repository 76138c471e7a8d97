import { randomUUID } from 'node:crypto';

import cors from 'cors';
import type { CorsOptions } from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import type { Secret } from 'jsonwebtoken';
import type { Logger } from 'pino';
import pinoHttp from 'pino-http';

import { AlertService } from './alerts/alertService';
import { createAuthMiddleware } from './auth';
import type { NotificationChannels } from './notifications/channels/types';
import type { PushSubscriptionStore, SiloEventStore } from './repositories/types';
import { createAlertsRouter } from './routes/alerts';
import { createNotificationsRouter } from './routes/notifications';
import { createSilosRouter } from './routes/silos';

export interface HttpSettings {
  authSecret: Secret;
  trustProxy: boolean;
  allowRequestsWithoutOrigin: boolean;
  isAllowedOrigin: (origin: string) => boolean;
  rateLimit: { windowMs: number; max: number } | null;
  vapidPublicKey: string | null;
}

export interface AppDependencies {
  alertService: AlertService;
  events: SiloEventStore;
  subscriptions: PushSubscriptionStore;
  channels: NotificationChannels;
  accessLogger: Logger;
  isDatabaseReady: () => boolean;
  settings: HttpSettings;
}

export function createApp(deps: AppDependencies): express.Express {
  const { settings } = deps;
  const app = express();

  app.set('trust proxy', settings.trustProxy);

  const corsOptions: CorsOptions = {
    origin: (origin, callback) => {
      if (!origin) {
        if (settings.allowRequestsWithoutOrigin) {
          callback(null, true);
        } else {
          callback(new Error('Origin header is required.'));
        }
        return;
      }

      if (settings.isAllowedOrigin(origin)) {
        callback(null, true);
        return;
      }

      callback(new Error(`Origin ${origin} is not allowed.`));
    },
    credentials: true
  };

  app.use(cors(corsOptions));

  app.use(
    pinoHttp({
      logger: deps.accessLogger,
      genReqId: (request, response) => {
        const header = request.headers['x-request-id'];
        const fromHeader = (Array.isArray(header) ? header[0] : header)?.trim();
        const requestId = fromHeader && fromHeader.length > 0 ? fromHeader : randomUUID();
        response.setHeader('x-request-id', requestId);
        return requestId;
      },
      customProps: (_request, response) => ({
        outcome: response.statusCode >= 500 ? 'error' : response.statusCode >= 400 ? 'rejected' : 'success'
      }),
      customLogLevel: (_req, res, err) => {
        if (err || res.statusCode >= 500) {
          return 'error';
        }
        if (res.statusCode >= 400) {
          return 'warn';
        }
        return 'info';
      },
      customSuccessMessage: req => `${req.method} ${req.url} completed`,
      customErrorMessage: req => `${req.method} ${req.url} errored`
    })
  );

  if (settings.rateLimit) {
    app.use(
      rateLimit({
        windowMs: settings.rateLimit.windowMs,
        max: settings.rateLimit.max,
        standardHeaders: true,
        legacyHeaders: false,
        message: 'Too many requests. Please try again later.'
      })
    );
  }

  app.use(express.json({ limit: '1mb' }));

  const authenticate = createAuthMiddleware(settings.authSecret);

  app.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/readyz', (_req: Request, res: Response) => {
    const channelState = (enabled: boolean) => (enabled ? 'enabled' : 'disabled');
    const databaseReady = deps.isDatabaseReady();
    res.status(databaseReady ? 200 : 503).json({
      status: databaseReady ? 'ready' : 'unavailable',
      database: databaseReady ? 'connected' : 'disconnected',
      channels: {
        telegram: channelState(deps.channels.chat.enabled),
        email: channelState(deps.channels.email.enabled),
        sms: channelState(deps.channels.sms.enabled),
        push: channelState(deps.channels.push.enabled)
      },
      timestamp: new Date().toISOString()
    });
  });

  app.use('/api/alerts', createAlertsRouter(deps.alertService, authenticate));
  app.use('/api/silos', createSilosRouter(deps.events, authenticate));
  app.use(
    '/api/notifications',
    createNotificationsRouter(deps.subscriptions, settings.vapidPublicKey, authenticate)
  );

  app.use((err: Error, _req: Request, res: Response, next: NextFunction) => {
    if (err.message === 'Origin header is required.' || err.message.includes('is not allowed')) {
      res.status(403).json({ error: err.message });
      return;
    }
    next(err);
  });

  return app;
}
