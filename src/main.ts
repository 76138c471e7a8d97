import { createServer } from 'node:http';

import { AlertService } from './alerts/alertService';
import { appConfig, isAllowedOrigin } from './config';
import { connectDatabase, disconnectDatabase, isDatabaseConnected } from './database/connection';
import { AlertModel, PushSubscriptionModel, ReadingModel, SiloEventModel, SiloModel } from './database/models';
import { DeduplicationGate } from './ingestion/dedupGate';
import { HttpAnomalyDetector } from './ingestion/httpAnomalyDetector';
import { LuminosityEventDetector } from './ingestion/luminosityDetector';
import { ReadingNormalizer } from './ingestion/normalizer';
import { IngestionPipeline } from './ingestion/pipeline';
import { PollScheduler } from './ingestion/scheduler';
import { ThingSpeakSource } from './ingestion/thingSpeakSource';
import { ThresholdRuleEngine } from './ingestion/thresholdRules';
import { accessLogger, appLogger } from './logger';
import { createEmailChannel } from './notifications/channels/emailChannel';
import { createPushChannel } from './notifications/channels/pushChannel';
import { createSmsChannel } from './notifications/channels/smsChannel';
import { createTelegramChannel } from './notifications/channels/telegramChannel';
import type { NotificationChannels } from './notifications/channels/types';
import { NotificationDispatcher } from './notifications/dispatcher';
import { attachAlertSocket } from './realtime/alertSocket';
import { ConnectionRegistry } from './realtime/connectionRegistry';
import { AlertRepository } from './repositories/alertRepository';
import { PushSubscriptionRepository } from './repositories/pushSubscriptionRepository';
import { ReadingRepository } from './repositories/readingRepository';
import { SiloEventRepository } from './repositories/siloEventRepository';
import { SiloRepository } from './repositories/siloRepository';
import { createApp } from './server';

async function main(): Promise<void> {
  const { host, port } = appConfig;
  const { ingestion, notifications } = appConfig;

  await connectDatabase(appConfig.mongo.uri, appConfig.mongo.dbName, appLogger);

  const readings = new ReadingRepository(ReadingModel);
  const silos = new SiloRepository(SiloModel);
  const events = new SiloEventRepository(SiloEventModel);
  const alerts = new AlertRepository(AlertModel);
  const subscriptions = new PushSubscriptionRepository(PushSubscriptionModel);

  const channelLogger = appLogger.child({ component: 'notifications' });
  const channels: NotificationChannels = {
    chat: createTelegramChannel(notifications.telegramBotToken, channelLogger),
    email: createEmailChannel(notifications.smtp, channelLogger, notifications.channelTimeoutMs),
    sms: createSmsChannel(notifications.twilio, channelLogger),
    push: createPushChannel(notifications.vapid, channelLogger, notifications.channelTimeoutMs)
  };

  const registry = new ConnectionRegistry(
    appLogger.child({ component: 'realtime' }),
    notifications.channelTimeoutMs
  );
  const dispatcher = new NotificationDispatcher({
    silos,
    subscriptions,
    channels,
    broadcaster: registry,
    logger: channelLogger,
    channelTimeoutMs: notifications.channelTimeoutMs
  });

  const ingestionLogger = appLogger.child({ component: 'ingestion' });
  const anomalyDetector = ingestion.anomalyDetectorUrl ? new HttpAnomalyDetector(ingestion.anomalyDetectorUrl) : null;
  const pipeline = new IngestionPipeline({
    source: new ThingSpeakSource(ingestionLogger),
    normalizer: new ReadingNormalizer(ingestionLogger),
    gate: new DeduplicationGate(ingestion.identicalReadingMinIntervalMs),
    luminosity: new LuminosityEventDetector(ingestion.luminosity),
    rules: new ThresholdRuleEngine(ingestionLogger, anomalyDetector),
    readings,
    silos,
    events,
    alerts,
    dispatcher,
    logger: ingestionLogger
  });
  const scheduler = new PollScheduler(pipeline, ingestion.mappings, ingestion.pollIntervalMs, ingestionLogger);

  const app = createApp({
    alertService: new AlertService(alerts),
    events,
    subscriptions,
    channels,
    accessLogger,
    isDatabaseReady: isDatabaseConnected,
    settings: {
      authSecret: appConfig.auth.secret,
      trustProxy: appConfig.trustProxy,
      allowRequestsWithoutOrigin: appConfig.allowRequestsWithoutOrigin,
      isAllowedOrigin,
      rateLimit: appConfig.rateLimit,
      vapidPublicKey: notifications.vapid?.publicKey ?? null
    }
  });

  const server = createServer(app);
  const wss = attachAlertSocket(server, registry, appConfig.auth.secret, appLogger);

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    appLogger.info({ signal }, 'Shutting down');

    scheduler.stop();
    await scheduler.idle();
    await pipeline.drain();
    wss.clients.forEach(client => client.close(1001, 'Server shutting down.'));
    wss.close();
    await registry.clear();
    await new Promise<void>(resolve => server.close(() => resolve()));
    await disconnectDatabase();
    appLogger.info('Shutdown complete');
  };

  (['SIGINT', 'SIGTERM'] as const).forEach(signal => {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch(error => {
          appLogger.error({ err: error }, 'Shutdown failed');
          process.exit(1);
        });
    });
  });

  server.listen(port, host, () => {
    appLogger.info(
      { host, port, url: `http://${host === '0.0.0.0' ? 'localhost' : host}:${port}` },
      'Server is running'
    );
    scheduler.start();
  });
}

main().catch(error => {
  appLogger.error({ err: error }, 'Failed to initialize the server');
  process.exit(1);
});
