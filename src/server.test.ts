import jwt from 'jsonwebtoken';
import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';

import { AlertService } from './alerts/alertService';
import { createApp } from './server';
import { recordingChannels, silentLogger } from './testing/fixtures';
import { InMemoryAlertStore, InMemoryPushSubscriptionStore, InMemorySiloEventStore } from './testing/inMemoryStores';

const AUTH_SECRET = 'test-secret';
const ackTime = new Date('2024-05-01T12:00:00.000Z');

function bearer(subject = 'user-7'): string {
  return `Bearer ${jwt.sign({ sub: subject, role: 'operator' }, AUTH_SECRET)}`;
}

async function setup(vapidPublicKey: string | null = 'test-public-key', isDatabaseReady = () => true) {
  const alerts = new InMemoryAlertStore();
  const events = new InMemorySiloEventStore();
  const subscriptions = new InMemoryPushSubscriptionStore();
  const channels = recordingChannels();
  channels.sms.enabled = false;

  await alerts.insert({ siloId: 'silo-1', level: 'warning', message: 'Silo opened', value: { prevLux: 2, lux: 150 }, timestamp: new Date('2024-05-01T08:00:00Z') });
  await alerts.insert({ siloId: 'silo-1', level: 'critical', message: 'Too hot', value: 40, timestamp: new Date('2024-05-01T09:00:00Z') });
  await events.insert({ siloId: 'silo-1', eventType: 'silo_opened', payload: { prevLux: 2, lux: 150 }, timestamp: new Date('2024-05-01T08:00:00Z') });

  const app = createApp({
    alertService: new AlertService(alerts, () => ackTime),
    events,
    subscriptions,
    channels,
    accessLogger: silentLogger(),
    isDatabaseReady,
    settings: {
      authSecret: AUTH_SECRET,
      trustProxy: false,
      allowRequestsWithoutOrigin: true,
      isAllowedOrigin: origin => origin === 'https://dashboard.example',
      rateLimit: null,
      vapidPublicKey
    }
  });
  return { app, alerts, subscriptions };
}

describe('HTTP API', () => {
  let context: Awaited<ReturnType<typeof setup>>;

  beforeEach(async () => {
    context = await setup();
  });

  it('reports liveness and channel readiness', async () => {
    const health = await request(context.app).get('/healthz');
    const ready = await request(context.app).get('/readyz');

    expect(health.status).toBe(200);
    expect(health.body.status).toBe('ok');
    expect(ready.status).toBe(200);
    expect(ready.body.status).toBe('ready');
    expect(ready.body.database).toBe('connected');
    expect(ready.body.channels).toEqual({ telegram: 'enabled', email: 'enabled', sms: 'disabled', push: 'enabled' });
  });

  it('reports not ready while the database is disconnected', async () => {
    const { app } = await setup('test-public-key', () => false);

    const ready = await request(app).get('/readyz');

    expect(ready.status).toBe(503);
    expect(ready.body.status).toBe('unavailable');
    expect(ready.body.database).toBe('disconnected');
  });

  it('echoes the request id header', async () => {
    const response = await request(context.app).get('/healthz').set('x-request-id', 'req-123');

    expect(response.headers['x-request-id']).toBe('req-123');
  });

  it('rejects disallowed origins', async () => {
    const response = await request(context.app).get('/healthz').set('Origin', 'https://evil.example');

    expect(response.status).toBe(403);
    expect(response.body).toEqual({ error: 'Origin https://evil.example is not allowed.' });
  });

  it('requires a bearer token for alert routes', async () => {
    const missing = await request(context.app).get('/api/alerts');
    const invalid = await request(context.app).get('/api/alerts').set('Authorization', 'Bearer not-a-token');

    expect(missing.status).toBe(401);
    expect(invalid.status).toBe(401);
    expect(invalid.body).toEqual({ error: 'Authentication failed.' });
  });

  it('lists alerts newest first with a level filter', async () => {
    const all = await request(context.app).get('/api/alerts').set('Authorization', bearer());
    const critical = await request(context.app)
      .get('/api/alerts')
      .query({ minLevel: 'critical' })
      .set('Authorization', bearer());

    expect(all.status).toBe(200);
    expect(all.body.alerts.map((alert: { id: string }) => alert.id)).toEqual(['alert-2', 'alert-1']);
    expect(all.body.alerts[1]).toEqual({
      id: 'alert-1',
      siloId: 'silo-1',
      level: 'warning',
      message: 'Silo opened',
      value: { prevLux: 2, lux: 150 },
      timestamp: '2024-05-01T08:00:00.000Z',
      acknowledged: false,
      ackBy: null,
      ackAt: null
    });
    expect(critical.body.alerts).toHaveLength(1);
  });

  it('rejects an inverted time range', async () => {
    const response = await request(context.app)
      .get('/api/alerts')
      .query({ from: '2024-05-02T00:00:00Z', to: '2024-05-01T00:00:00Z' })
      .set('Authorization', bearer());

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid alert query.');
  });

  it('acknowledges once and keeps the first acknowledger', async () => {
    const first = await request(context.app).post('/api/alerts/alert-2/ack').set('Authorization', bearer('user-7'));
    const second = await request(context.app).post('/api/alerts/alert-2/ack').set('Authorization', bearer('user-8'));
    const missing = await request(context.app).post('/api/alerts/alert-99/ack').set('Authorization', bearer());

    expect(first.status).toBe(200);
    expect(first.body.status).toBe('acknowledged');
    expect(first.body.alert).toMatchObject({ acknowledged: true, ackBy: 'user-7', ackAt: '2024-05-01T12:00:00.000Z' });
    expect(second.status).toBe(200);
    expect(second.body.status).toBe('already_acknowledged');
    expect(second.body.alert.ackBy).toBe('user-7');
    expect(missing.status).toBe(404);
  });

  it('lists silo events', async () => {
    const response = await request(context.app).get('/api/silos/silo-1/events').set('Authorization', bearer());

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      events: [
        {
          id: 'event-1',
          siloId: 'silo-1',
          eventType: 'silo_opened',
          payload: { prevLux: 2, lux: 150 },
          timestamp: '2024-05-01T08:00:00.000Z'
        }
      ]
    });
  });

  it('registers, updates and removes push subscriptions', async () => {
    const body = { endpoint: 'https://push.example/a', keys: { p256dh: 'test-p256dh', auth: 'test-auth' }, siloId: ' silo-1 ' };

    const created = await request(context.app).post('/api/notifications/subscriptions').set('Authorization', bearer()).send(body);
    await request(context.app)
      .post('/api/notifications/subscriptions')
      .set('Authorization', bearer())
      .send({ ...body, siloId: null });

    expect(created.status).toBe(201);
    expect(created.body).toEqual({ id: 'subscription-1', endpoint: 'https://push.example/a', siloId: 'silo-1' });
    expect(context.subscriptions.records).toEqual([
      { id: 'subscription-1', endpoint: 'https://push.example/a', keys: body.keys, siloId: null }
    ]);

    const removed = await request(context.app)
      .delete('/api/notifications/subscriptions')
      .set('Authorization', bearer())
      .send({ endpoint: 'https://push.example/a' });

    expect(removed.status).toBe(204);
    expect(context.subscriptions.records).toEqual([]);
  });

  it('validates push subscriptions', async () => {
    const response = await request(context.app)
      .post('/api/notifications/subscriptions')
      .set('Authorization', bearer())
      .send({ endpoint: 'not a url', keys: { p256dh: '', auth: 'test-auth' } });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid push subscription.');
  });

  it('exposes the VAPID public key only when configured', async () => {
    const configured = await request(context.app).get('/api/notifications/vapid-public-key');
    const unconfigured = await request((await setup(null)).app).get('/api/notifications/vapid-public-key');

    expect(configured.body).toEqual({ publicKey: 'test-public-key' });
    expect(unconfigured.status).toBe(404);
  });
});
