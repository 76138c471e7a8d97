import { randomUUID } from 'node:crypto';
import type { IncomingMessage, Server } from 'node:http';

import type { Secret } from 'jsonwebtoken';
import type { Logger } from 'pino';
import { WebSocket, WebSocketServer } from 'ws';

import { AuthenticatedUser, verifyToken } from '../auth';
import type { ConnectionRegistry, LiveListener } from './connectionRegistry';

export const ALERT_SOCKET_PATH = '/api/alerts/ws';
const WEBSOCKET_PING_INTERVAL_MS = 30_000;

type HeartbeatWebSocket = WebSocket & { isAlive?: boolean };

export class WebSocketListener implements LiveListener {
  readonly id = randomUUID();

  constructor(private readonly socket: WebSocket) {}

  send(message: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error(`WebSocket is not open (state ${this.socket.readyState})`));
        return;
      }
      this.socket.send(message, error => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}

function authenticateSocket(request: IncomingMessage, secret: Secret): AuthenticatedUser | null {
  if (!request.url) {
    return null;
  }
  const parsedUrl = new URL(request.url, `http://${request.headers.host ?? 'localhost'}`);
  const token = parsedUrl.searchParams.get('token');
  return token ? verifyToken(token, secret) : null;
}

export function attachAlertSocket(
  server: Server,
  registry: ConnectionRegistry,
  secret: Secret,
  logger: Logger
): WebSocketServer {
  const wss = new WebSocketServer({ server, path: ALERT_SOCKET_PATH });

  const heartbeatInterval = setInterval(() => {
    wss.clients.forEach(client => {
      const socket = client as HeartbeatWebSocket;
      if (socket.isAlive === false) {
        socket.terminate();
        return;
      }
      if (socket.readyState !== WebSocket.OPEN) {
        return;
      }
      socket.isAlive = false;
      socket.ping();
    });
  }, WEBSOCKET_PING_INTERVAL_MS);

  wss.on('close', () => {
    clearInterval(heartbeatInterval);
  });

  wss.on('connection', (socket: WebSocket, request: IncomingMessage) => {
    let user: AuthenticatedUser | null;
    try {
      user = authenticateSocket(request, secret);
    } catch (error) {
      logger.warn({ err: error }, 'Rejected WebSocket connection with invalid token');
      socket.close(4401, 'Authentication failed.');
      return;
    }
    if (!user) {
      socket.close(4401, 'Authentication required.');
      return;
    }

    const heartbeatSocket = socket as HeartbeatWebSocket;
    heartbeatSocket.isAlive = true;
    const listener = new WebSocketListener(socket);

    socket.on('pong', () => {
      heartbeatSocket.isAlive = true;
    });

    socket.on('message', data => {
      socket.send(`pong: ${data.toString()}`);
    });

    socket.on('close', () => {
      registry.disconnect(listener).catch(error => {
        logger.error({ err: error, listenerId: listener.id }, 'Failed to deregister live listener');
      });
    });

    socket.on('error', (error: Error) => {
      logger.warn({ err: error, listenerId: listener.id }, 'WebSocket error');
    });

    registry
      .connect(listener)
      .then(connected => {
        if (connected) {
          logger.info({ listenerId: listener.id, userId: user?.id }, 'Live alert listener connected');
        }
      })
      .catch(error => {
        logger.error({ err: error, listenerId: listener.id }, 'Failed to register live listener');
        socket.close(1011, 'Unexpected error.');
      });
  });

  return wss;
}
