import { Mutex } from 'async-mutex';
import type { Logger } from 'pino';

import { withTimeout } from '../errors';

export type ListenerState = 'connecting' | 'connected' | 'disconnected';

export interface LiveListener {
  readonly id: string;
  send(message: string): Promise<void>;
}

export const DEFAULT_LIVE_SEND_TIMEOUT_MS = 15_000;

export interface BroadcastResult {
  delivered: number;
  removed: number;
}

/**
 * Tracks the live listeners that receive alert broadcasts. Every mutation of the
 * active set and of listener states goes through one mutex; sends happen outside of it
 * on a snapshot, each bounded by `sendTimeoutMs`.
 */
export class ConnectionRegistry {
  private readonly mutex = new Mutex();
  private readonly active = new Set<LiveListener>();
  private readonly states = new WeakMap<LiveListener, ListenerState>();

  constructor(
    private readonly logger: Logger,
    private readonly sendTimeoutMs: number = DEFAULT_LIVE_SEND_TIMEOUT_MS
  ) {}

  get size(): number {
    return this.active.size;
  }

  stateOf(listener: LiveListener): ListenerState | undefined {
    return this.states.get(listener);
  }

  /** Returns false when the listener was already disconnected; that state is terminal. */
  async connect(listener: LiveListener): Promise<boolean> {
    const accepted = await this.mutex.runExclusive(() => {
      if (this.states.get(listener) === 'disconnected') {
        return false;
      }
      this.states.set(listener, 'connecting');
      return true;
    });
    if (!accepted) {
      return false;
    }

    // A disconnect queued while connecting wins.
    return this.mutex.runExclusive(() => {
      if (this.states.get(listener) === 'disconnected') {
        return false;
      }
      this.active.add(listener);
      this.states.set(listener, 'connected');
      this.logger.debug({ listenerId: listener.id, listeners: this.active.size }, 'Live listener connected');
      return true;
    });
  }

  async disconnect(listener: LiveListener): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.states.set(listener, 'disconnected');
      if (this.active.delete(listener)) {
        this.logger.debug({ listenerId: listener.id, listeners: this.active.size }, 'Live listener disconnected');
      }
    });
  }

  async broadcast(message: string): Promise<BroadcastResult> {
    const snapshot = await this.mutex.runExclusive(() => Array.from(this.active));

    const results = await Promise.allSettled(
      snapshot.map(listener =>
        withTimeout('live', this.sendTimeoutMs, () => Promise.resolve().then(() => listener.send(message)))
      )
    );
    const failed: LiveListener[] = [];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const listener = snapshot[index];
        this.logger.warn({ err: result.reason, listenerId: listener.id }, 'Live broadcast failed; dropping listener');
        failed.push(listener);
      }
    });

    for (const listener of failed) {
      await this.disconnect(listener);
    }

    return { delivered: snapshot.length - failed.length, removed: failed.length };
  }

  async clear(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.active.forEach(listener => this.states.set(listener, 'disconnected'));
      this.active.clear();
    });
  }
}
