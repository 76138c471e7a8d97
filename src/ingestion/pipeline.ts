import type { Logger } from 'pino';

import type { NotificationDispatcher } from '../notifications/dispatcher';
import type {
  AlertRecord,
  AlertStore,
  NewAlert,
  ReadingRecord,
  ReadingStore,
  SiloEventStore,
  SiloStore,
  SiloThresholds
} from '../repositories/types';
import type { DeduplicationGate, DedupReason } from './dedupGate';
import type { LuminosityEventDetector } from './luminosityDetector';
import type { ReadingNormalizer } from './normalizer';
import type { ReadingSource } from './thingSpeakSource';
import type { ThresholdRuleEngine } from './thresholdRules';

export interface SiloChannelMapping {
  siloName: string;
  channelId: string;
  readKey: string | null;
}

export type CycleStatus = 'stored' | 'suppressed' | 'skipped' | 'failed';

export interface CycleResult {
  siloName: string;
  status: CycleStatus;
  dedupReason?: DedupReason;
  readingId?: string;
  alerts: AlertRecord[];
  eventCount: number;
}

export interface IngestionPipelineOptions {
  source: ReadingSource;
  normalizer: ReadingNormalizer;
  gate: DeduplicationGate;
  luminosity: LuminosityEventDetector;
  rules: ThresholdRuleEngine;
  readings: ReadingStore;
  silos: SiloStore;
  events: SiloEventStore;
  alerts: AlertStore;
  dispatcher: Pick<NotificationDispatcher, 'dispatch'>;
  logger: Logger;
}

export class IngestionPipeline {
  private readonly pendingDispatches = new Set<Promise<void>>();

  constructor(private readonly options: IngestionPipelineOptions) {}

  /** Runs one fetch-normalize-gate-store-alert cycle for a silo. Never rejects. */
  async runCycle(mapping: SiloChannelMapping): Promise<CycleResult> {
    const logger = this.options.logger.child({ silo: mapping.siloName, channelId: mapping.channelId });
    const skipped: CycleResult = { siloName: mapping.siloName, status: 'skipped', alerts: [], eventCount: 0 };

    try {
      const silo = await this.options.silos.findByName(mapping.siloName);
      if (!silo) {
        logger.warn('No silo registered under this name; skipping cycle');
        return skipped;
      }

      const raw = await this.options.source.fetchLatest(mapping.channelId, mapping.readKey);
      if (!raw) {
        return skipped;
      }

      const normalized = this.options.normalizer.normalize(raw, { siloId: silo.id, deviceId: silo.deviceId });
      if (!normalized) {
        return skipped;
      }

      const previous = await this.findPrevious(silo.id, logger);
      const decision = this.options.gate.evaluate(normalized, previous);
      if (!decision.accepted) {
        logger.info({ elapsedMs: decision.elapsedMs }, 'Ignoring identical recent reading');
        return { ...skipped, status: 'suppressed', dedupReason: decision.reason };
      }

      const reading = await this.options.readings.insert(normalized);
      logger.info({ readingId: reading.id, reason: decision.reason }, 'Reading stored');

      const detection = this.options.luminosity.detect(silo.id, previous, reading);
      let eventCount = 0;
      for (const event of detection.events) {
        try {
          await this.options.events.insert(event);
          eventCount += 1;
        } catch (error) {
          logger.error({ err: error, eventType: event.eventType }, 'Failed to store silo event');
        }
      }

      const candidates: NewAlert[] = [...detection.alerts, ...(await this.evaluateRules(reading, silo.thresholds, logger))];
      const alerts = await this.persistAlerts(candidates, logger);
      alerts.forEach(alert => this.track(alert, logger));

      return {
        siloName: mapping.siloName,
        status: 'stored',
        dedupReason: decision.reason,
        readingId: reading.id,
        alerts,
        eventCount
      };
    } catch (error) {
      logger.error({ err: error }, 'Ingestion cycle failed');
      return { ...skipped, status: 'failed' };
    }
  }

  /** Resolves once every dispatch started so far has finished. */
  async drain(): Promise<void> {
    while (this.pendingDispatches.size > 0) {
      await Promise.all(Array.from(this.pendingDispatches));
    }
  }

  private async findPrevious(siloId: string, logger: Logger): Promise<ReadingRecord | null> {
    try {
      return await this.options.readings.findLatest(siloId);
    } catch (error) {
      logger.warn({ err: error }, 'Could not load last reading; treating as first reading');
      return null;
    }
  }

  private async evaluateRules(
    reading: ReadingRecord,
    thresholds: SiloThresholds,
    logger: Logger
  ): Promise<NewAlert[]> {
    try {
      return await this.options.rules.evaluate(reading, thresholds);
    } catch (error) {
      logger.error({ err: error }, 'Threshold rule evaluation failed');
      return [];
    }
  }

  private async persistAlerts(candidates: NewAlert[], logger: Logger): Promise<AlertRecord[]> {
    const stored: AlertRecord[] = [];
    for (const candidate of candidates) {
      try {
        stored.push(await this.options.alerts.insert(candidate));
      } catch (error) {
        logger.error({ err: error, level: candidate.level, message: candidate.message }, 'Failed to store alert');
      }
    }
    return stored;
  }

  private track(alert: AlertRecord, logger: Logger): void {
    const dispatch = this.options.dispatcher
      .dispatch(alert)
      .then(() => undefined)
      .catch(error => {
        logger.error({ err: error, alertId: alert.id }, 'Alert dispatch failed');
      })
      .finally(() => {
        this.pendingDispatches.delete(dispatch);
      });
    this.pendingDispatches.add(dispatch);
  }
}
