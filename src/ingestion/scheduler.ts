import type { Logger } from 'pino';

import type { CycleResult, IngestionPipeline, SiloChannelMapping } from './pipeline';

/**
 * Runs one ingestion cycle per silo mapping on a fixed interval. A tick never waits for
 * the previous one, so slow cycles overlap instead of being cancelled.
 */
export class PollScheduler {
  private intervalId: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<Promise<CycleResult[]>>();

  constructor(
    private readonly pipeline: Pick<IngestionPipeline, 'runCycle'>,
    private readonly mappings: readonly SiloChannelMapping[],
    private readonly intervalMs: number,
    private readonly logger: Logger
  ) {}

  get running(): boolean {
    return this.intervalId !== null;
  }

  start(): void {
    if (this.intervalId) {
      this.logger.warn('Poll scheduler already running');
      return;
    }
    if (this.mappings.length === 0) {
      this.logger.warn('No silo channel mappings configured; ingestion is idle');
    }

    this.logger.info({ intervalMs: this.intervalMs, silos: this.mappings.length }, 'Starting poll scheduler');
    this.intervalId = setInterval(() => {
      this.tick();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.logger.info('Poll scheduler stopped');
    }
  }

  async runOnce(): Promise<CycleResult[]> {
    const settled = await Promise.allSettled(this.mappings.map(mapping => this.pipeline.runCycle(mapping)));
    const results: CycleResult[] = [];
    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        results.push(result.value);
      } else {
        this.logger.error({ err: result.reason, silo: this.mappings[index].siloName }, 'Ingestion cycle crashed');
      }
    });
    return results;
  }

  /** Waits for ticks that are still running, e.g. during shutdown. */
  async idle(): Promise<void> {
    await Promise.allSettled(Array.from(this.inFlight));
  }

  private tick(): void {
    const run = this.runOnce().finally(() => {
      this.inFlight.delete(run);
    });
    this.inFlight.add(run);
  }
}
