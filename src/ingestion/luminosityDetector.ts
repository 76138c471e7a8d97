import type { NewAlert, NewSiloEvent, ReadingValues } from '../repositories/types';

export const SILO_OPENED_MESSAGE = 'Silo opened: luminosity change detected (possible maintenance)';
export const FIRE_RISK_MESSAGE = 'Luminosity alert detected (possible fire in the silo)';
export const LUMINOSITY_ALERT_FLAG = 1;

export interface LuminosityThresholds {
  darkLux: number;
  openLux: number;
}

export const DEFAULT_LUMINOSITY_THRESHOLDS: LuminosityThresholds = {
  darkLux: 10,
  openLux: 100
};

export interface LuminosityDetection {
  events: NewSiloEvent[];
  alerts: NewAlert[];
}

type LuminositySample = Pick<ReadingValues, 'lux' | 'luminosityAlert'>;

export class LuminosityEventDetector {
  constructor(
    private readonly thresholds: LuminosityThresholds = DEFAULT_LUMINOSITY_THRESHOLDS,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Compares the stored sample preceding an accepted reading with that reading. */
  detect(siloId: string, previous: LuminositySample | null, current: LuminositySample): LuminosityDetection {
    const detection: LuminosityDetection = { events: [], alerts: [] };
    const timestamp = this.now();

    const prevLux = previous?.lux ?? null;
    const lux = current.lux;
    if (prevLux !== null && lux !== null && prevLux <= this.thresholds.darkLux && lux >= this.thresholds.openLux) {
      detection.events.push({
        siloId,
        eventType: 'silo_opened',
        payload: { prevLux, lux },
        timestamp
      });
      detection.alerts.push({
        siloId,
        level: 'warning',
        message: SILO_OPENED_MESSAGE,
        value: { prevLux, lux },
        timestamp
      });
    }

    if (current.luminosityAlert === LUMINOSITY_ALERT_FLAG) {
      detection.alerts.push({
        siloId,
        level: 'critical',
        message: FIRE_RISK_MESSAGE,
        value: { lux, flag: current.luminosityAlert },
        timestamp
      });
    }

    return detection;
  }
}
