import { mkdirSync } from 'node:fs';
import path from 'node:path';
import pino from 'pino';

const SERVICE_NAME = 'silo-monitor-alerts';

const logDir = process.env.LOG_DIR ?? path.join(process.cwd(), 'logs');
mkdirSync(logDir, { recursive: true });

const accessLogPath = process.env.ACCESS_LOG_PATH ?? path.join(logDir, 'access.log');
const errorLogPath = process.env.ERROR_LOG_PATH ?? path.join(logDir, 'error.log');
const appLogPath = process.env.APP_LOG_PATH ?? path.join(logDir, 'app.log');

interface FileTarget {
  target: 'pino/file';
  level: string;
  options: { destination: string | number; mkdir: boolean };
}

const accessLevel = process.env.ACCESS_LOG_LEVEL ?? 'info';
const appLevel = process.env.LOG_LEVEL ?? 'info';
const logToStdout = process.env.LOG_TO_STDOUT !== 'false';

const accessTargets: FileTarget[] = [
  { target: 'pino/file', level: accessLevel, options: { destination: accessLogPath, mkdir: true } }
];

if (logToStdout) {
  accessTargets.push({ target: 'pino/file', level: accessLevel, options: { destination: 1, mkdir: false } });
}

export const accessLogger = pino(
  {
    level: accessLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: SERVICE_NAME, stream: 'access' }
  },
  pino.transport({ targets: accessTargets })
);

const appTargets: FileTarget[] = [
  { target: 'pino/file', level: appLevel, options: { destination: appLogPath, mkdir: true } },
  { target: 'pino/file', level: 'error', options: { destination: errorLogPath, mkdir: true } }
];

if (logToStdout) {
  appTargets.push({ target: 'pino/file', level: appLevel, options: { destination: 1, mkdir: false } });
}

export const appLogger = pino(
  {
    level: appLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: SERVICE_NAME, stream: 'application' }
  },
  pino.transport({ targets: appTargets })
);
