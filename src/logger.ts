import { EventEmitter } from 'node:events';
import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'camwatch';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values).map(level => level.toLowerCase()).concat('silent')
);

const levelEvents = new EventEmitter();

type LogContext = {
  message?: string;
  device?: string;
};

function readString(source: unknown, key: string): string | undefined {
  if (!source || typeof source !== 'object') {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function extractContext(bindings: unknown, args: unknown[]): LogContext {
  let message: string | undefined;
  let device = readString(bindings, 'device');

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (value && typeof value === 'object') {
      device ??= readString(value, 'device') ?? readString(Reflect.get(value, 'meta'), 'device');
      if (!message) {
        message = readString(value, 'message');
      }
    }
  }

  return { message, device };
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
      const context = extractContext(this.bindings(), inputArgs);
      metrics.incrementLogLevel(resolvedLevel, context);
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;
metrics.recordLogLevelChange(currentLevel, null);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel, null);
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function isLevel(value: string): value is pino.LevelWithSilent {
  return AVAILABLE_LOG_LEVELS.has(value);
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  if (!isLevel(normalized)) {
    const available = getAvailableLogLevels().join(', ');
    throw new Error(`Unknown log level "${normalized}" (available: ${available})`);
  }
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  levelEvents.emit('change', currentLevel, previous);
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export function onLogLevelChange(listener: (level: string, previous: string | null) => void) {
  levelEvents.on('change', listener);
  return () => {
    levelEvents.off('change', listener);
  };
}

export type Logger = pino.Logger;

/** The subset of a logger the pipeline modules depend on. */
export type PipelineLogger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

export default logger;
