import { EventEmitter } from 'node:events';
import logger from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { storeEvent } from './db.js';
import type { EventPayload, EventRecord } from './types.js';

const EVENT_CHANNEL = 'event';

interface EventBusDependencies {
  store: (event: EventRecord) => void;
  log: Pick<typeof logger, 'info' | 'warn' | 'error'>;
  metrics?: MetricsRegistry;
}

function normalizeTimestamp(ts: EventPayload['ts']): number {
  if (ts instanceof Date) {
    return ts.getTime();
  }
  if (typeof ts === 'number' && Number.isFinite(ts)) {
    return ts;
  }
  return Date.now();
}

/**
 * Fan-out point for pipeline events. Every event is persisted, counted and logged before
 * listeners registered with `onEvent` see it.
 */
class EventBus extends EventEmitter {
  private readonly store: (event: EventRecord) => void;
  private readonly log: EventBusDependencies['log'];
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: EventBusDependencies = { store: storeEvent, log: logger }) {
    super();
    this.store = dependencies.store;
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;

    this.on(EVENT_CHANNEL, (event: EventRecord) => {
      try {
        this.store(event);
      } catch (error) {
        this.metrics.recordEventStoreFailure(error, event);
        this.log.error({ err: error, device: event.source, kind: event.kind }, 'Failed to store event');
      }
      this.metrics.recordEvent(event);
      const bindings = { device: event.source, kind: event.kind, meta: event.meta };
      if (event.severity === 'info') {
        this.log.info(bindings, event.message);
      } else {
        this.log.warn({ ...bindings, severity: event.severity }, event.message);
      }
    });
  }

  emitEvent(payload: EventPayload): EventRecord {
    const record: EventRecord = {
      ts: normalizeTimestamp(payload.ts),
      source: payload.source,
      kind: payload.kind,
      severity: payload.severity,
      message: payload.message,
      meta: payload.meta
    };
    this.emit(EVENT_CHANNEL, record);
    return record;
  }

  onEvent(listener: (event: EventRecord) => void) {
    this.on(EVENT_CHANNEL, listener);
    return () => {
      this.off(EVENT_CHANNEL, listener);
    };
  }
}

const eventBus = new EventBus();

export { EventBus };
export type { EventBusDependencies };
export default eventBus;
