import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { ConnectFailureReason } from '../errors.js';
import type { EventRecord, RecordingOutcome } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type ConnectFailureMeta = {
  reason: ConnectFailureReason;
  attempt: number;
  delayMs: number | null;
  at: number;
};

type DeviceMetricsState = {
  eventsPresent: number;
  eventsAbsent: number;
  discarded: Map<string, number>;
  connects: number;
  connectFailures: number;
  lastConnectFailure: ConnectFailureMeta | null;
  renewals: number;
  sessionsStarted: number;
  sessionStartFailures: number;
  sessionsStopped: Map<RecordingOutcome, number>;
  snapshotsSaved: number;
  snapshotFailures: number;
  processFaults: number;
  pipelineRestarts: number;
  lastRestartReason: string | null;
  logLines: number;
};

export type DeviceMetricsSnapshot = {
  events: { present: number; absent: number };
  discarded: CounterMap;
  subscription: {
    connects: number;
    connectFailures: number;
    renewals: number;
    lastConnectFailure: (Omit<ConnectFailureMeta, 'at'> & { at: string }) | null;
  };
  sessions: {
    started: number;
    startFailures: number;
    stopped: CounterMap;
    processFaults: number;
  };
  snapshots: { saved: number; failed: number };
  pipeline: { restarts: number; lastRestartReason: string | null };
  logLines: number;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  events: {
    total: number;
    byKind: CounterMap;
    bySeverity: CounterMap;
    storeFailures: number;
  };
  latencies: Record<string, LatencyStats>;
  devices: Record<string, DeviceMetricsSnapshot>;
};

function createDeviceState(): DeviceMetricsState {
  return {
    eventsPresent: 0,
    eventsAbsent: 0,
    discarded: new Map(),
    connects: 0,
    connectFailures: 0,
    lastConnectFailure: null,
    renewals: 0,
    sessionsStarted: 0,
    sessionStartFailures: 0,
    sessionsStopped: new Map(),
    snapshotsSaved: 0,
    snapshotFailures: 0,
    processFaults: 0,
    pipelineRestarts: 0,
    lastRestartReason: null,
    logLines: 0
  };
}

function increment<K>(map: Map<K, number>, key: K, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function toCounterMap(map: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(map.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

class MetricsRegistry {
  private createdAt = Date.now();
  private readonly logLevels = new Map<string, number>();
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private currentLogLevel: string | null = null;
  private eventsTotal = 0;
  private readonly eventsByKind = new Map<string, number>();
  private readonly eventsBySeverity = new Map<string, number>();
  private eventStoreFailures = 0;
  private readonly latencies = new Map<string, LatencyStats>();
  private readonly devices = new Map<string, DeviceMetricsState>();
  private readonly events = new EventEmitter();

  reset() {
    this.createdAt = Date.now();
    this.logLevels.clear();
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.eventsTotal = 0;
    this.eventsByKind.clear();
    this.eventsBySeverity.clear();
    this.eventStoreFailures = 0;
    this.latencies.clear();
    this.devices.clear();
    this.events.emit('reset');
  }

  onReset(listener: () => void) {
    this.events.on('reset', listener);
    return () => {
      this.events.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context: { message?: string; device?: string } = {}) {
    const normalized = level.toLowerCase();
    increment(this.logLevels, normalized);
    if (context.device) {
      this.device(context.device).logLines += 1;
    }
    if ((normalized === 'error' || normalized === 'fatal') && context.message) {
      this.lastErrorAt = Date.now();
      this.lastErrorMessage = context.message;
    }
  }

  recordLogLevelChange(level: string, _previous?: string | null) {
    this.currentLogLevel = level;
  }

  getLogLevel() {
    return this.currentLogLevel;
  }

  recordDetection(device: string, isPresent: boolean) {
    const state = this.device(device);
    if (isPresent) {
      state.eventsPresent += 1;
    } else {
      state.eventsAbsent += 1;
    }
  }

  recordDiscardedNotification(device: string, reason: string) {
    increment(this.device(device).discarded, reason);
  }

  recordConnect(device: string) {
    this.device(device).connects += 1;
  }

  recordConnectFailure(
    device: string,
    details: { reason: ConnectFailureReason; attempt: number; delayMs?: number | null }
  ) {
    const state = this.device(device);
    state.connectFailures += 1;
    state.lastConnectFailure = {
      reason: details.reason,
      attempt: details.attempt,
      delayMs: details.delayMs ?? null,
      at: Date.now()
    };
  }

  recordRenewal(device: string) {
    this.device(device).renewals += 1;
  }

  recordSessionStarted(device: string) {
    this.device(device).sessionsStarted += 1;
  }

  recordSessionStartFailure(device: string) {
    this.device(device).sessionStartFailures += 1;
  }

  recordSessionStopped(device: string, outcome: RecordingOutcome) {
    increment(this.device(device).sessionsStopped, outcome);
  }

  recordSnapshot(device: string, saved: boolean) {
    const state = this.device(device);
    if (saved) {
      state.snapshotsSaved += 1;
    } else {
      state.snapshotFailures += 1;
    }
  }

  recordProcessFault(device: string) {
    this.device(device).processFaults += 1;
  }

  recordPipelineRestart(device: string, reason: string) {
    const state = this.device(device);
    state.pipelineRestarts += 1;
    state.lastRestartReason = reason;
  }

  recordEvent(event: EventRecord) {
    this.eventsTotal += 1;
    increment(this.eventsByKind, event.kind);
    increment(this.eventsBySeverity, event.severity);
  }

  recordEventStoreFailure(_error: unknown, _event: EventRecord) {
    this.eventStoreFailures += 1;
  }

  observeLatency(metric: string, durationMs: number) {
    const existing = this.latencies.get(metric);
    if (!existing) {
      this.latencies.set(metric, {
        count: 1,
        totalMs: durationMs,
        minMs: durationMs,
        maxMs: durationMs,
        averageMs: durationMs
      });
      return;
    }
    existing.count += 1;
    existing.totalMs += durationMs;
    existing.minMs = Math.min(existing.minMs, durationMs);
    existing.maxMs = Math.max(existing.maxMs, durationMs);
    existing.averageMs = existing.totalMs / existing.count;
  }

  async time<T>(metric: string, fn: () => T | Promise<T>): Promise<T> {
    const started = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - started);
    }
  }

  snapshot(): MetricsSnapshot {
    const devices: Record<string, DeviceMetricsSnapshot> = {};
    for (const [name, state] of Array.from(this.devices.entries()).sort(([a], [b]) =>
      a.localeCompare(b)
    )) {
      devices[name] = {
        events: { present: state.eventsPresent, absent: state.eventsAbsent },
        discarded: toCounterMap(state.discarded),
        subscription: {
          connects: state.connects,
          connectFailures: state.connectFailures,
          renewals: state.renewals,
          lastConnectFailure: state.lastConnectFailure
            ? {
                reason: state.lastConnectFailure.reason,
                attempt: state.lastConnectFailure.attempt,
                delayMs: state.lastConnectFailure.delayMs,
                at: new Date(state.lastConnectFailure.at).toISOString()
              }
            : null
        },
        sessions: {
          started: state.sessionsStarted,
          startFailures: state.sessionStartFailures,
          stopped: toCounterMap(state.sessionsStopped),
          processFaults: state.processFaults
        },
        snapshots: { saved: state.snapshotsSaved, failed: state.snapshotFailures },
        pipeline: { restarts: state.pipelineRestarts, lastRestartReason: state.lastRestartReason },
        logLines: state.logLines
      };
    }

    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of this.latencies) {
      latencies[metric] = { ...stats };
    }

    return {
      createdAt: new Date(this.createdAt).toISOString(),
      logs: {
        byLevel: toCounterMap(this.logLevels),
        lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
        lastErrorMessage: this.lastErrorMessage
      },
      events: {
        total: this.eventsTotal,
        byKind: toCounterMap(this.eventsByKind),
        bySeverity: toCounterMap(this.eventsBySeverity),
        storeFailures: this.eventStoreFailures
      },
      latencies,
      devices
    };
  }

  private device(name: string): DeviceMetricsState {
    let state = this.devices.get(name);
    if (!state) {
      state = createDeviceState();
      this.devices.set(name, state);
    }
    return state;
  }
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
