import { EventEmitter } from 'node:events';
import baseLogger, { type PipelineLogger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { toError } from '../errors.js';
import type { RestartPolicy } from '../config/index.js';
import type { EventSink } from '../recording/sessionManager.js';
import { systemClock, type Clock } from '../utils/clock.js';
import {
  evaluateRestartSeverity,
  formatRestartSeverityReason,
  type RestartSeverityLevel,
  type RestartSeverityThresholds
} from './channelHealth.js';

/** The part of a device pipeline the supervisor drives. */
export interface SupervisedPipeline {
  run(): Promise<void>;
  stop(reason?: string): Promise<void>;
}

export type PipelineFactory = (device: string) => SupervisedPipeline;

export type SupervisorOptions = {
  devices: string[];
  createPipeline: PipelineFactory;
  restartPolicy: RestartPolicy;
  restartDelayMs: number;
  /** 0 restarts without limit. */
  maxRestarts: number;
  severityThresholds?: RestartSeverityThresholds;
  clock?: Clock;
  logger?: PipelineLogger;
  metrics?: MetricsRegistry;
  bus?: EventSink;
};

export type SupervisedState = 'starting' | 'running' | 'restarting' | 'stopped' | 'failed';

export type SupervisedDeviceStatus = {
  device: string;
  state: SupervisedState;
  restarts: number;
  lastError: string | null;
  lastErrorAt: string | null;
  severity: RestartSeverityLevel;
  severityReason: string | null;
};

export type PipelineFailureEvent = {
  device: string;
  error: Error;
  restarts: number;
  willRestart: boolean;
};

type Entry = {
  device: string;
  state: SupervisedState;
  pipeline: SupervisedPipeline | null;
  task: Promise<void> | null;
  restarts: number;
  downtimeMs: number;
  lastError: Error | null;
  lastErrorAt: Date | null;
};

/**
 * Runs one pipeline per device. A failing pipeline is restarted or parked according to
 * the restart policy; the others keep running.
 *
 * Emits `pipeline-failed` ({@link PipelineFailureEvent}) for every failure and `exhausted`
 * once no pipeline is left running.
 */
export class CameraSupervisor extends EventEmitter {
  private readonly options: SupervisorOptions;
  private readonly clock: Clock;
  private readonly log: PipelineLogger;
  private readonly metrics: MetricsRegistry;
  private readonly entries = new Map<string, Entry>();
  private readonly abortController = new AbortController();
  private started = false;
  private stopPromise: Promise<void> | null = null;
  private exhaustedEmitted = false;

  constructor(options: SupervisorOptions) {
    super();
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? baseLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    for (const device of options.devices) {
      this.entries.set(device, {
        device,
        state: 'starting',
        pipeline: null,
        task: null,
        restarts: 0,
        downtimeMs: 0,
        lastError: null,
        lastErrorAt: null
      });
    }
  }

  get stopping() {
    return this.stopPromise !== null;
  }

  /** True once `exhausted` has been emitted. */
  get exhausted() {
    return this.exhaustedEmitted;
  }

  start() {
    if (this.started) {
      return;
    }
    this.started = true;
    for (const entry of this.entries.values()) {
      entry.task = this.supervise(entry);
    }
    this.log.info({ devices: this.options.devices }, 'Supervisor started');
  }

  /** Resolves when every device task has finished, normally after `stop()`. */
  async whenIdle(): Promise<void> {
    const results = await Promise.allSettled(Array.from(this.entries.values(), entry => entry.task));
    results.forEach(result => {
      if (result.status === 'rejected') {
        this.log.error({ err: result.reason }, 'Device supervision ended with an error');
      }
    });
  }

  stop(reason = 'shutdown'): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown(reason);
    }
    return this.stopPromise;
  }

  status(): SupervisedDeviceStatus[] {
    return Array.from(this.entries.values(), entry => {
      const evaluation = evaluateRestartSeverity(
        { restarts: entry.restarts, downtimeMs: entry.downtimeMs },
        this.options.severityThresholds
      );
      return {
        device: entry.device,
        state: entry.state,
        restarts: entry.restarts,
        lastError: entry.lastError?.message ?? null,
        lastErrorAt: entry.lastErrorAt?.toISOString() ?? null,
        severity: evaluation.severity,
        severityReason: formatRestartSeverityReason(evaluation)
      };
    });
  }

  private async shutdown(reason: string) {
    this.log.info({ reason }, 'Supervisor stopping');
    this.abortController.abort();
    const pipelines = Array.from(this.entries.values()).flatMap(entry =>
      entry.pipeline ? [{ device: entry.device, pipeline: entry.pipeline }] : []
    );
    const results = await Promise.allSettled(pipelines.map(({ pipeline }) => pipeline.stop(reason)));
    results.forEach((result, index) => {
      const device = pipelines[index]?.device;
      if (result.status === 'rejected') {
        this.log.warn({ err: result.reason, device }, 'Pipeline reported an error while stopping');
      }
    });
    await this.whenIdle();
    this.log.info({ reason }, 'Supervisor stopped');
  }

  private async supervise(entry: Entry) {
    while (!this.stopping) {
      let failure: Error;
      try {
        const pipeline = this.options.createPipeline(entry.device);
        entry.pipeline = pipeline;
        entry.state = 'running';
        await pipeline.run();
        if (this.stopping) {
          break;
        }
        failure = new Error('Pipeline exited without a stop request');
      } catch (error) {
        if (this.stopping) {
          this.log.warn({ err: error, device: entry.device }, 'Pipeline failed while stopping');
          break;
        }
        failure = toError(error);
      }

      if (!this.handleFailure(entry, failure)) {
        return;
      }

      const restartAt = this.clock.now();
      await this.clock.sleep(this.options.restartDelayMs, this.abortController.signal);
      entry.downtimeMs += this.clock.now() - restartAt;
    }
    entry.state = 'stopped';
  }

  /** Records a failure; returns whether the pipeline should be restarted. */
  private handleFailure(entry: Entry, error: Error): boolean {
    entry.lastError = error;
    entry.lastErrorAt = this.clock.wallNow();
    entry.pipeline = null;

    const { restartPolicy, maxRestarts } = this.options;
    const willRestart = restartPolicy === 'restart' && (maxRestarts === 0 || entry.restarts < maxRestarts);

    this.log.error(
      { err: error, device: entry.device, restarts: entry.restarts, willRestart },
      willRestart ? 'Device pipeline failed; restarting' : 'Device pipeline failed; leaving it stopped'
    );
    this.options.bus?.emitEvent({
      source: entry.device,
      kind: 'supervisor',
      severity: willRestart ? 'warning' : 'critical',
      message: willRestart ? 'Pipeline failed; restarting' : 'Pipeline failed permanently',
      meta: { error: error.message, restarts: entry.restarts }
    });

    if (willRestart) {
      entry.restarts += 1;
      entry.state = 'restarting';
      this.metrics.recordPipelineRestart(entry.device, error.message);
    } else {
      entry.state = 'failed';
    }

    this.emit('pipeline-failed', {
      device: entry.device,
      error,
      restarts: entry.restarts,
      willRestart
    } satisfies PipelineFailureEvent);

    if (!willRestart) {
      this.checkExhausted();
    }
    return willRestart;
  }

  private checkExhausted() {
    if (this.exhaustedEmitted) {
      return;
    }
    const failed = Array.from(this.entries.values()).every(entry => entry.state === 'failed');
    if (failed) {
      this.exhaustedEmitted = true;
      this.log.error('Every device pipeline has failed');
      this.emit('exhausted');
    }
  }
}
