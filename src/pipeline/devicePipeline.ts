import baseLogger, { type PipelineLogger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { SessionStartError } from '../errors.js';
import type { DetectionEvent } from '../types.js';
import {
  DetectionStateMachine,
  type DetectionState,
  type StartCommand,
  type StopCommand
} from '../detection/stateMachine.js';
import type { EventSink, SessionController } from '../recording/sessionManager.js';
import { systemClock, type Clock } from '../utils/clock.js';

/** What a pipeline needs from its subscription client. */
export interface DetectionSource {
  nextEvent(timeoutMs: number): Promise<DetectionEvent | null>;
  close(): Promise<void>;
}

export type DevicePipelineOptions = {
  device: string;
  source: DetectionSource;
  sessions: SessionController;
  postDetectionMs: number;
  /** Upper bound on any single wait, so the deadline check runs at least this often. */
  tickIntervalMs: number;
  clock?: Clock;
  logger?: PipelineLogger;
  metrics?: MetricsRegistry;
  bus?: EventSink;
};

export type PipelineState = 'idle' | 'running' | 'stopping' | 'stopped' | 'failed';

export type DevicePipelineStatus = {
  device: string;
  state: PipelineState;
  detection: DetectionState;
  recording: boolean;
  activations: number;
};

/**
 * One device: events from the source drive the detection machine, whose commands are
 * applied to the session controller one at a time.
 */
export class DevicePipeline {
  readonly device: string;
  private readonly source: DetectionSource;
  private readonly sessions: SessionController;
  private readonly machine: DetectionStateMachine;
  private readonly tickIntervalMs: number;
  private readonly clock: Clock;
  private readonly log: PipelineLogger;
  private readonly metrics: MetricsRegistry;
  private readonly bus: EventSink | null;
  private state: PipelineState = 'idle';
  private runPromise: Promise<void> | null = null;
  private stopReason: string | null = null;
  private sourceClosing: Promise<void> | null = null;

  constructor(options: DevicePipelineOptions) {
    this.device = options.device;
    this.source = options.source;
    this.sessions = options.sessions;
    this.machine = new DetectionStateMachine({ postDetectionMs: options.postDetectionMs });
    this.tickIntervalMs = options.tickIntervalMs;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? baseLogger.child({ device: options.device });
    this.metrics = options.metrics ?? defaultMetrics;
    this.bus = options.bus ?? null;
  }

  status(): DevicePipelineStatus {
    return {
      device: this.device,
      state: this.state,
      detection: this.machine.state,
      recording: this.sessions.isActive(),
      activations: this.machine.activationCount
    };
  }

  /** Runs until `stop()` is requested or a fatal error escapes. Repeated calls share one run. */
  run(): Promise<void> {
    if (!this.runPromise) {
      this.runPromise = this.execute();
    }
    return this.runPromise;
  }

  /**
   * Cooperative stop: unblocks the current wait, lets an in-flight command finish, then
   * closes the subscription and stops the recording. Resolves when the run has ended.
   */
  async stop(reason = 'shutdown'): Promise<void> {
    if (this.stopReason === null) {
      this.stopReason = reason;
      if (this.state === 'running') {
        this.state = 'stopping';
      }
      this.sourceClosing = this.source.close();
    }
    if (!this.runPromise) {
      this.state = 'stopped';
      await this.sourceClosing;
      await this.sessions.dispose();
      return;
    }
    await this.runPromise;
  }

  private get stopRequested() {
    return this.stopReason !== null;
  }

  private async execute() {
    this.state = this.stopRequested ? 'stopping' : 'running';
    this.log.info('Device pipeline started');
    try {
      while (!this.stopRequested) {
        this.reconcile();
        const deadline = this.machine.deadline;
        const waitMs =
          deadline === null
            ? this.tickIntervalMs
            : Math.max(0, Math.min(this.tickIntervalMs, deadline - this.clock.now()));

        const event = waitMs > 0 ? await this.source.nextEvent(waitMs) : null;
        if (this.stopRequested) {
          break;
        }
        if (event) {
          await this.handleEvent(event);
        }

        const stop = this.machine.checkDeadline(this.clock.now());
        if (stop) {
          await this.applyStop(stop);
        }
      }
      this.state = 'stopped';
    } catch (error) {
      this.state = 'failed';
      throw error;
    } finally {
      await this.shutdown();
    }
  }

  private async shutdown() {
    try {
      await (this.sourceClosing ?? this.source.close());
    } finally {
      await this.sessions.dispose();
      this.log.info({ reason: this.stopReason ?? this.state }, 'Device pipeline stopped');
    }
  }

  private async handleEvent(event: DetectionEvent) {
    this.metrics.recordDetection(this.device, event.isPresent);
    this.reconcile();

    const expired = this.machine.checkDeadline(event.observedAt);
    if (expired) {
      await this.applyStop(expired);
    }

    const command = this.machine.handle(event);
    if (!command) {
      this.log.debug({ isPresent: event.isPresent }, 'Detection event ignored');
      return;
    }

    if (command.type === 'start') {
      await this.applyStart(command);
      return;
    }

    this.sessions.extendSession(command.deadline);
    this.log.debug({ deadline: command.deadline }, 'Recording window extended');
  }

  private async applyStart(command: StartCommand) {
    this.log.info({ wallTime: command.wallTime.toISOString() }, 'Person detected');
    this.bus?.emitEvent({
      ts: command.wallTime,
      source: this.device,
      kind: 'detection',
      severity: 'info',
      message: 'Person detected',
      meta: { deadline: command.deadline }
    });

    try {
      await this.sessions.startSession({ wallTime: command.wallTime, deadline: command.deadline });
    } catch (error) {
      if (!(error instanceof SessionStartError)) {
        throw error;
      }
      this.machine.reset();
      this.log.error({ err: error }, 'Recording could not start; waiting for the next detection');
      this.bus?.emitEvent({
        source: this.device,
        kind: 'recording',
        severity: 'warning',
        message: 'Recording could not start',
        meta: { error: error.message }
      });
    }
  }

  private async applyStop(command: StopCommand) {
    this.log.info({ lateByMs: Math.max(0, command.at - command.deadline) }, 'No person for the post-detection window');
    await this.sessions.stopSession('deadline');
  }

  /** Drops back to IDLE when the recording ended underneath the machine. */
  private reconcile() {
    if (this.machine.isActive && !this.sessions.isActive()) {
      this.machine.reset();
      this.log.warn('Recording ended early; the next detection starts a new session');
    }
  }
}
