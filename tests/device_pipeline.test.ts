import { describe, expect, it } from 'vitest';
import { SessionStartError } from '../src/errors.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { DevicePipeline, type DetectionSource } from '../src/pipeline/devicePipeline.js';
import type {
  RecordingSession,
  SessionController,
  StartSessionRequest
} from '../src/recording/sessionManager.js';
import { SubscriptionClient } from '../src/subscription/client.js';
import type { DetectionEvent, EventPayload } from '../src/types.js';
import { VirtualClock } from './helpers/clock.js';
import { createTestLogger, loggedMessages } from './helpers/logger.js';
import { FakeEventTransport, presence } from './helpers/transport.js';

type Step = { at: number; isPresent: boolean; late?: boolean };

/**
 * Delivers each step once the wait reaches it (or straight away when `late`), advancing
 * the clock. With nothing left and the clock at `endAt`, it blocks until closed.
 */
class ScriptedSource implements DetectionSource {
  readonly waits: number[] = [];
  readonly drained: Promise<void>;
  private readonly steps: Step[];
  private closed = false;
  private release: (() => void) | null = null;
  private markDrained: () => void = () => {};

  constructor(
    private readonly clock: VirtualClock,
    private readonly log: string[],
    steps: Step[],
    private readonly endAt: number
  ) {
    this.steps = [...steps];
    this.drained = new Promise(resolve => {
      this.markDrained = resolve;
    });
  }

  async nextEvent(timeoutMs: number): Promise<DetectionEvent | null> {
    this.waits.push(timeoutMs);
    if (this.closed) {
      return null;
    }
    const now = this.clock.now();
    const next = this.steps[0];
    if (next && (next.late || next.at <= now + timeoutMs)) {
      this.steps.shift();
      this.clock.set(next.at);
      return {
        device: 'front',
        observedAt: this.clock.now(),
        wallTime: this.clock.wallNow(),
        isPresent: next.isPresent,
        topic: 'tns1:RuleEngine/MyRuleDetector/PeopleDetect'
      };
    }
    if (!next && now >= this.endAt) {
      this.markDrained();
      await new Promise<void>(resolve => {
        this.release = resolve;
      });
      return null;
    }
    this.clock.advance(timeoutMs);
    await Promise.resolve();
    return null;
  }

  async close() {
    this.closed = true;
    this.log.push('close');
    this.release?.();
  }
}

class FakeSessions implements SessionController {
  readonly requests: StartSessionRequest[] = [];
  /** Resolves on the first stop. */
  readonly stopped: Promise<void>;
  private active = false;
  private markStopped: () => void = () => {};

  constructor(
    private readonly clock: VirtualClock,
    private readonly log: string[],
    private readonly options: { failStarts?: number; startError?: Error; crashAt?: number } = {}
  ) {
    this.stopped = new Promise(resolve => {
      this.markStopped = resolve;
    });
  }

  async startSession(request: StartSessionRequest): Promise<RecordingSession> {
    this.requests.push(request);
    const at = this.clock.now();
    if (this.options.startError) {
      this.log.push(`start-error@${at}`);
      throw this.options.startError;
    }
    if ((this.options.failStarts ?? 0) > 0) {
      this.options.failStarts = (this.options.failStarts ?? 0) - 1;
      this.log.push(`start-failed@${at}`);
      throw new SessionStartError('Cannot launch capture: spawn ffmpeg ENOENT', { device: 'front' });
    }
    this.active = true;
    this.log.push(`start@${at} until ${request.deadline}`);
    return {
      id: `front-${at}`,
      device: 'front',
      artifact: `person_${at}`,
      startedAt: request.wallTime,
      startedAtMs: at,
      stoppedAtMs: null,
      snapshotPath: `/tmp/front/snapshots/person_${at}.jpg`,
      clipPath: `/tmp/front/clips/person_${at}.mp4`,
      status: 'RUNNING',
      deadline: request.deadline,
      snapshot: 'pending',
      stopReason: null,
      outcome: null,
      clipBytes: null
    };
  }

  extendSession(deadline: number) {
    this.log.push(`extend ${deadline}`);
  }

  async stopSession(reason: string) {
    if (!this.active) {
      return null;
    }
    this.active = false;
    this.log.push(`stop:${reason}@${this.clock.now()}`);
    this.markStopped();
    return null;
  }

  isActive() {
    const crashAt = this.options.crashAt;
    if (this.active && crashAt !== undefined && this.clock.now() >= crashAt) {
      this.active = false;
      delete this.options.crashAt;
      this.log.push(`crash@${this.clock.now()}`);
    }
    return this.active;
  }

  async dispose() {
    this.log.push('dispose');
    this.active = false;
  }
}

function setup(
  steps: Step[],
  options: {
    endAt: number;
    postDetectionMs?: number;
    sessions?: ConstructorParameters<typeof FakeSessions>[2];
  }
) {
  const clock = new VirtualClock();
  const log: string[] = [];
  const source = new ScriptedSource(clock, log, steps, options.endAt);
  const sessions = new FakeSessions(clock, log, options.sessions);
  const logger = createTestLogger();
  const metrics = new MetricsRegistry();
  const events: EventPayload[] = [];
  const pipeline = new DevicePipeline({
    device: 'front',
    source,
    sessions,
    postDetectionMs: options.postDetectionMs ?? 15_000,
    tickIntervalMs: 1000,
    clock,
    logger,
    metrics,
    bus: { emitEvent: payload => events.push(payload) }
  });
  return { clock, log, source, sessions, logger, metrics, events, pipeline };
}

describe('DevicePipeline', () => {
  it('records one session across overlapping detections', async () => {
    const { log, source, pipeline, metrics, events } = setup(
      [
        { at: 0, isPresent: true },
        { at: 5000, isPresent: true },
        { at: 10_000, isPresent: false }
      ],
      { endAt: 30_000 }
    );

    const run = pipeline.run();
    await source.drained;
    expect(pipeline.status()).toEqual({
      device: 'front',
      state: 'running',
      detection: { state: 'IDLE' },
      recording: false,
      activations: 1
    });
    await pipeline.stop('shutdown');
    await run;

    expect(log).toEqual(['start@0 until 15000', 'extend 20000', 'stop:deadline@20000', 'close', 'dispose']);
    expect(pipeline.status().state).toBe('stopped');
    expect(metrics.snapshot().devices.front?.events).toEqual({ present: 2, absent: 1 });
    expect(events.map(event => event.message)).toEqual(['Person detected']);
  });

  it('never waits past the recording deadline', async () => {
    const { log, source, pipeline } = setup([{ at: 0, isPresent: true }], {
      endAt: 3000,
      postDetectionMs: 1500
    });

    const run = pipeline.run();
    await source.drained;
    await pipeline.stop();
    await run;

    expect(source.waits.slice(0, 3)).toEqual([1000, 1000, 500]);
    expect(log.slice(0, 2)).toEqual(['start@0 until 1500', 'stop:deadline@1500']);
  });

  it('stops on time while the camera stops answering mid-recording', async () => {
    const clock = new VirtualClock();
    const log: string[] = [];
    const metrics = new MetricsRegistry();
    const transport = new FakeEventTransport(clock).queuePull([presence(true)]).holdFrom(0);
    const source = new SubscriptionClient({
      device: 'front',
      channel: 0,
      transport,
      topics: ['RuleEngine/MyRuleDetector/PeopleDetect'],
      terminationSeconds: 60,
      renewMarginSeconds: 10,
      pullTimeoutSeconds: 5,
      messageLimit: 10,
      reconnect: { baseDelayMs: 1000, maxDelayMs: 8000, jitterFactor: 0 },
      clock,
      logger: createTestLogger(),
      metrics
    });
    const sessions = new FakeSessions(clock, log);
    const pipeline = new DevicePipeline({
      device: 'front',
      source,
      sessions,
      postDetectionMs: 15_000,
      tickIntervalMs: 1000,
      clock,
      logger: createTestLogger(),
      metrics
    });

    const run = pipeline.run();
    await sessions.stopped;
    await pipeline.stop('shutdown');
    await run;

    expect(log).toEqual(['start@0 until 15000', 'stop:deadline@15000', 'dispose']);
    expect(transport.calls).toEqual(['create', 'pull', 'pull', 'unsubscribe']);
    expect(transport.unsubscribed).toEqual(['sub-1']);
  });

  it('stops an expired session before starting the next one for a late detection', async () => {
    const { log, source, pipeline, sessions } = setup(
      [
        { at: 0, isPresent: true },
        { at: 16_000, isPresent: true, late: true }
      ],
      { endAt: 40_000 }
    );

    const run = pipeline.run();
    await source.drained;
    await pipeline.stop();
    await run;

    expect(log).toEqual([
      'start@0 until 15000',
      'stop:deadline@16000',
      'start@16000 until 31000',
      'stop:deadline@31000',
      'close',
      'dispose'
    ]);
    expect(sessions.requests[1]?.wallTime).toEqual(new Date(2024, 4, 1, 10, 0, 16, 0));
    expect(pipeline.status().activations).toBe(2);
  });

  it('waits for the next detection after a recording fails to start', async () => {
    const { log, source, pipeline, logger, events } = setup(
      [
        { at: 0, isPresent: true },
        { at: 2000, isPresent: true }
      ],
      { endAt: 20_000, sessions: { failStarts: 1 } }
    );

    const run = pipeline.run();
    await source.drained;
    await pipeline.stop();
    await run;

    expect(log).toEqual(['start-failed@0', 'start@2000 until 17000', 'stop:deadline@17000', 'close', 'dispose']);
    expect(loggedMessages(logger, 'error')).toEqual(['Recording could not start; waiting for the next detection']);
    expect(events.map(event => `${event.severity} ${event.message}`)).toEqual([
      'info Person detected',
      'warning Recording could not start',
      'info Person detected'
    ]);
  });

  it('drops back to idle when the recording ends underneath it', async () => {
    const { log, source, pipeline, logger } = setup(
      [
        { at: 0, isPresent: true },
        { at: 6000, isPresent: true }
      ],
      { endAt: 30_000, sessions: { crashAt: 3000 } }
    );

    const run = pipeline.run();
    await source.drained;
    await pipeline.stop();
    await run;

    expect(log).toEqual([
      'start@0 until 15000',
      'crash@3000',
      'start@6000 until 21000',
      'stop:deadline@21000',
      'close',
      'dispose'
    ]);
    expect(loggedMessages(logger, 'warn')).toEqual(['Recording ended early; the next detection starts a new session']);
  });

  it('closes the subscription before the recording on shutdown', async () => {
    const { log, source, pipeline } = setup([{ at: 0, isPresent: true }], { endAt: 5000 });

    const run = pipeline.run();
    await source.drained;
    expect(pipeline.status().recording).toBe(true);
    await pipeline.stop('shutdown');
    await run;

    expect(log).toEqual(['start@0 until 15000', 'close', 'dispose']);
  });

  it('fails on unexpected errors and still releases its resources', async () => {
    const { log, pipeline } = setup([{ at: 0, isPresent: true }], {
      endAt: 5000,
      sessions: { startError: new Error('disk exploded') }
    });

    await expect(pipeline.run()).rejects.toThrow('disk exploded');

    expect(log).toEqual(['start-error@0', 'close', 'dispose']);
    expect(pipeline.status().state).toBe('failed');
  });

  it('can be stopped before it runs', async () => {
    const { log, pipeline } = setup([], { endAt: 0 });

    await pipeline.stop();

    expect(log).toEqual(['close', 'dispose']);
    expect(pipeline.status().state).toBe('stopped');
  });
});
