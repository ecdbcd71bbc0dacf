import { describe, expect, it, vi } from 'vitest';
import { ConnectError } from '../src/errors.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import {
  CameraSupervisor,
  type PipelineFailureEvent,
  type SupervisedPipeline,
  type SupervisorOptions
} from '../src/pipeline/supervisor.js';
import type { EventPayload } from '../src/types.js';
import { VirtualClock } from './helpers/clock.js';
import { createTestLogger, loggedMessages } from './helpers/logger.js';

type Behaviour = { fail: Error } | 'exit' | 'block' | { rejectStop: Error } | { create: Error };

/** Runs until stopped, unless its behaviour says to fail or exit first. */
class FakePipeline implements SupervisedPipeline {
  readonly stops: string[] = [];
  private finish: () => void = () => {};

  constructor(private readonly behaviour: Behaviour) {}

  run(): Promise<void> {
    if (this.behaviour === 'exit') {
      return Promise.resolve();
    }
    if (typeof this.behaviour === 'object' && 'fail' in this.behaviour) {
      return Promise.reject(this.behaviour.fail);
    }
    return new Promise(resolve => {
      this.finish = resolve;
    });
  }

  async stop(reason = 'shutdown') {
    this.stops.push(reason);
    this.finish();
    if (typeof this.behaviour === 'object' && 'rejectStop' in this.behaviour) {
      throw this.behaviour.rejectStop;
    }
  }
}

function setup(
  scripts: Record<string, Behaviour[]>,
  options: Partial<Pick<SupervisorOptions, 'restartPolicy' | 'maxRestarts'>> = {}
) {
  const clock = new VirtualClock();
  const logger = createTestLogger();
  const metrics = new MetricsRegistry();
  const events: EventPayload[] = [];
  const created: Record<string, FakePipeline[]> = {};
  const failures: PipelineFailureEvent[] = [];

  const supervisor = new CameraSupervisor({
    devices: Object.keys(scripts),
    createPipeline: device => {
      const behaviour = scripts[device]?.shift() ?? 'block';
      if (typeof behaviour === 'object' && 'create' in behaviour) {
        throw behaviour.create;
      }
      const pipeline = new FakePipeline(behaviour);
      (created[device] ??= []).push(pipeline);
      return pipeline;
    },
    restartPolicy: options.restartPolicy ?? 'restart',
    restartDelayMs: 5000,
    maxRestarts: options.maxRestarts ?? 0,
    clock,
    logger,
    metrics,
    bus: { emitEvent: payload => events.push(payload) }
  });
  supervisor.on('pipeline-failed', (event: PipelineFailureEvent) => failures.push(event));

  return { clock, logger, metrics, events, created, failures, supervisor };
}

const refused = () => new ConnectError('network', 'Connection refused', { device: 'front' });

describe('CameraSupervisor', () => {
  it('keeps healthy devices running while one keeps failing', async () => {
    const { supervisor, created, failures, metrics, events } = setup({
      front: [{ fail: refused() }, { fail: refused() }, { fail: refused() }, { fail: refused() }],
      back: []
    });

    supervisor.start();
    await vi.waitFor(() => expect(created.front).toHaveLength(5));

    expect(supervisor.status()).toEqual([
      {
        device: 'front',
        state: 'running',
        restarts: 4,
        lastError: 'Connection refused',
        lastErrorAt: new Date(2024, 4, 1, 10, 0, 15, 0).toISOString(),
        severity: 'warning',
        severityReason: 'restarts 4 >= 3'
      },
      {
        device: 'back',
        state: 'running',
        restarts: 0,
        lastError: null,
        lastErrorAt: null,
        severity: 'none',
        severityReason: null
      }
    ]);
    expect(created.back).toHaveLength(1);
    expect(created.back?.[0]?.stops).toEqual([]);
    expect(failures.map(failure => [failure.device, failure.restarts, failure.willRestart])).toEqual([
      ['front', 1, true],
      ['front', 2, true],
      ['front', 3, true],
      ['front', 4, true]
    ]);
    expect(metrics.snapshot().devices.front?.pipeline).toEqual({
      restarts: 4,
      lastRestartReason: 'Connection refused'
    });
    expect(events[0]).toEqual({
      source: 'front',
      kind: 'supervisor',
      severity: 'warning',
      message: 'Pipeline failed; restarting',
      meta: { error: 'Connection refused', restarts: 0 }
    });

    await supervisor.stop();

    expect(created.front?.[4]?.stops).toEqual(['shutdown']);
    expect(created.back?.[0]?.stops).toEqual(['shutdown']);
    expect(supervisor.status().map(status => status.state)).toEqual(['stopped', 'stopped']);
  });

  it('leaves a failed pipeline stopped under the stop policy', async () => {
    const { supervisor, created, failures, logger, events } = setup(
      { front: [{ fail: refused() }], back: [] },
      { restartPolicy: 'stop' }
    );
    const exhausted = vi.fn();
    supervisor.on('exhausted', exhausted);

    supervisor.start();
    await vi.waitFor(() => expect(failures).toHaveLength(1));

    expect(failures[0]).toMatchObject({ device: 'front', restarts: 0, willRestart: false });
    expect(created.front).toHaveLength(1);
    expect(supervisor.status().map(status => status.state)).toEqual(['failed', 'running']);
    expect(loggedMessages(logger, 'error')).toEqual(['Device pipeline failed; leaving it stopped']);
    expect(events.map(event => `${event.severity} ${event.message}`)).toEqual([
      'critical Pipeline failed permanently'
    ]);
    expect(exhausted).not.toHaveBeenCalled();

    await supervisor.stop();
    expect(supervisor.status().map(status => status.state)).toEqual(['failed', 'stopped']);
  });

  it('parks a device whose pipeline cannot be built without affecting the others', async () => {
    const { supervisor, created, failures, logger } = setup(
      { front: [{ create: new Error('bad front config') }], back: [] },
      { restartPolicy: 'stop' }
    );

    supervisor.start();

    expect(created.front).toBeUndefined();
    expect(failures.map(failure => [failure.device, failure.restarts, failure.willRestart])).toEqual([
      ['front', 0, false]
    ]);
    expect(supervisor.status()).toEqual([
      {
        device: 'front',
        state: 'failed',
        restarts: 0,
        lastError: 'bad front config',
        lastErrorAt: new Date(2024, 4, 1, 10, 0, 0, 0).toISOString(),
        severity: 'none',
        severityReason: null
      },
      {
        device: 'back',
        state: 'running',
        restarts: 0,
        lastError: null,
        lastErrorAt: null,
        severity: 'none',
        severityReason: null
      }
    ]);
    expect(supervisor.exhausted).toBe(false);

    await expect(supervisor.stop()).resolves.toBeUndefined();
    expect(created.back?.[0]?.stops).toEqual(['shutdown']);
    expect(supervisor.status().map(status => status.state)).toEqual(['failed', 'stopped']);
    expect(loggedMessages(logger, 'error')).toEqual(['Device pipeline failed; leaving it stopped']);
  });

  it('reports exhaustion when the only pipeline cannot be built', () => {
    const { supervisor } = setup({ front: [{ create: new Error('bad front config') }] }, { restartPolicy: 'stop' });
    const exhausted = vi.fn();
    supervisor.on('exhausted', exhausted);

    supervisor.start();

    expect(exhausted).toHaveBeenCalledTimes(1);
    expect(supervisor.exhausted).toBe(true);
    expect(supervisor.status()[0]).toMatchObject({ state: 'failed', lastError: 'bad front config' });
  });

  it('gives up after the restart limit and reports exhaustion', async () => {
    const { supervisor, created, logger, clock } = setup(
      { front: [{ fail: refused() }, { fail: refused() }, { fail: refused() }] },
      { maxRestarts: 2 }
    );
    const exhausted = new Promise<void>(resolve => supervisor.once('exhausted', resolve));

    supervisor.start();
    await exhausted;
    await supervisor.whenIdle();

    expect(created.front).toHaveLength(3);
    expect(clock.now()).toBe(10_000);
    expect(supervisor.status()[0]).toMatchObject({ state: 'failed', restarts: 2 });
    expect(loggedMessages(logger, 'error')).toEqual([
      'Device pipeline failed; restarting',
      'Device pipeline failed; restarting',
      'Device pipeline failed; leaving it stopped',
      'Every device pipeline has failed'
    ]);
  });

  it('treats a pipeline that returns on its own as failed', async () => {
    const { supervisor, created } = setup({ front: ['exit'] });

    supervisor.start();
    await vi.waitFor(() => expect(created.front).toHaveLength(2));

    expect(supervisor.status()[0]).toMatchObject({
      state: 'running',
      restarts: 1,
      lastError: 'Pipeline exited without a stop request'
    });
    await supervisor.stop();
  });

  it('stops every pipeline and waits for them to finish', async () => {
    const { supervisor, created, logger } = setup({
      front: [{ rejectStop: new Error('subscription already gone') }],
      back: []
    });

    supervisor.start();
    const first = supervisor.stop('signal');
    const second = supervisor.stop('again');
    await first;

    expect(second).toBe(first);
    expect(supervisor.stopping).toBe(true);
    expect(created.front?.[0]?.stops).toEqual(['signal']);
    expect(created.back?.[0]?.stops).toEqual(['signal']);
    expect(loggedMessages(logger, 'warn')).toEqual(['Pipeline reported an error while stopping']);
    expect(loggedMessages(logger, 'info')).toEqual(['Supervisor started', 'Supervisor stopping', 'Supervisor stopped']);
    expect(supervisor.status().map(status => status.state)).toEqual(['stopped', 'stopped']);
  });
});
