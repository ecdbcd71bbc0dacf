import type { DetectionEvent } from '../types.js';

export type DetectionStateName = 'IDLE' | 'ACTIVE';

export type DetectionState =
  | { state: 'IDLE' }
  | { state: 'ACTIVE'; deadline: number; lastPositiveAt: number; activatedAt: number };

export type StartCommand = { type: 'start'; at: number; wallTime: Date; deadline: number };
export type ExtendCommand = { type: 'extend'; at: number; deadline: number };
export type StopCommand = { type: 'stop'; at: number; deadline: number };

export type DetectionCommand = StartCommand | ExtendCommand | StopCommand;

export type DetectionStateMachineOptions = {
  postDetectionMs: number;
};

/**
 * Per-device IDLE/ACTIVE machine. Time only enters through the events and the `now`
 * passed to `checkDeadline`, so the machine never reads a clock itself.
 */
export class DetectionStateMachine {
  private readonly postDetectionMs: number;
  private current: DetectionState = { state: 'IDLE' };
  private activations = 0;

  constructor(options: DetectionStateMachineOptions) {
    if (!(options.postDetectionMs > 0)) {
      throw new RangeError('postDetectionMs must be greater than 0');
    }
    this.postDetectionMs = options.postDetectionMs;
  }

  get state(): DetectionState {
    return this.current;
  }

  get isActive() {
    return this.current.state === 'ACTIVE';
  }

  /** Number of IDLE→ACTIVE transitions so far. */
  get activationCount() {
    return this.activations;
  }

  get deadline(): number | null {
    return this.current.state === 'ACTIVE' ? this.current.deadline : null;
  }

  handle(event: DetectionEvent): StartCommand | ExtendCommand | null {
    if (!event.isPresent) {
      return null;
    }

    const candidate = event.observedAt + this.postDetectionMs;

    if (this.current.state === 'IDLE') {
      this.current = {
        state: 'ACTIVE',
        deadline: candidate,
        lastPositiveAt: event.observedAt,
        activatedAt: event.observedAt
      };
      this.activations += 1;
      return { type: 'start', at: event.observedAt, wallTime: event.wallTime, deadline: candidate };
    }

    const deadline = Math.max(this.current.deadline, candidate);
    this.current = {
      ...this.current,
      deadline,
      lastPositiveAt: Math.max(this.current.lastPositiveAt, event.observedAt)
    };
    return { type: 'extend', at: event.observedAt, deadline };
  }

  checkDeadline(now: number): StopCommand | null {
    if (this.current.state !== 'ACTIVE' || now < this.current.deadline) {
      return null;
    }
    const { deadline } = this.current;
    this.current = { state: 'IDLE' };
    return { type: 'stop', at: now, deadline };
  }

  /** Forces IDLE without a stop command, e.g. after the recording failed underneath. */
  reset(): boolean {
    if (this.current.state === 'IDLE') {
      return false;
    }
    this.current = { state: 'IDLE' };
    return true;
  }
}
