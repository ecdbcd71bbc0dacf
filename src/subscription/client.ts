import baseLogger, { type PipelineLogger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { ConnectError, ProtocolError, toError } from '../errors.js';
import type { DetectionEvent } from '../types.js';
import { computeBackoffDelay, type BackoffOptions } from '../utils/backoff.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { matchesTopic, toDetectionEvent, type NotificationFilter } from './notifications.js';
import type { EventTransport, RawNotification, SubscriptionHandle, SubscriptionLease } from './transport.js';

/** Floor on the interval between renewals, whatever lifetime the device grants. */
const MIN_RENEW_INTERVAL_MS = 1000;

export type ReconnectOptions = BackoffOptions & {
  /** Consecutive failures tolerated before giving up; 0 retries forever. */
  maxAttempts?: number;
};

export type SubscriptionClientOptions = {
  device: string;
  channel: number;
  transport: EventTransport;
  topics: string[];
  terminationSeconds: number;
  renewMarginSeconds: number;
  pullTimeoutSeconds: number;
  messageLimit: number;
  reconnect: ReconnectOptions;
  clock?: Clock;
  logger?: PipelineLogger;
  metrics?: MetricsRegistry;
};

export type SubscriptionInfo = {
  device: string;
  address: string;
  /** Monotonic time at which the subscription is renewed. */
  renewBefore: number;
  /** Monotonic time at which the device drops the subscription if not renewed. */
  terminationAt: number;
};

type ActiveSubscription = SubscriptionInfo & {
  handle: SubscriptionHandle;
};

type FailedOperation = 'connect' | 'renew' | 'pull';

export class SubscriptionClient {
  private readonly options: SubscriptionClientOptions;
  private readonly transport: EventTransport;
  private readonly clock: Clock;
  private readonly log: PipelineLogger;
  private readonly metrics: MetricsRegistry;
  private readonly filter: NotificationFilter;
  private readonly abortController = new AbortController();
  private readonly buffer: DetectionEvent[] = [];
  private subscription: ActiveSubscription | null = null;
  private failures = 0;
  private retryAt: number | null = null;
  private exhausted: ConnectError | null = null;
  private closePromise: Promise<void> | null = null;
  private inflight: Promise<void> | null = null;
  private described = false;
  private iterating = false;

  constructor(options: SubscriptionClientOptions) {
    this.options = options;
    this.transport = options.transport;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? baseLogger.child({ device: options.device });
    this.metrics = options.metrics ?? defaultMetrics;
    this.filter = { device: options.device, channel: options.channel, topics: options.topics };
  }

  get closed() {
    return this.closePromise !== null;
  }

  get info(): SubscriptionInfo | null {
    if (!this.subscription) {
      return null;
    }
    const { device, address, renewBefore, terminationAt } = this.subscription;
    return { device, address, renewBefore, terminationAt };
  }

  get consecutiveFailures() {
    return this.failures;
  }

  /** Creates the subscription. Rejects with `ConnectError`; does not retry. */
  async connect(): Promise<void> {
    if (this.closed) {
      throw new ConnectError('network', 'Subscription client is closed', { device: this.options.device });
    }
    const requestedAt = this.clock.now();
    const handle = await this.transport.createSubscription(
      this.options.terminationSeconds,
      this.abortController.signal
    );
    if (this.closed) {
      this.release(handle);
      return;
    }
    this.subscription = {
      device: this.options.device,
      address: handle.address,
      handle,
      ...this.scheduleLease(requestedAt, handle)
    };
    this.failures = 0;
    this.retryAt = null;
    this.metrics.recordConnect(this.options.device);
    this.log.info({ address: handle.address }, 'Event subscription established');
    if (!this.described) {
      this.described = true;
      await this.identifyDevice();
    }
  }

  /**
   * Waits at most `timeoutMs` for the next detection event. Resolves `null` on timeout,
   * including while a reconnect is pending, and once the client is closed. A request still
   * running at the timeout is left in flight and awaited again by the next call.
   */
  async nextEvent(timeoutMs: number): Promise<DetectionEvent | null> {
    const deadline = this.clock.now() + Math.max(0, timeoutMs);

    while (!this.closed) {
      if (this.exhausted) {
        throw this.exhausted;
      }

      const buffered = this.buffer.shift();
      if (buffered) {
        return buffered;
      }

      const now = this.clock.now();
      if (now >= deadline) {
        return null;
      }

      if (!this.inflight) {
        if (!this.subscription && this.retryAt !== null && now < this.retryAt) {
          await this.clock.sleep(Math.min(this.retryAt, deadline) - now, this.abortController.signal);
          continue;
        }
        this.inflight = this.begin(now, deadline);
      }
      await this.settle(this.inflight, deadline);
    }

    return null;
  }

  /** Unbounded stream of detection events; ends when the client is closed. */
  async *events(): AsyncGenerator<DetectionEvent, void, undefined> {
    if (this.iterating) {
      throw new Error('Subscription events can only be iterated once');
    }
    this.iterating = true;
    while (!this.closed) {
      const event = await this.nextEvent(this.options.pullTimeoutSeconds * 1000);
      if (event) {
        yield event;
      }
    }
  }

  /** Aborts pending waits and requests, then unsubscribes best-effort. Never rejects. */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.shutdown();
    }
    return this.closePromise;
  }

  private async shutdown() {
    this.abortController.abort();
    this.buffer.length = 0;
    const subscription = this.subscription;
    this.subscription = null;
    if (!subscription) {
      return;
    }
    try {
      await this.transport.unsubscribe(subscription.handle);
      this.log.debug({ address: subscription.address }, 'Unsubscribed');
    } catch (error) {
      this.log.debug({ err: error, address: subscription.address }, 'Unsubscribe failed');
    }
  }

  /** Starts the next request. The returned promise never rejects. */
  private begin(now: number, deadline: number): Promise<void> {
    const subscription = this.subscription;
    let operation: Promise<void>;
    if (!subscription) {
      operation = this.attempt('connect', () => this.connect());
    } else if (now >= subscription.renewBefore) {
      operation = this.attempt('renew', () => this.renew(subscription));
    } else {
      const pullTimeoutMs = Math.min(
        this.options.pullTimeoutSeconds * 1000,
        deadline - now,
        subscription.renewBefore - now
      );
      operation = this.attempt('pull', () => this.pull(subscription, pullTimeoutMs));
    }
    const tracked = operation.finally(() => {
      if (this.inflight === tracked) {
        this.inflight = null;
      }
    });
    return tracked;
  }

  /** Waits for `operation` until `deadline` or until the client closes. */
  private async settle(operation: Promise<void>, deadline: number) {
    const timer = new AbortController();
    const cancel = () => timer.abort();
    this.abortController.signal.addEventListener('abort', cancel, { once: true });
    try {
      await Promise.race([operation, this.clock.sleep(deadline - this.clock.now(), timer.signal)]);
    } finally {
      timer.abort();
      this.abortController.signal.removeEventListener('abort', cancel);
    }
  }

  private async identifyDevice() {
    try {
      const description = await this.transport.describeDevice?.(this.abortController.signal);
      if (!description || this.closed) {
        return;
      }
      const { manufacturer, model, firmwareVersion, serialNumber, topics } = description;
      this.log.info({ manufacturer, model, firmwareVersion, serialNumber }, 'Camera identified');
      if (topics.length > 0 && !topics.some(topic => matchesTopic(topic, this.options.topics))) {
        this.log.warn(
          { channel: this.options.channel, topics: this.options.topics },
          'Camera does not advertise the person detection topic'
        );
      }
    } catch (error) {
      if (!this.closed) {
        this.log.warn({ err: error }, 'Could not read camera identity');
      }
    }
  }

  /** Best-effort unsubscribe of a handle the client no longer uses. */
  private release(handle: SubscriptionHandle) {
    void this.transport.unsubscribe(handle).then(
      () => this.log.debug({ address: handle.address }, 'Released dropped subscription'),
      error => this.log.debug({ err: error, address: handle.address }, 'Unsubscribe of dropped subscription failed')
    );
  }

  private async renew(subscription: ActiveSubscription) {
    const requestedAt = this.clock.now();
    const lease = await this.transport.renew(
      subscription.handle,
      this.options.terminationSeconds,
      this.abortController.signal
    );
    if (this.subscription !== subscription) {
      return;
    }
    this.subscription = { ...subscription, ...this.scheduleLease(requestedAt, lease) };
    this.metrics.recordRenewal(this.options.device);
    this.log.debug({ terminationTime: lease.terminationTime.toISOString() }, 'Subscription renewed');
  }

  private async pull(subscription: ActiveSubscription, timeoutMs: number) {
    const result = await this.transport.pull(
      subscription.handle,
      { timeoutMs, messageLimit: this.options.messageLimit },
      this.abortController.signal
    );
    if (this.closed) {
      return;
    }
    const observedAt = this.clock.now();
    const receivedAt = this.clock.wallNow();
    for (const notification of result.notifications) {
      this.accept(notification, observedAt, receivedAt);
    }
  }

  private accept(notification: RawNotification, observedAt: number, receivedAt: Date) {
    try {
      this.buffer.push(toDetectionEvent(notification, this.filter, observedAt, receivedAt));
    } catch (error) {
      if (!(error instanceof ProtocolError)) {
        throw error;
      }
      this.metrics.recordDiscardedNotification(this.options.device, error.reason);
      this.log.debug(
        { reason: error.reason, topic: notification.topic, err: error },
        'Discarded notification'
      );
    }
  }

  private async attempt(operation: FailedOperation, run: () => Promise<void>) {
    try {
      await run();
    } catch (error) {
      if (this.closed) {
        return;
      }
      this.recordFailure(operation, error);
    }
  }

  private recordFailure(operation: FailedOperation, error: unknown) {
    const failure =
      error instanceof ConnectError
        ? error
        : new ConnectError('network', toError(error).message, { device: this.options.device, cause: error });
    const dropped = this.subscription;
    this.subscription = null;
    if (dropped) {
      this.release(dropped.handle);
    }
    this.failures += 1;
    const attempt = this.failures;
    const maxAttempts = this.options.reconnect.maxAttempts ?? 0;

    if (maxAttempts > 0 && attempt >= maxAttempts) {
      this.retryAt = null;
      this.metrics.recordConnectFailure(this.options.device, { reason: failure.reason, attempt, delayMs: null });
      this.log.error({ err: failure, operation, attempt }, 'Giving up on event subscription');
      this.exhausted = new ConnectError('exhausted', `Gave up after ${attempt} failed attempts`, {
        device: this.options.device,
        cause: failure
      });
      return;
    }

    const { delayMs } = computeBackoffDelay(attempt, this.options.reconnect);
    this.retryAt = this.clock.now() + delayMs;
    this.metrics.recordConnectFailure(this.options.device, { reason: failure.reason, attempt, delayMs });
    this.log.warn(
      { err: failure, operation, reason: failure.reason, attempt, delayMs },
      'Event subscription failed; reconnecting'
    );
  }

  /**
   * Maps the device-reported lifetime onto the local monotonic clock. Only the difference
   * between the device's two timestamps is used.
   */
  private scheduleLease(requestedAt: number, lease: SubscriptionLease) {
    const lifetimeMs = Math.max(0, lease.terminationTime.getTime() - lease.currentTime.getTime());
    const marginMs = this.options.renewMarginSeconds * 1000;
    const renewInMs = Math.max(lifetimeMs - marginMs, lifetimeMs / 2, MIN_RENEW_INTERVAL_MS);
    return {
      renewBefore: requestedAt + renewInMs,
      terminationAt: requestedAt + lifetimeMs
    };
  }
}
