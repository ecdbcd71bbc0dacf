/** One notification as delivered by the device, before any interpretation. */
export interface RawNotification {
  topic: string;
  utcTime: Date | null;
  propertyOperation: string | null;
  source: Record<string, string>;
  data: Record<string, string>;
}

/** The device's view of the subscription lifetime, in the device's own clock. */
export interface SubscriptionLease {
  currentTime: Date;
  terminationTime: Date;
}

export interface SubscriptionHandle extends SubscriptionLease {
  /** Endpoint reference the device returned for this subscription. */
  address: string;
}

export interface PullResult extends SubscriptionLease {
  notifications: RawNotification[];
}

export interface PullRequest {
  timeoutMs: number;
  messageLimit: number;
}

/** What the device reports about itself. */
export interface DeviceDescription {
  manufacturer: string | null;
  model: string | null;
  firmwareVersion: string | null;
  serialNumber: string | null;
  /** Advertised event topics, `/`-separated, without namespace prefixes. */
  topics: string[];
}

/**
 * Stateful event subscription against one device. Request failures reject with a
 * `ConnectError`; nothing here retries.
 */
export interface EventTransport {
  createSubscription(terminationSeconds: number, signal?: AbortSignal): Promise<SubscriptionHandle>;
  renew(
    subscription: SubscriptionHandle,
    terminationSeconds: number,
    signal?: AbortSignal
  ): Promise<SubscriptionLease>;
  pull(subscription: SubscriptionHandle, request: PullRequest, signal?: AbortSignal): Promise<PullResult>;
  unsubscribe(subscription: SubscriptionHandle, signal?: AbortSignal): Promise<void>;
  /** Identity and event capabilities, read once after the first subscription. */
  describeDevice?(signal?: AbortSignal): Promise<DeviceDescription>;
}
