import axios, { type AxiosInstance } from 'axios';
import { ConnectError, ProtocolError } from '../errors.js';
import type {
  DeviceDescription,
  EventTransport,
  PullRequest,
  PullResult,
  RawNotification,
  SubscriptionHandle,
  SubscriptionLease
} from '../subscription/transport.js';
import {
  SoapFaultError,
  asArray,
  attributeOf,
  buildEnvelope,
  child,
  formatDuration,
  isRecord,
  parseSoapBody,
  textOf,
  type Credentials
} from './soap.js';

const ACTIONS = {
  create: 'http://www.onvif.org/ver10/events/wsdl/EventPortType/CreatePullPointSubscriptionRequest',
  pull: 'http://www.onvif.org/ver10/events/wsdl/PullPointSubscription/PullMessagesRequest',
  renew: 'http://docs.oasis-open.org/wsn/bw-2/SubscriptionManager/RenewRequest',
  unsubscribe: 'http://docs.oasis-open.org/wsn/bw-2/SubscriptionManager/UnsubscribeRequest',
  deviceInformation: 'http://www.onvif.org/ver10/device/wsdl/GetDeviceInformation',
  eventProperties: 'http://www.onvif.org/ver10/events/wsdl/EventPortType/GetEventPropertiesRequest'
} as const;

const DEVICE_WSDL = 'http://www.onvif.org/ver10/device/wsdl';

export const DEFAULT_EVENT_SERVICE_PATH = '/onvif/event_service';
export const DEFAULT_DEVICE_SERVICE_PATH = '/onvif/device_service';

export type SoapHttpResponse = {
  status: number;
  data: string;
};

export type SoapHttpRequestOptions = {
  headers: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
};

/** The single HTTP call the transport needs. Rejects only on transport-level failures. */
export interface SoapHttpClient {
  post(url: string, body: string, options: SoapHttpRequestOptions): Promise<SoapHttpResponse>;
}

export function createAxiosSoapClient(instance: AxiosInstance = axios.create()): SoapHttpClient {
  return {
    async post(url, body, options) {
      const response = await instance.post<string>(url, body, {
        headers: options.headers,
        timeout: options.timeoutMs,
        signal: options.signal,
        responseType: 'text',
        validateStatus: () => true
      });
      return {
        status: response.status,
        data: typeof response.data === 'string' ? response.data : ''
      };
    }
  };
}

export type PullPointDevice = Credentials & {
  name: string;
  host: string;
  onvifPort: number;
};

export type PullPointTransportOptions = {
  device: PullPointDevice;
  requestTimeoutMs: number;
  http?: SoapHttpClient;
  servicePath?: string;
  /** Local wall clock, used only when a response omits the device's own times. */
  now?: () => Date;
};

type Operation = keyof typeof ACTIONS;

function parseDate(value: string | null): Date | null {
  if (!value) {
    return null;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function readSimpleItems(node: unknown): Record<string, string> {
  const items: Record<string, string> = {};
  for (const item of asArray(child(node, 'SimpleItem'))) {
    const name = attributeOf(item, 'Name');
    const value = attributeOf(item, 'Value');
    if (name !== null && value !== null) {
      items[name] = value;
    }
  }
  return items;
}

export function parseNotificationMessage(node: unknown): RawNotification {
  const message = child(node, 'Message', 'Message');
  return {
    topic: textOf(child(node, 'Topic'))?.trim() ?? '',
    utcTime: parseDate(attributeOf(message, 'UtcTime')),
    propertyOperation: attributeOf(message, 'PropertyOperation'),
    source: readSimpleItems(child(message, 'Source')),
    data: readSimpleItems(child(message, 'Data'))
  };
}

/** Flattens a wstop:TopicSet into `a/b/c` paths of the elements marked as topics. */
export function collectTopics(node: unknown, prefix: string[] = []): string[] {
  if (!isRecord(node)) {
    return [];
  }
  const topics: string[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith('@_') || key === '#text' || key === 'MessageDescription') {
      continue;
    }
    const path = [...prefix, key];
    for (const element of asArray(value)) {
      if (attributeOf(element, 'topic') === 'true') {
        topics.push(path.join('/'));
      }
      topics.push(...collectTopics(element, path));
    }
  }
  return topics;
}

function toConnectError(error: unknown, operation: Operation, device: string): ConnectError {
  if (error instanceof ConnectError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ConnectError('timeout', `${operation} timed out`, { device, cause: error });
    }
    return new ConnectError('network', `${operation} failed: ${error.message}`, { device, cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectError('network', `${operation} failed: ${message}`, { device, cause: error });
}

/**
 * ONVIF PullPoint subscription over SOAP 1.2, authenticated with a WS-Security
 * UsernameToken digest on every request.
 */
export class OnvifPullPointTransport implements EventTransport {
  private readonly device: PullPointDevice;
  private readonly http: SoapHttpClient;
  private readonly requestTimeoutMs: number;
  private readonly serviceUrl: string;
  private readonly deviceUrl: string;
  private readonly now: () => Date;

  constructor(options: PullPointTransportOptions) {
    this.device = options.device;
    this.http = options.http ?? createAxiosSoapClient();
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.now = options.now ?? (() => new Date());
    const servicePath = options.servicePath ?? DEFAULT_EVENT_SERVICE_PATH;
    this.serviceUrl = `http://${options.device.host}:${options.device.onvifPort}${servicePath}`;
    this.deviceUrl = `http://${options.device.host}:${options.device.onvifPort}${DEFAULT_DEVICE_SERVICE_PATH}`;
  }

  get eventServiceUrl() {
    return this.serviceUrl;
  }

  get deviceServiceUrl() {
    return this.deviceUrl;
  }

  async describeDevice(signal?: AbortSignal): Promise<DeviceDescription> {
    const information = child(
      await this.request(
        'deviceInformation',
        this.deviceUrl,
        `<tds:GetDeviceInformation xmlns:tds="${DEVICE_WSDL}"/>`,
        this.requestTimeoutMs,
        signal
      ),
      'GetDeviceInformationResponse'
    );
    const properties = child(
      await this.request('eventProperties', this.serviceUrl, '<tev:GetEventProperties/>', this.requestTimeoutMs, signal),
      'GetEventPropertiesResponse'
    );

    const field = (name: string) => textOf(child(information, name))?.trim() || null;
    return {
      manufacturer: field('Manufacturer'),
      model: field('Model'),
      firmwareVersion: field('FirmwareVersion'),
      serialNumber: field('SerialNumber'),
      topics: collectTopics(child(properties, 'TopicSet'))
    };
  }

  async createSubscription(terminationSeconds: number, signal?: AbortSignal): Promise<SubscriptionHandle> {
    const body = await this.request(
      'create',
      this.serviceUrl,
      `<tev:CreatePullPointSubscription><tev:InitialTerminationTime>${formatDuration(
        terminationSeconds * 1000
      )}</tev:InitialTerminationTime></tev:CreatePullPointSubscription>`,
      this.requestTimeoutMs,
      signal
    );

    const response = child(body, 'CreatePullPointSubscriptionResponse');
    const address = textOf(child(response, 'SubscriptionReference', 'Address'))?.trim();
    if (!address) {
      throw new ConnectError('protocol', 'CreatePullPointSubscription returned no subscription address', {
        device: this.device.name
      });
    }

    return { address, ...this.readLease(response, terminationSeconds) };
  }

  async renew(
    subscription: SubscriptionHandle,
    terminationSeconds: number,
    signal?: AbortSignal
  ): Promise<SubscriptionLease> {
    const body = await this.request(
      'renew',
      subscription.address,
      `<wsnt:Renew><wsnt:TerminationTime>${formatDuration(
        terminationSeconds * 1000
      )}</wsnt:TerminationTime></wsnt:Renew>`,
      this.requestTimeoutMs,
      signal
    );
    return this.readLease(child(body, 'RenewResponse'), terminationSeconds);
  }

  async pull(subscription: SubscriptionHandle, request: PullRequest, signal?: AbortSignal): Promise<PullResult> {
    const body = await this.request(
      'pull',
      subscription.address,
      `<tev:PullMessages><tev:Timeout>${formatDuration(request.timeoutMs)}</tev:Timeout><tev:MessageLimit>${Math.max(
        1,
        Math.floor(request.messageLimit)
      )}</tev:MessageLimit></tev:PullMessages>`,
      this.requestTimeoutMs + request.timeoutMs,
      signal
    );

    const response = child(body, 'PullMessagesResponse');
    if (response === undefined) {
      throw new ConnectError('protocol', 'PullMessages returned an unexpected body', {
        device: this.device.name
      });
    }
    const lease = this.readLease(response, 0);
    return {
      ...lease,
      notifications: asArray(child(response, 'NotificationMessage')).map(parseNotificationMessage)
    };
  }

  async unsubscribe(subscription: SubscriptionHandle, signal?: AbortSignal): Promise<void> {
    await this.request(
      'unsubscribe',
      subscription.address,
      '<wsnt:Unsubscribe/>',
      this.requestTimeoutMs,
      signal
    );
  }

  private readLease(response: unknown, fallbackSeconds: number): SubscriptionLease {
    const currentTime = parseDate(textOf(child(response, 'CurrentTime'))) ?? this.now();
    const terminationTime =
      parseDate(textOf(child(response, 'TerminationTime'))) ??
      new Date(currentTime.getTime() + fallbackSeconds * 1000);
    return { currentTime, terminationTime };
  }

  private async request(
    operation: Operation,
    url: string,
    body: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<unknown> {
    const device = this.device.name;
    const action = ACTIONS[operation];
    const envelope = buildEnvelope({ action, to: url, body, credentials: this.device });

    let response: SoapHttpResponse;
    try {
      response = await this.http.post(url, envelope, {
        headers: { 'Content-Type': `application/soap+xml; charset=utf-8; action="${action}"` },
        timeoutMs,
        signal
      });
    } catch (error) {
      throw toConnectError(error, operation, device);
    }

    if (response.status === 401 || response.status === 403) {
      throw new ConnectError('auth', `${operation} rejected with HTTP ${response.status}`, { device });
    }

    try {
      const parsed = parseSoapBody(response.data, device);
      if (response.status >= 400) {
        throw new ConnectError('protocol', `${operation} returned HTTP ${response.status}`, { device });
      }
      return parsed;
    } catch (error) {
      if (error instanceof SoapFaultError) {
        throw new ConnectError(error.isAuthFault ? 'auth' : 'protocol', `${operation} fault: ${error.message}`, {
          device,
          cause: error
        });
      }
      if (error instanceof ProtocolError && response.status >= 500) {
        throw new ConnectError('network', `${operation} returned HTTP ${response.status}`, {
          device,
          cause: error
        });
      }
      throw toConnectError(
        error instanceof ProtocolError
          ? new ConnectError('protocol', `${operation}: ${error.message}`, { device, cause: error })
          : error,
        operation,
        device
      );
    }
  }
}
