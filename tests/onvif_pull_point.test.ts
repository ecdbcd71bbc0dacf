import axios, { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { ConnectError } from '../src/errors.js';
import { OnvifPullPointTransport, collectTopics, createAxiosSoapClient } from '../src/onvif/pullPoint.js';
import type { SubscriptionHandle } from '../src/subscription/transport.js';
import { ScriptedSoapClient, envelope, fault } from './helpers/soap.js';

const device = {
  name: 'front',
  host: '192.0.2.10',
  onvifPort: 8000,
  username: 'admin',
  password: 'test-secret'
};

const SUBSCRIPTION_ADDRESS = 'http://192.0.2.10:8000/onvif/Subscription?Idx=7';

const subscription: SubscriptionHandle = {
  address: SUBSCRIPTION_ADDRESS,
  currentTime: new Date('2024-05-01T10:00:00Z'),
  terminationTime: new Date('2024-05-01T10:01:00Z')
};

function createResponse(): string {
  return envelope(
    [
      '<tev:CreatePullPointSubscriptionResponse>',
      `<tev:SubscriptionReference><wsa:Address>${SUBSCRIPTION_ADDRESS}</wsa:Address></tev:SubscriptionReference>`,
      '<wsnt:CurrentTime>2024-05-01T10:00:00Z</wsnt:CurrentTime>',
      '<wsnt:TerminationTime>2024-05-01T10:01:00Z</wsnt:TerminationTime>',
      '</tev:CreatePullPointSubscriptionResponse>'
    ].join('')
  );
}

function notificationMessage(state: string, utcTime: string): string {
  return [
    '<wsnt:NotificationMessage>',
    '<wsnt:Topic Dialect="http://www.onvif.org/ver10/tev/topicExpression/ConcreteSet">tns1:RuleEngine/MyRuleDetector/PeopleDetect</wsnt:Topic>',
    '<wsnt:Message>',
    `<tt:Message UtcTime="${utcTime}" PropertyOperation="Changed">`,
    '<tt:Source><tt:SimpleItem Name="Source" Value="000"/></tt:Source>',
    '<tt:Key><tt:SimpleItem Name="Rule" Value="MyMotionDetectorRule"/></tt:Key>',
    `<tt:Data><tt:SimpleItem Name="State" Value="${state}"/></tt:Data>`,
    '</tt:Message>',
    '</wsnt:Message>',
    '</wsnt:NotificationMessage>'
  ].join('');
}

function pullResponse(messages: string[]): string {
  return envelope(
    [
      '<tev:PullMessagesResponse>',
      '<tev:CurrentTime>2024-05-01T10:00:05Z</tev:CurrentTime>',
      '<tev:TerminationTime>2024-05-01T10:01:00Z</tev:TerminationTime>',
      ...messages,
      '</tev:PullMessagesResponse>'
    ].join('')
  );
}

function createTransport(http: ScriptedSoapClient) {
  return new OnvifPullPointTransport({ device, requestTimeoutMs: 10_000, http });
}

async function failureReason(promise: Promise<unknown>): Promise<string | null> {
  try {
    await promise;
  } catch (error) {
    return error instanceof ConnectError ? error.reason : 'unexpected';
  }
  return null;
}

describe('OnvifPullPointTransport', () => {
  it('creates a pull-point subscription on the event service', async () => {
    const http = new ScriptedSoapClient([{ status: 200, data: createResponse() }]);
    const transport = createTransport(http);

    const handle = await transport.createSubscription(60);

    expect(transport.eventServiceUrl).toBe('http://192.0.2.10:8000/onvif/event_service');
    expect(handle).toEqual(subscription);
    const [request] = http.requests;
    expect(request?.url).toBe('http://192.0.2.10:8000/onvif/event_service');
    expect(request?.body).toContain(
      '<tev:CreatePullPointSubscription><tev:InitialTerminationTime>PT60S</tev:InitialTerminationTime></tev:CreatePullPointSubscription>'
    );
    expect(request?.body).toContain('<wsse:Username>admin</wsse:Username>');
    expect(request?.options.timeoutMs).toBe(10_000);
    expect(request?.options.headers['Content-Type']).toBe(
      'application/soap+xml; charset=utf-8; action="http://www.onvif.org/ver10/events/wsdl/EventPortType/CreatePullPointSubscriptionRequest"'
    );
  });

  it('treats a response without an address as a protocol failure', async () => {
    const http = new ScriptedSoapClient([
      { status: 200, data: envelope('<tev:CreatePullPointSubscriptionResponse/>') }
    ]);

    expect(await failureReason(createTransport(http).createSubscription(60))).toBe('protocol');
  });

  it('pulls notifications from the subscription address', async () => {
    const http = new ScriptedSoapClient([
      {
        status: 200,
        data: pullResponse([
          notificationMessage('true', '2024-05-01T10:00:04Z'),
          notificationMessage('false', '2024-05-01T10:00:05Z')
        ])
      }
    ]);
    const transport = createTransport(http);

    const result = await transport.pull(subscription, { timeoutMs: 5000, messageLimit: 10 });

    expect(result.currentTime).toEqual(new Date('2024-05-01T10:00:05Z'));
    expect(result.terminationTime).toEqual(new Date('2024-05-01T10:01:00Z'));
    expect(result.notifications).toEqual([
      {
        topic: 'tns1:RuleEngine/MyRuleDetector/PeopleDetect',
        utcTime: new Date('2024-05-01T10:00:04Z'),
        propertyOperation: 'Changed',
        source: { Source: '000' },
        data: { State: 'true' }
      },
      {
        topic: 'tns1:RuleEngine/MyRuleDetector/PeopleDetect',
        utcTime: new Date('2024-05-01T10:00:05Z'),
        propertyOperation: 'Changed',
        source: { Source: '000' },
        data: { State: 'false' }
      }
    ]);

    const [request] = http.requests;
    expect(request?.url).toBe(SUBSCRIPTION_ADDRESS);
    expect(request?.body).toContain('<tev:Timeout>PT5S</tev:Timeout><tev:MessageLimit>10</tev:MessageLimit>');
    expect(request?.options.timeoutMs).toBe(15_000);
  });

  it('returns a single notification as a list and an empty pull as none', async () => {
    const http = new ScriptedSoapClient([
      { status: 200, data: pullResponse([notificationMessage('true', '2024-05-01T10:00:04Z')]) },
      { status: 200, data: pullResponse([]) }
    ]);
    const transport = createTransport(http);

    expect((await transport.pull(subscription, { timeoutMs: 1000, messageLimit: 1 })).notifications).toHaveLength(1);
    expect((await transport.pull(subscription, { timeoutMs: 1000, messageLimit: 1 })).notifications).toEqual([]);
  });

  it('renews with the requested lifetime', async () => {
    const http = new ScriptedSoapClient([
      {
        status: 200,
        data: envelope(
          '<wsnt:RenewResponse><wsnt:TerminationTime>2024-05-01T10:02:00Z</wsnt:TerminationTime><wsnt:CurrentTime>2024-05-01T10:01:00Z</wsnt:CurrentTime></wsnt:RenewResponse>'
        )
      }
    ]);

    const lease = await createTransport(http).renew(subscription, 60);

    expect(lease).toEqual({
      currentTime: new Date('2024-05-01T10:01:00Z'),
      terminationTime: new Date('2024-05-01T10:02:00Z')
    });
    expect(http.requests[0]?.body).toContain('<wsnt:Renew><wsnt:TerminationTime>PT60S</wsnt:TerminationTime></wsnt:Renew>');
  });

  it('fills in missing lease times from the local clock', async () => {
    const http = new ScriptedSoapClient([{ status: 200, data: envelope('<wsnt:RenewResponse/>') }]);
    const transport = new OnvifPullPointTransport({
      device,
      requestTimeoutMs: 10_000,
      http,
      now: () => new Date('2024-05-01T12:00:00Z')
    });

    expect(await transport.renew(subscription, 30)).toEqual({
      currentTime: new Date('2024-05-01T12:00:00Z'),
      terminationTime: new Date('2024-05-01T12:00:30Z')
    });
  });

  it('maps failures onto connect error reasons', async () => {
    const http = new ScriptedSoapClient([
      { status: 401, data: '' },
      { status: 400, data: fault('ter:NotAuthorized', 'Sender not Authorized') },
      { status: 500, data: fault('ter:InvalidArgVal', 'Invalid timeout') },
      { status: 503, data: '<html>Service Unavailable</html>' },
      { status: 200, data: 'garbage' },
      new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'),
      new Error('connect ECONNREFUSED 192.0.2.10:8000')
    ]);
    const transport = createTransport(http);

    const reasons: Array<string | null> = [];
    for (let index = 0; index < 7; index += 1) {
      reasons.push(await failureReason(transport.createSubscription(60)));
    }

    expect(reasons).toEqual(['auth', 'auth', 'protocol', 'network', 'protocol', 'timeout', 'network']);
  });

  it('unsubscribes from the subscription address', async () => {
    const http = new ScriptedSoapClient([{ status: 200, data: envelope('<wsnt:UnsubscribeResponse/>') }]);

    await createTransport(http).unsubscribe(subscription);

    expect(http.requests[0]?.url).toBe(SUBSCRIPTION_ADDRESS);
    expect(http.requests[0]?.body).toContain('<wsnt:Unsubscribe/>');
  });

  it('reads the camera identity and its advertised event topics', async () => {
    const http = new ScriptedSoapClient([
      {
        status: 200,
        data: envelope(
          [
            '<tds:GetDeviceInformationResponse>',
            '<tds:Manufacturer>Acme</tds:Manufacturer>',
            '<tds:Model>CAM-1</tds:Model>',
            '<tds:FirmwareVersion> v1.0.0 </tds:FirmwareVersion>',
            '<tds:SerialNumber/>',
            '<tds:HardwareId>1.0</tds:HardwareId>',
            '</tds:GetDeviceInformationResponse>'
          ].join('')
        )
      },
      {
        status: 200,
        data: envelope(
          [
            '<tev:GetEventPropertiesResponse>',
            '<tev:TopicNamespaceLocation>http://www.onvif.org/onvif/ver10/topics/topicns.xml</tev:TopicNamespaceLocation>',
            '<wstop:TopicSet>',
            '<tns1:RuleEngine><tnsx:MyRuleDetector>',
            '<PeopleDetect wstop:topic="true"><tt:MessageDescription IsProperty="true"/></PeopleDetect>',
            '</tnsx:MyRuleDetector></tns1:RuleEngine>',
            '<tns1:VideoSource><MotionAlarm wstop:topic="true"/></tns1:VideoSource>',
            '</wstop:TopicSet>',
            '</tev:GetEventPropertiesResponse>'
          ].join('')
        )
      }
    ]);
    const transport = createTransport(http);

    const description = await transport.describeDevice();

    expect(description).toEqual({
      manufacturer: 'Acme',
      model: 'CAM-1',
      firmwareVersion: 'v1.0.0',
      serialNumber: null,
      topics: ['RuleEngine/MyRuleDetector/PeopleDetect', 'VideoSource/MotionAlarm']
    });
    expect(http.requests.map(request => request.url)).toEqual([
      'http://192.0.2.10:8000/onvif/device_service',
      'http://192.0.2.10:8000/onvif/event_service'
    ]);
    expect(http.requests[0]?.options.headers['Content-Type']).toBe(
      'application/soap+xml; charset=utf-8; action="http://www.onvif.org/ver10/device/wsdl/GetDeviceInformation"'
    );
    expect(http.requests[1]?.body).toContain('<tev:GetEventProperties/>');
  });

  it('fails identification when the device service refuses it', async () => {
    const http = new ScriptedSoapClient([{ status: 400, data: fault('ter:ActionNotSupported', 'Not supported') }]);
    const transport = createTransport(http);

    expect(await failureReason(transport.describeDevice())).toBe('protocol');
    expect(http.requests).toHaveLength(1);
  });
});

describe('collectTopics', () => {
  it('lists only the nodes marked as topics', () => {
    const topicSet = {
      '@_xmlns': 'http://docs.oasis-open.org/wsn/t-1',
      Device: { Trigger: { DigitalInput: { '@_topic': 'true', MessageDescription: { '@_IsProperty': 'true' } } } },
      VideoSource: { '@_topic': 'false', MotionAlarm: [{ '@_topic': 'true' }] }
    };

    expect(collectTopics(topicSet)).toEqual(['Device/Trigger/DigitalInput', 'VideoSource/MotionAlarm']);
  });
});

describe('createAxiosSoapClient', () => {
  it('posts the envelope as text and passes the status through', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const instance = axios.create({
      adapter: async config => {
        seen.push(config);
        return { data: '<fault/>', status: 500, statusText: 'Server Error', headers: {}, config };
      }
    });

    const response = await createAxiosSoapClient(instance).post('http://192.0.2.10/onvif', '<x/>', {
      headers: { 'Content-Type': 'application/soap+xml' },
      timeoutMs: 2500
    });

    expect(response).toEqual({ status: 500, data: '<fault/>' });
    expect(seen[0]?.method).toBe('post');
    expect(seen[0]?.url).toBe('http://192.0.2.10/onvif');
    expect(seen[0]?.timeout).toBe(2500);
    expect(seen[0]?.data).toBe('<x/>');
    expect(seen[0]?.responseType).toBe('text');
  });
});
