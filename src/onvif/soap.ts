import { createHash, randomBytes, randomUUID } from 'node:crypto';
import { XMLParser } from 'fast-xml-parser';
import { ProtocolError } from '../errors.js';

export const NS = {
  soap: 'http://www.w3.org/2003/05/soap-envelope',
  wsa: 'http://www.w3.org/2005/08/addressing',
  wsse: 'http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-wssecurity-secext-1.0.xsd',
  wsu: 'http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-wssecurity-utility-1.0.xsd',
  tev: 'http://www.onvif.org/ver10/events/wsdl',
  wsnt: 'http://docs.oasis-open.org/wsn/b-2'
} as const;

const PASSWORD_DIGEST =
  'http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-username-token-profile-1.0#PasswordDigest';
const BASE64_BINARY =
  'http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-soap-message-security-1.0#Base64Binary';

export type Credentials = {
  username: string;
  password: string;
};

export type SecurityTokenOptions = {
  nonce?: Buffer;
  created?: Date;
};

export type EnvelopeOptions = {
  action: string;
  to: string;
  body: string;
  credentials: Credentials;
  messageId?: string;
  security?: SecurityTokenOptions;
};

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** base64(sha1(nonce + created + password)), as defined by the UsernameToken profile. */
export function computePasswordDigest(nonce: Buffer, created: string, password: string): string {
  return createHash('sha1')
    .update(Buffer.concat([nonce, Buffer.from(created, 'utf-8'), Buffer.from(password, 'utf-8')]))
    .digest('base64');
}

export function buildSecurityHeader(credentials: Credentials, options: SecurityTokenOptions = {}): string {
  const nonce = options.nonce ?? randomBytes(16);
  const created = (options.created ?? new Date()).toISOString();
  const digest = computePasswordDigest(nonce, created, credentials.password);

  return [
    `<wsse:Security soap:mustUnderstand="true" xmlns:wsse="${NS.wsse}" xmlns:wsu="${NS.wsu}">`,
    '<wsse:UsernameToken>',
    `<wsse:Username>${escapeXml(credentials.username)}</wsse:Username>`,
    `<wsse:Password Type="${PASSWORD_DIGEST}">${digest}</wsse:Password>`,
    `<wsse:Nonce EncodingType="${BASE64_BINARY}">${nonce.toString('base64')}</wsse:Nonce>`,
    `<wsu:Created>${created}</wsu:Created>`,
    '</wsse:UsernameToken>',
    '</wsse:Security>'
  ].join('');
}

export function buildEnvelope(options: EnvelopeOptions): string {
  const messageId = options.messageId ?? `urn:uuid:${randomUUID()}`;
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<soap:Envelope xmlns:soap="${NS.soap}" xmlns:wsa="${NS.wsa}" xmlns:tev="${NS.tev}" xmlns:wsnt="${NS.wsnt}">`,
    '<soap:Header>',
    buildSecurityHeader(options.credentials, options.security),
    `<wsa:Action>${escapeXml(options.action)}</wsa:Action>`,
    `<wsa:MessageID>${escapeXml(messageId)}</wsa:MessageID>`,
    `<wsa:To>${escapeXml(options.to)}</wsa:To>`,
    '</soap:Header>',
    `<soap:Body>${options.body}</soap:Body>`,
    '</soap:Envelope>'
  ].join('');
}

/** xs:duration for a millisecond count, e.g. 1500 → PT1.5S. */
export function formatDuration(ms: number): string {
  const seconds = Math.max(0, ms) / 1000;
  return `PT${Number(seconds.toFixed(3))}S`;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: tagName => tagName === 'NotificationMessage' || tagName === 'SimpleItem'
});

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function child(node: unknown, ...keys: string[]): unknown {
  let current = node;
  for (const key of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function textOf(node: unknown): string | null {
  if (typeof node === 'string') {
    return node;
  }
  if (isRecord(node)) {
    const text = node['#text'];
    return typeof text === 'string' ? text : null;
  }
  return null;
}

export function asArray(node: unknown): unknown[] {
  if (node === undefined || node === null) {
    return [];
  }
  return Array.isArray(node) ? node : [node];
}

export function attributeOf(node: unknown, name: string): string | null {
  const value = child(node, `@_${name}`);
  return typeof value === 'string' ? value : null;
}

export type SoapFault = {
  code: string | null;
  subcode: string | null;
  reason: string;
};

export function readFault(body: unknown): SoapFault | null {
  const fault = child(body, 'Fault');
  if (fault === undefined) {
    return null;
  }
  const reason =
    textOf(child(fault, 'Reason', 'Text')) ?? textOf(child(fault, 'faultstring')) ?? 'SOAP fault';
  return {
    code: textOf(child(fault, 'Code', 'Value')) ?? textOf(child(fault, 'faultcode')),
    subcode: textOf(child(fault, 'Code', 'Subcode', 'Value')),
    reason
  };
}

export class SoapFaultError extends ProtocolError {
  readonly fault: SoapFault;

  constructor(fault: SoapFault, device?: string) {
    super('fault', fault.reason, { device });
    this.fault = fault;
  }

  get isAuthFault(): boolean {
    return /NotAuthorized|FailedAuthentication|InvalidSecurity/i.test(this.fault.subcode ?? '');
  }
}

/**
 * Parses a SOAP response and returns its Body element. Throws `SoapFaultError` for a fault and
 * `ProtocolError('malformed')` for anything unparsable.
 */
export function parseSoapBody(xml: string, device?: string): unknown {
  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (error) {
    throw new ProtocolError('malformed', 'Response is not valid XML', { device, cause: error });
  }

  const body = child(document, 'Envelope', 'Body');
  if (!isRecord(body)) {
    throw new ProtocolError('malformed', 'Response has no SOAP body', { device });
  }

  const fault = readFault(body);
  if (fault) {
    throw new SoapFaultError(fault, device);
  }
  return body;
}
