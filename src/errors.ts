export type CamwatchErrorCode =
  | 'connect'
  | 'protocol'
  | 'session-start'
  | 'process-fault'
  | 'config';

export class CamwatchError extends Error {
  readonly code: CamwatchErrorCode;
  readonly device: string | null;

  constructor(
    code: CamwatchErrorCode,
    message: string,
    options: { device?: string | null; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.device = options.device ?? null;
  }
}

export type ConnectFailureReason = 'network' | 'auth' | 'timeout' | 'protocol' | 'exhausted';

/** Network or authentication failure talking to a device. Retried with backoff. */
export class ConnectError extends CamwatchError {
  readonly reason: ConnectFailureReason;

  constructor(
    reason: ConnectFailureReason,
    message: string,
    options: { device?: string | null; cause?: unknown } = {}
  ) {
    super('connect', message, options);
    this.reason = reason;
  }
}

export type ProtocolFailureReason = 'malformed' | 'topic-mismatch' | 'channel-mismatch' | 'fault';

/** A notification or response that cannot be used. Never surfaced as a detection. */
export class ProtocolError extends CamwatchError {
  readonly reason: ProtocolFailureReason;

  constructor(
    reason: ProtocolFailureReason,
    message: string,
    options: { device?: string | null; cause?: unknown } = {}
  ) {
    super('protocol', message, options);
    this.reason = reason;
  }
}

export class SessionStartError extends CamwatchError {
  constructor(message: string, options: { device?: string | null; cause?: unknown } = {}) {
    super('session-start', message, options);
  }
}

/** The capture process exited on its own while recording. */
export class ProcessFault extends CamwatchError {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(
    message: string,
    details: {
      device?: string | null;
      exitCode?: number | null;
      signal?: NodeJS.Signals | null;
      cause?: unknown;
    } = {}
  ) {
    super('process-fault', message, { device: details.device, cause: details.cause });
    this.exitCode = details.exitCode ?? null;
    this.signal = details.signal ?? null;
  }
}

export class ConfigError extends CamwatchError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('config', issues.length > 0 ? issues.join('; ') : 'Invalid configuration');
    this.issues = issues;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
