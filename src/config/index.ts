import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import { ConfigError } from '../errors.js';
import { canonicalDeviceName, isSafeDeviceName } from '../utils/deviceName.js';

export type StreamFormat = 'h264' | 'h265';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type DeviceConfig = {
  name: string;
  host: string;
  port?: number;
  onvifPort?: number;
  rtspPort?: number;
  channel?: number;
  username: string;
  password: string;
  enabled?: boolean;
  streamFormat?: StreamFormat;
};

export type ResolvedDeviceConfig = Required<DeviceConfig>;

export type RecordingConfig = {
  outputRoot: string;
  postDetectionSeconds: number;
  tickIntervalMs: number;
  startTimeoutMs: number;
  stopGraceMs: number;
  rtspTransport: 'tcp' | 'udp';
  audioCodec: string;
  audioBitrate: string;
  ffmpegPath?: string;
};

export type ReconnectConfig = {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
  /** 0 keeps retrying forever. */
  maxAttempts: number;
};

export type SubscriptionConfig = {
  terminationSeconds: number;
  renewMarginSeconds: number;
  pullTimeoutSeconds: number;
  messageLimit: number;
  requestTimeoutMs: number;
  topics: string[];
  reconnect: ReconnectConfig;
};

export type RestartPolicy = 'restart' | 'stop';

export type SupervisorConfig = {
  restartPolicy: RestartPolicy;
  restartDelayMs: number;
  /** 0 restarts without limit. */
  maxRestarts: number;
};

export type CamwatchConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  recording: RecordingConfig;
  subscription: SubscriptionConfig;
  supervisor: SupervisorConfig;
  devices: DeviceConfig[];
};

type JsonType = 'object' | 'number' | 'integer' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
};

const portSchema: JsonSchema = { type: 'integer', minimum: 1, maximum: 65535 };

const deviceSchema: JsonSchema = {
  type: 'object',
  required: ['name', 'host', 'username', 'password'],
  additionalProperties: false,
  properties: {
    name: { type: 'string', minLength: 1 },
    host: { type: 'string', minLength: 1 },
    port: portSchema,
    onvifPort: portSchema,
    rtspPort: portSchema,
    channel: { type: 'integer', minimum: 0 },
    username: { type: 'string' },
    password: { type: 'string' },
    enabled: { type: 'boolean' },
    streamFormat: { type: 'string', enum: ['h264', 'h265'] }
  }
};

const camwatchConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'database', 'recording', 'subscription', 'supervisor', 'devices'],
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      properties: { name: { type: 'string', minLength: 1 } }
    },
    logging: {
      type: 'object',
      required: ['level'],
      properties: { level: { type: 'string', minLength: 1 } }
    },
    database: {
      type: 'object',
      required: ['path'],
      properties: { path: { type: 'string', minLength: 1 } }
    },
    recording: {
      type: 'object',
      required: [
        'outputRoot',
        'postDetectionSeconds',
        'tickIntervalMs',
        'startTimeoutMs',
        'stopGraceMs',
        'rtspTransport',
        'audioCodec',
        'audioBitrate'
      ],
      additionalProperties: false,
      properties: {
        outputRoot: { type: 'string', minLength: 1 },
        postDetectionSeconds: { type: 'number', minimum: 0 },
        tickIntervalMs: { type: 'number', minimum: 0 },
        startTimeoutMs: { type: 'number', minimum: 0 },
        stopGraceMs: { type: 'number', minimum: 0 },
        rtspTransport: { type: 'string', enum: ['tcp', 'udp'] },
        audioCodec: { type: 'string', minLength: 1 },
        audioBitrate: { type: 'string', minLength: 1 },
        ffmpegPath: { type: 'string' }
      }
    },
    subscription: {
      type: 'object',
      required: [
        'terminationSeconds',
        'renewMarginSeconds',
        'pullTimeoutSeconds',
        'messageLimit',
        'requestTimeoutMs',
        'topics',
        'reconnect'
      ],
      additionalProperties: false,
      properties: {
        terminationSeconds: { type: 'number', minimum: 0 },
        renewMarginSeconds: { type: 'number', minimum: 0 },
        pullTimeoutSeconds: { type: 'number', minimum: 0 },
        messageLimit: { type: 'integer', minimum: 1 },
        requestTimeoutMs: { type: 'number', minimum: 0 },
        topics: { type: 'array', items: { type: 'string', minLength: 1 } },
        reconnect: {
          type: 'object',
          required: ['baseDelayMs', 'maxDelayMs', 'jitterFactor', 'maxAttempts'],
          additionalProperties: false,
          properties: {
            baseDelayMs: { type: 'number', minimum: 0 },
            maxDelayMs: { type: 'number', minimum: 0 },
            jitterFactor: { type: 'number', minimum: 0, maximum: 1 },
            maxAttempts: { type: 'integer', minimum: 0 }
          }
        }
      }
    },
    supervisor: {
      type: 'object',
      required: ['restartPolicy', 'restartDelayMs', 'maxRestarts'],
      additionalProperties: false,
      properties: {
        restartPolicy: { type: 'string', enum: ['restart', 'stop'] },
        restartDelayMs: { type: 'number', minimum: 0 },
        maxRestarts: { type: 'integer', minimum: 0 }
      }
    },
    devices: { type: 'array', items: deviceSchema }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function checkRange(schema: JsonSchema, value: number, pathLabel: string, errors: string[]) {
  if (typeof schema.minimum === 'number' && value < schema.minimum) {
    errors.push(`${pathLabel} must be >= ${schema.minimum}`);
  }
  if (typeof schema.maximum === 'number' && value > schema.maximum) {
    errors.push(`${pathLabel} must be <= ${schema.maximum}`);
  }
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (schema.additionalProperties && typeof schema.additionalProperties === 'object') {
      for (const key of Object.keys(value)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(
          ...validateAgainstSchema(schema.additionalProperties, value[key], `${pathLabel}.${key}`)
        );
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const { items } = schema;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number' || type === 'integer') {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (type === 'integer' && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
      return errors;
    }

    checkRange(schema, value, pathLabel, errors);

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (typeof schema.minLength === 'number' && value.trim().length < schema.minLength) {
      errors.push(`${pathLabel} must not be empty`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

function collectLogicalIssues(config: CamwatchConfig): string[] {
  const messages: string[] = [];
  const { recording, subscription } = config;

  const positive: Array<[string, number]> = [
    ['config.recording.postDetectionSeconds', recording.postDetectionSeconds],
    ['config.recording.tickIntervalMs', recording.tickIntervalMs],
    ['config.recording.startTimeoutMs', recording.startTimeoutMs],
    ['config.recording.stopGraceMs', recording.stopGraceMs],
    ['config.subscription.terminationSeconds', subscription.terminationSeconds],
    ['config.subscription.pullTimeoutSeconds', subscription.pullTimeoutSeconds],
    ['config.subscription.requestTimeoutMs', subscription.requestTimeoutMs],
    ['config.subscription.reconnect.baseDelayMs', subscription.reconnect.baseDelayMs]
  ];
  for (const [label, value] of positive) {
    if (value <= 0) {
      messages.push(`${label} must be greater than 0`);
    }
  }

  if (subscription.renewMarginSeconds >= subscription.terminationSeconds) {
    messages.push(
      'config.subscription.renewMarginSeconds must be smaller than config.subscription.terminationSeconds'
    );
  }

  if (subscription.reconnect.maxDelayMs < subscription.reconnect.baseDelayMs) {
    messages.push(
      'config.subscription.reconnect.maxDelayMs must be >= config.subscription.reconnect.baseDelayMs'
    );
  }

  if (subscription.topics.length === 0) {
    messages.push('config.subscription.topics must list at least one topic');
  }

  const seen = new Map<string, string>();
  config.devices.forEach((device, index) => {
    const label = device.name || `#${index}`;
    if (!isSafeDeviceName(device.name)) {
      messages.push(
        `config.devices[${label}].name must be a single path segment of letters, digits, ".", "_" or "-"`
      );
    }
    const canonical = canonicalDeviceName(device.name);
    const existing = seen.get(canonical);
    if (existing !== undefined) {
      messages.push(
        `config.devices[${label}] duplicates device name "${existing}" (names are compared ignoring case)`
      );
    } else {
      seen.set(canonical, device.name);
    }
  });

  if (!config.devices.some(device => device.enabled !== false)) {
    messages.push('config.devices must include at least one enabled device');
  }

  return messages;
}

/**
 * Throws a {@link ConfigError} listing every schema and logical problem found in `config`.
 */
export function validateConfig(config: unknown): asserts config is CamwatchConfig {
  const errors = validateAgainstSchema(camwatchConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  const issues = collectLogicalIssues(config as CamwatchConfig);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
}

/** Plain objects merge key by key; arrays and scalars from `override` replace `base`. */
export function mergeConfig(base: unknown, override: unknown): unknown {
  if (!isRecord(base) || !isRecord(override)) {
    return override === undefined ? base : override;
  }
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeConfig(base[key], value);
  }
  return merged;
}

export function parseConfig(contents: string, base?: unknown): CamwatchConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`Failed to parse configuration: ${message}`]);
  }

  const merged = base === undefined ? parsed : mergeConfig(base, parsed);
  validateConfig(merged);
  return merged;
}

export function loadConfigFromFile(filePath: string, base?: unknown): CamwatchConfig {
  const resolvedPath = path.resolve(filePath);
  let contents: string;
  try {
    contents = fs.readFileSync(resolvedPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`Failed to read ${resolvedPath}: ${message}`]);
  }
  return parseConfig(contents, base);
}

/** The merged node-config object (defaults, environment file, environment variables), unvalidated. */
export function readConfigSources(): unknown {
  const source: unknown = config.util.toObject(config);
  return source;
}

export function loadConfig(): CamwatchConfig {
  const source = readConfigSources();
  validateConfig(source);
  return source;
}

export function resolveDeviceConfig(device: DeviceConfig): ResolvedDeviceConfig {
  return {
    name: device.name,
    host: device.host,
    port: device.port ?? 80,
    onvifPort: device.onvifPort ?? 8000,
    rtspPort: device.rtspPort ?? 554,
    channel: device.channel ?? 0,
    username: device.username,
    password: device.password,
    enabled: device.enabled ?? true,
    streamFormat: device.streamFormat ?? 'h264'
  };
}

export function resolveDevices(config: CamwatchConfig): ResolvedDeviceConfig[] {
  return config.devices.map(resolveDeviceConfig);
}

export { camwatchConfigSchema };
