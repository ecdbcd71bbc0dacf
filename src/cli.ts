import process from 'node:process';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import { registerShutdownHook, runShutdownHooks, type ShutdownHookContext } from './app.js';
import { loadConfigFromFile, readConfigSources, resolveDevices, validateConfig, type CamwatchConfig } from './config/index.js';
import { ConfigError } from './errors.js';
import type { RecordingRecord } from './types.js';
import type { WatchRuntime } from './run-watch.js';

type ServiceStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type ShutdownHookSummary = {
  name: string;
  status: 'ok' | 'error';
  error?: string;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE_LINES = [
  'camwatch',
  '',
  'Usage:',
  '  camwatch start                 Watch every enabled camera until interrupted',
  '  camwatch check-config [--file path] [--json]  Validate the configuration',
  '  camwatch recordings [--device name] [--limit n] [--json]  List catalogued recordings',
  '  camwatch log-level             Get or set the active log level',
  '  camwatch help                  Show this message'
];

const LOG_LEVEL_USAGE = [
  'camwatch log level commands',
  '',
  'Usage:',
  '  camwatch log-level            Show the current log level',
  '  camwatch log-level get        Show the current log level',
  '  camwatch log-level set <level>  Change the active log level',
  '  camwatch log-level <level>      Shortcut for set',
  '',
  `Available levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

const state: {
  status: ServiceStatus;
  startedAt: number | null;
  runtime: WatchRuntime | null;
  stopResolver: (() => void) | null;
  shuttingDown: boolean;
  shutdownPromise: Promise<void> | null;
  exitCode: number;
  lastShutdownError: Error | null;
  lastShutdownHooks: ShutdownHookSummary[];
  lastShutdownReason: string | null;
  lastShutdownSignal: NodeJS.Signals | null;
} = {
  status: 'idle',
  startedAt: null,
  runtime: null,
  stopResolver: null,
  shuttingDown: false,
  shutdownPromise: null,
  exitCode: 0,
  lastShutdownError: null,
  lastShutdownHooks: [],
  lastShutdownReason: null,
  lastShutdownSignal: null
};

function resetServiceState() {
  state.status = 'idle';
  state.startedAt = null;
  state.runtime = null;
  state.stopResolver = null;
  state.shuttingDown = false;
  state.shutdownPromise = null;
  state.exitCode = 0;
  state.lastShutdownError = null;
  state.lastShutdownHooks = [];
  state.lastShutdownReason = null;
  state.lastShutdownSignal = null;
}

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const command = argv[0] ?? 'start';

  switch (command) {
    case 'start': {
      return startDaemon(io);
    }
    case 'check-config': {
      return runCheckConfigCommand(argv.slice(1), io);
    }
    case 'recordings': {
      return runRecordingsCommand(argv.slice(1), io);
    }
    case 'log-level': {
      return runLogLevelCommand(argv.slice(1), io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

type CheckConfigArgs = {
  file?: string;
  json: boolean;
  errors: string[];
};

function parseCheckConfigArgs(args: string[]): CheckConfigArgs {
  const result: CheckConfigArgs = { json: false, errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === '--json' || arg === '-j') {
      result.json = true;
    } else if (arg === '--file' || arg === '-f') {
      const value = args[index + 1];
      if (!value) {
        result.errors.push(`Missing value for ${arg}`);
      } else {
        result.file = value;
        index += 1;
      }
    } else {
      result.errors.push(`Unknown option: ${arg}`);
    }
  }
  return result;
}

async function runCheckConfigCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseCheckConfigArgs(args);
  if (parsed.errors.length > 0) {
    for (const error of parsed.errors) {
      io.stderr.write(`${error}\n`);
    }
    return 1;
  }

  let config: CamwatchConfig;
  try {
    const base = readConfigSources();
    if (parsed.file) {
      config = loadConfigFromFile(parsed.file, base);
    } else {
      validateConfig(base);
      config = base;
    }
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    if (parsed.json) {
      io.stdout.write(`${JSON.stringify({ valid: false, issues: error.issues })}\n`);
    } else {
      io.stderr.write('Configuration is invalid:\n');
      for (const issue of error.issues) {
        io.stderr.write(`  - ${issue}\n`);
      }
    }
    return 1;
  }

  const devices = resolveDevices(config).map(device => ({
    name: device.name,
    host: device.host,
    channel: device.channel,
    enabled: device.enabled,
    streamFormat: device.streamFormat
  }));

  if (parsed.json) {
    io.stdout.write(`${JSON.stringify({ valid: true, devices })}\n`);
    return 0;
  }

  const enabled = devices.filter(device => device.enabled).length;
  io.stdout.write(`Configuration is valid (${enabled} of ${devices.length} devices enabled)\n`);
  for (const device of devices) {
    const suffix = device.enabled ? '' : ' [disabled]';
    io.stdout.write(`  ${device.name}: ${device.host} channel ${device.channel} ${device.streamFormat}${suffix}\n`);
  }
  return 0;
}

type RecordingsArgs = {
  device?: string;
  limit?: number;
  json: boolean;
  errors: string[];
};

function parseRecordingsArgs(args: string[]): RecordingsArgs {
  const result: RecordingsArgs = { json: false, errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === '--json' || arg === '-j') {
      result.json = true;
      continue;
    }
    if (arg === '--device' || arg === '--limit') {
      const value = args[index + 1];
      index += 1;
      if (!value) {
        result.errors.push(`Missing value for ${arg}`);
      } else if (arg === '--device') {
        result.device = value;
      } else {
        const limit = Number(value);
        if (!Number.isInteger(limit) || limit <= 0) {
          result.errors.push(`Invalid limit: ${value}`);
        } else {
          result.limit = limit;
        }
      }
      continue;
    }
    result.errors.push(`Unknown option: ${arg}`);
  }
  return result;
}

function formatRecordingLine(record: RecordingRecord) {
  const started = new Date(record.startedAt).toISOString();
  const duration = record.durationMs === null ? '-' : `${(record.durationMs / 1000).toFixed(1)}s`;
  const outcome = record.outcome ?? 'recording';
  return `${started}  ${record.device}  ${outcome}  ${duration}  ${record.clipPath}`;
}

async function runRecordingsCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseRecordingsArgs(args);
  if (parsed.errors.length > 0) {
    for (const error of parsed.errors) {
      io.stderr.write(`${error}\n`);
    }
    return 1;
  }

  const { listRecordings } = await import('./db.js');
  const records = listRecordings({ device: parsed.device, limit: parsed.limit });

  if (parsed.json) {
    io.stdout.write(`${JSON.stringify(records)}\n`);
    return 0;
  }

  if (records.length === 0) {
    io.stdout.write('No recordings found\n');
    return 0;
  }
  for (const record of records) {
    io.stdout.write(`${formatRecordingLine(record)}\n`);
  }
  return 0;
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (first.startsWith('-')) {
    io.stderr.write(`Unknown option: ${first}\n`);
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }
}

async function startDaemon(io: CliIo): Promise<number> {
  if (state.status === 'running') {
    io.stdout.write('camwatch is already running\n');
    return 0;
  }

  const { startWatch } = await import('./run-watch.js');
  const { closeDatabase } = await import('./db.js');
  state.status = 'starting';
  state.shuttingDown = false;
  state.exitCode = 0;

  let runtime: WatchRuntime;
  try {
    runtime = await metrics.time('watch.startup.ms', () => startWatch());
  } catch (error) {
    state.status = 'stopped';
    state.runtime = null;
    if (error instanceof ConfigError) {
      io.stderr.write('Configuration is invalid:\n');
      for (const issue of error.issues) {
        io.stderr.write(`  - ${issue}\n`);
      }
      return 1;
    }
    logger.error({ err: error }, 'camwatch failed to start');
    io.stderr.write('camwatch failed to start. Check logs for details.\n');
    return 1;
  }

  state.runtime = runtime;
  state.status = 'running';
  state.startedAt = Date.now();

  const stopped = new Promise<void>(resolve => {
    state.stopResolver = resolve;
  });
  const onExhausted = () => {
    state.exitCode = 1;
    void performShutdown('exhausted');
  };
  runtime.supervisor.once('exhausted', onExhausted);

  registerShutdownHook('database', () => {
    closeDatabase();
  });

  logger.info({ devices: runtime.devices, startedAt: state.startedAt }, 'camwatch started');
  io.stdout.write(`camwatch started (${runtime.devices.join(', ')})\n`);
  registerSignalHandlers();

  // Every pipeline may already have failed before the listener was attached.
  if (runtime.supervisor.exhausted) {
    runtime.supervisor.off('exhausted', onExhausted);
    onExhausted();
  }

  await stopped;

  if (state.lastShutdownError) {
    return 1;
  }
  return state.exitCode;
}

function registerSignalHandlers() {
  const handleSignal = (signal: NodeJS.Signals) => {
    void performShutdown('signal', signal);
  };

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGQUIT'];
  for (const signal of signals) {
    process.once(signal, handleSignal);
  }
}

async function executeShutdownHooks(context: ShutdownHookContext) {
  const results = await runShutdownHooks(context);
  const summaries: ShutdownHookSummary[] = results.map(result => ({
    name: result.name,
    status: result.status,
    error: result.error?.message
  }));
  const failed = results.find(result => result.error);
  for (const result of results) {
    if (result.error) {
      logger.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
    }
  }
  return { summaries, error: failed?.error ?? null };
}

async function performShutdown(reason: string, signal?: NodeJS.Signals): Promise<Error | null> {
  if (state.status === 'idle' || state.status === 'stopped') {
    return null;
  }

  if (state.shuttingDown && state.shutdownPromise) {
    await state.shutdownPromise;
    return state.lastShutdownError;
  }

  state.shuttingDown = true;
  state.status = 'stopping';
  state.lastShutdownError = null;
  state.lastShutdownHooks = [];
  state.lastShutdownReason = reason;
  state.lastShutdownSignal = signal ?? null;
  logger.info({ reason, signal }, 'camwatch shutting down');

  const shutdownTask = (async () => {
    const runtime = state.runtime;
    let shutdownDurationMs: number | null = null;
    try {
      const startedAt = performance.now();
      await metrics.time('watch.shutdown.ms', async () => {
        if (runtime) {
          await runtime.stop(reason);
        }
      });
      shutdownDurationMs = performance.now() - startedAt;
    } catch (error) {
      state.lastShutdownError = error instanceof Error ? error : new Error(String(error));
      logger.error({ err: error }, 'Error during shutdown');
    } finally {
      const { summaries, error: hookError } = await executeShutdownHooks({ reason, signal });
      state.lastShutdownHooks = summaries;
      if (hookError && !state.lastShutdownError) {
        state.lastShutdownError = hookError;
      }

      state.runtime = null;
      state.status = 'stopped';
      state.startedAt = null;
      state.stopResolver?.();
      state.stopResolver = null;
      state.shuttingDown = false;
      state.shutdownPromise = null;
      if (shutdownDurationMs !== null) {
        logger.info({ reason, signal, shutdownDurationMs }, 'camwatch stopped');
      }
    }
  })();

  state.shutdownPromise = shutdownTask;
  await shutdownTask;
  return state.lastShutdownError;
}

export const __test__ = {
  getState: () => ({ ...state }),
  reset: resetServiceState,
  performShutdown
};

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'camwatch failed');
      process.exit(1);
    }
  );
}
