import baseLogger, { setLogLevel, type Logger } from './logger.js';
import defaultBus from './eventBus.js';
import defaultMetrics, { type MetricsRegistry } from './metrics/index.js';
import { recordingCatalog, type RecordingCatalog } from './db.js';
import { loadConfig, resolveDevices, type CamwatchConfig, type ResolvedDeviceConfig } from './config/index.js';
import { ConfigError } from './errors.js';
import { OnvifPullPointTransport } from './onvif/pullPoint.js';
import type { EventTransport } from './subscription/transport.js';
import { SubscriptionClient } from './subscription/client.js';
import { HttpSnapshotFetcher, type SnapshotFetcher } from './recording/snapshot.js';
import type { CommandFactory } from './recording/capture.js';
import { RecordingSessionManager, type EventSink } from './recording/sessionManager.js';
import { DevicePipeline } from './pipeline/devicePipeline.js';
import { CameraSupervisor } from './pipeline/supervisor.js';
import { systemClock, type Clock } from './utils/clock.js';

export type TransportFactory = (device: ResolvedDeviceConfig, config: CamwatchConfig) => EventTransport;

export interface WatchStartOptions {
  config?: CamwatchConfig;
  logger?: Logger;
  bus?: EventSink;
  catalog?: RecordingCatalog;
  clock?: Clock;
  metrics?: MetricsRegistry;
  transportFactory?: TransportFactory;
  snapshotFetcher?: SnapshotFetcher;
  commandFactory?: CommandFactory;
}

export type WatchRuntime = {
  supervisor: CameraSupervisor;
  devices: string[];
  stop(reason?: string): Promise<void>;
};

const defaultTransportFactory: TransportFactory = (device, config) =>
  new OnvifPullPointTransport({
    device,
    requestTimeoutMs: config.subscription.requestTimeoutMs
  });

export async function startWatch(options: WatchStartOptions = {}): Promise<WatchRuntime> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? baseLogger;
  const bus = options.bus ?? defaultBus;
  const catalog = options.catalog ?? recordingCatalog;
  const clock = options.clock ?? systemClock;
  const metrics = options.metrics ?? defaultMetrics;
  const transportFactory = options.transportFactory ?? defaultTransportFactory;
  const snapshotFetcher = options.snapshotFetcher ?? new HttpSnapshotFetcher();

  if (!options.logger) {
    setLogLevel(config.logging.level);
  }

  const devices = resolveDevices(config).filter(device => device.enabled);
  if (devices.length === 0) {
    throw new ConfigError(['config.devices must include at least one enabled device']);
  }
  const byName = new Map(devices.map(device => [device.name, device]));
  const { subscription, recording } = config;

  const createPipeline = (name: string) => {
    const device = byName.get(name);
    if (!device) {
      throw new Error(`Unknown device "${name}"`);
    }
    const log = logger.child({ device: device.name });

    const source = new SubscriptionClient({
      device: device.name,
      channel: device.channel,
      transport: transportFactory(device, config),
      topics: subscription.topics,
      terminationSeconds: subscription.terminationSeconds,
      renewMarginSeconds: subscription.renewMarginSeconds,
      pullTimeoutSeconds: subscription.pullTimeoutSeconds,
      messageLimit: subscription.messageLimit,
      reconnect: subscription.reconnect,
      clock,
      logger: log,
      metrics
    });

    const sessions = new RecordingSessionManager({
      device,
      recording,
      snapshotFetcher,
      commandFactory: options.commandFactory,
      catalog,
      bus,
      clock,
      logger: log,
      metrics
    });

    return new DevicePipeline({
      device: device.name,
      source,
      sessions,
      postDetectionMs: recording.postDetectionSeconds * 1000,
      tickIntervalMs: recording.tickIntervalMs,
      clock,
      logger: log,
      metrics,
      bus
    });
  };

  const supervisor = new CameraSupervisor({
    devices: devices.map(device => device.name),
    createPipeline,
    restartPolicy: config.supervisor.restartPolicy,
    restartDelayMs: config.supervisor.restartDelayMs,
    maxRestarts: config.supervisor.maxRestarts,
    clock,
    logger,
    metrics,
    bus
  });

  supervisor.start();
  logger.info(
    {
      devices: devices.map(device => device.name),
      outputRoot: recording.outputRoot,
      postDetectionSeconds: recording.postDetectionSeconds
    },
    'Watching cameras for person detections'
  );

  return {
    supervisor,
    devices: devices.map(device => device.name),
    stop: (reason = 'shutdown') => supervisor.stop(reason)
  };
}
