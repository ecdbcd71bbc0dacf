import fs from 'node:fs';
import path from 'node:path';
import baseLogger, { type PipelineLogger } from '../logger.js';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';
import { ProcessFault, SessionStartError, toError } from '../errors.js';
import type { RecordingConfig, ResolvedDeviceConfig } from '../config/index.js';
import type { RecordingCatalog } from '../db.js';
import type { EventPayload, RecordingOutcome, SessionStatus } from '../types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import {
  CaptureProcess,
  buildRtspUrl,
  createCaptureCommand,
  redactUrl,
  type CaptureExit,
  type CommandFactory
} from './capture.js';
import { HttpSnapshotFetcher, type SnapshotFetcher } from './snapshot.js';

export type SnapshotOutcome = 'pending' | 'saved' | 'failed';

export interface RecordingSession {
  id: string;
  device: string;
  artifact: string;
  startedAt: Date;
  /** Monotonic start time from the manager's clock. */
  startedAtMs: number;
  stoppedAtMs: number | null;
  snapshotPath: string;
  clipPath: string;
  status: SessionStatus;
  deadline: number;
  snapshot: SnapshotOutcome;
  stopReason: string | null;
  outcome: RecordingOutcome | null;
  clipBytes: number | null;
}

export type StartSessionRequest = {
  wallTime: Date;
  deadline: number;
};

/** The commands a device pipeline issues; implemented by {@link RecordingSessionManager}. */
export interface SessionController {
  startSession(request: StartSessionRequest): Promise<RecordingSession>;
  extendSession(deadline: number): void;
  stopSession(reason: string): Promise<RecordingSession | null>;
  isActive(): boolean;
  dispose(): Promise<void>;
}

export type EventSink = {
  emitEvent(payload: EventPayload): unknown;
};

export type RecordingSessionManagerOptions = {
  device: ResolvedDeviceConfig;
  recording: Pick<
    RecordingConfig,
    'outputRoot' | 'rtspTransport' | 'audioCodec' | 'audioBitrate' | 'ffmpegPath' | 'startTimeoutMs' | 'stopGraceMs'
  >;
  snapshotFetcher?: SnapshotFetcher;
  commandFactory?: CommandFactory;
  catalog?: RecordingCatalog;
  bus?: EventSink;
  clock?: Clock;
  logger?: PipelineLogger;
  metrics?: MetricsRegistry;
};

function pad(value: number, width = 2) {
  return String(value).padStart(width, '0');
}

/** `person_YYYYMMDD_HHMMSS_mmm` in local time; sorts chronologically. */
export function formatArtifactName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `person_${day}_${time}_${pad(date.getMilliseconds(), 3)}`;
}

export function deviceDirectories(outputRoot: string, device: string) {
  const root = path.join(outputRoot, device);
  return { snapshots: path.join(root, 'snapshots'), clips: path.join(root, 'clips') };
}

function isErrno(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Owns the one recording of a device: the snapshot task, the capture process and the
 * output paths, from start until the stop is acknowledged.
 */
export class RecordingSessionManager implements SessionController {
  private readonly device: ResolvedDeviceConfig;
  private readonly recording: RecordingSessionManagerOptions['recording'];
  private readonly snapshotFetcher: SnapshotFetcher;
  private readonly commandFactory: CommandFactory;
  private readonly catalog: RecordingCatalog | null;
  private readonly bus: EventSink | null;
  private readonly clock: Clock;
  private readonly log: PipelineLogger;
  private readonly metrics: MetricsRegistry;
  private readonly usedArtifacts = new Set<string>();
  private current: RecordingSession | null = null;
  private capture: CaptureProcess | null = null;
  private snapshotTask: Promise<void> | null = null;
  private settling: Promise<RecordingSession> | null = null;
  private disposed = false;

  constructor(options: RecordingSessionManagerOptions) {
    this.device = options.device;
    this.recording = options.recording;
    this.snapshotFetcher = options.snapshotFetcher ?? new HttpSnapshotFetcher();
    this.commandFactory = options.commandFactory ?? createCaptureCommand;
    this.catalog = options.catalog ?? null;
    this.bus = options.bus ?? null;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? baseLogger.child({ device: options.device.name });
    this.metrics = options.metrics ?? defaultMetrics;
  }

  get session(): RecordingSession | null {
    return this.current;
  }

  isActive(): boolean {
    return this.current !== null && this.current.status !== 'STOPPED';
  }

  async startSession(request: StartSessionRequest): Promise<RecordingSession> {
    if (this.disposed) {
      throw new SessionStartError('Session manager is disposed', { device: this.device.name });
    }
    if (this.current) {
      await this.stopSession('superseded');
    }

    const directories = deviceDirectories(this.recording.outputRoot, this.device.name);
    try {
      await fs.promises.mkdir(directories.snapshots, { recursive: true });
      await fs.promises.mkdir(directories.clips, { recursive: true });
    } catch (error) {
      this.metrics.recordSessionStartFailure(this.device.name);
      throw new SessionStartError(`Cannot create output directories: ${toError(error).message}`, {
        device: this.device.name,
        cause: error
      });
    }

    const artifact = this.allocateArtifact(request.wallTime, directories.clips);
    const session: RecordingSession = {
      id: `${this.device.name}-${artifact}`,
      device: this.device.name,
      artifact,
      startedAt: request.wallTime,
      startedAtMs: this.clock.now(),
      stoppedAtMs: null,
      snapshotPath: path.join(directories.snapshots, `${artifact}.jpg`),
      clipPath: path.join(directories.clips, `${artifact}.mp4`),
      status: 'STARTING',
      deadline: request.deadline,
      snapshot: 'pending',
      stopReason: null,
      outcome: null,
      clipBytes: null
    };
    this.current = session;
    this.saveRecord(session);

    this.snapshotTask = this.captureSnapshot(session);

    const rtspUrl = buildRtspUrl(this.device);
    let capture: CaptureProcess;
    try {
      capture = new CaptureProcess(
        this.commandFactory({
          rtspUrl,
          clipPath: session.clipPath,
          rtspTransport: this.recording.rtspTransport,
          audioCodec: this.recording.audioCodec,
          audioBitrate: this.recording.audioBitrate,
          ffmpegPath: this.recording.ffmpegPath
        }),
        {
          startTimeoutMs: this.recording.startTimeoutMs,
          stopGraceMs: this.recording.stopGraceMs,
          logger: this.log
        }
      );
      this.capture = capture;
      capture.on('unexpected-exit', (exit: CaptureExit) => {
        this.handleUnexpectedExit(session, exit);
      });
      await capture.start();
    } catch (error) {
      this.metrics.recordSessionStartFailure(this.device.name);
      let settling = this.settling;
      if (session.status === 'STARTING') {
        session.stopReason = 'start-failed';
        settling = this.settling = this.settle(session, 'failed');
      }
      if (settling) {
        await settling;
      }
      throw new SessionStartError(`Cannot launch capture: ${toError(error).message}`, {
        device: this.device.name,
        cause: error
      });
    }

    if (session.status !== 'STARTING') {
      // Stopped while the process was launching.
      return session;
    }
    session.status = 'RUNNING';
    this.metrics.recordSessionStarted(this.device.name);
    this.log.info(
      { session: session.id, clip: session.clipPath, source: redactUrl(rtspUrl) },
      'Recording started'
    );
    this.publish('info', `Recording started (${session.artifact})`, {
      session: session.id,
      clip: session.clipPath
    });
    return session;
  }

  extendSession(deadline: number): void {
    const session = this.current;
    if (!session || session.status === 'STOPPED' || session.status === 'STOPPING') {
      return;
    }
    if (deadline > session.deadline) {
      session.deadline = deadline;
      this.log.debug({ session: session.id, deadline }, 'Recording extended');
    }
  }

  /** Idempotent. Resolves with the finished session, or `null` when nothing was recording. */
  async stopSession(reason: string): Promise<RecordingSession | null> {
    const session = this.current;
    if (!session) {
      return null;
    }
    if (!this.settling) {
      session.stopReason = reason;
      session.status = 'STOPPING';
      this.settling = this.settle(session, null);
    }
    return this.settling;
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    await this.stopSession('shutdown');
  }

  private allocateArtifact(wallTime: Date, clipsDirectory: string): string {
    const base = formatArtifactName(wallTime);
    let candidate = base;
    let suffix = 0;
    while (
      this.usedArtifacts.has(candidate) ||
      fs.existsSync(path.join(clipsDirectory, `${candidate}.mp4`))
    ) {
      suffix += 1;
      candidate = `${base}_${suffix}`;
    }
    this.usedArtifacts.add(candidate);
    return candidate;
  }

  private async captureSnapshot(session: RecordingSession): Promise<void> {
    try {
      const payload = await this.snapshotFetcher.fetch(this.device);
      await fs.promises.writeFile(session.snapshotPath, payload);
      session.snapshot = 'saved';
      this.metrics.recordSnapshot(this.device.name, true);
      this.log.info({ session: session.id, path: session.snapshotPath, bytes: payload.length }, 'Snapshot saved');
    } catch (error) {
      session.snapshot = 'failed';
      this.metrics.recordSnapshot(this.device.name, false);
      this.log.warn({ err: error, session: session.id }, 'Snapshot failed; recording continues');
    }
  }

  private handleUnexpectedExit(session: RecordingSession, exit: CaptureExit) {
    if (this.current !== session || session.status !== 'RUNNING' || this.settling) {
      return;
    }
    const fault = new ProcessFault('Capture process exited while recording', {
      device: this.device.name,
      exitCode: exit.code,
      signal: exit.signal,
      cause: exit.error ?? undefined
    });
    this.metrics.recordProcessFault(this.device.name);
    this.log.error(
      { err: fault, session: session.id, exitCode: exit.code, stderr: exit.stderr },
      'Capture process exited unexpectedly; clip is incomplete'
    );
    session.stopReason = 'process-fault';
    session.status = 'STOPPED';
    this.settling = this.settle(session, 'incomplete');
  }

  /** Stops the capture if needed and files the result. Never rejects. */
  private async settle(session: RecordingSession, forcedOutcome: RecordingOutcome | null) {
    const capture = this.capture;
    let exit: CaptureExit | null = null;
    if (capture) {
      exit = await capture.stop();
    }
    session.status = 'STOPPED';
    session.stoppedAtMs = this.clock.now();

    if (this.snapshotTask) {
      await this.snapshotTask;
    }

    const clipBytes = await this.inspectClip(session);
    session.clipBytes = clipBytes;

    let outcome: RecordingOutcome;
    if (forcedOutcome === 'failed') {
      outcome = 'failed';
    } else if (clipBytes === null || clipBytes === 0) {
      outcome = 'empty';
    } else if (forcedOutcome === 'incomplete' || exit?.forced) {
      outcome = 'incomplete';
    } else {
      outcome = 'complete';
    }
    session.outcome = outcome;

    this.saveRecord(session);
    this.metrics.recordSessionStopped(this.device.name, outcome);

    const durationMs = session.stoppedAtMs - session.startedAtMs;
    if (outcome === 'complete' || outcome === 'incomplete') {
      this.log.info(
        {
          session: session.id,
          clip: session.clipPath,
          sizeMb: Number(((clipBytes ?? 0) / (1024 * 1024)).toFixed(2)),
          durationSeconds: Number((durationMs / 1000).toFixed(1)),
          outcome,
          reason: session.stopReason
        },
        'Recording saved'
      );
    }
    this.publish(outcome === 'complete' ? 'info' : 'warning', `Recording ${outcome} (${session.artifact})`, {
      session: session.id,
      outcome,
      reason: session.stopReason,
      clipBytes,
      durationMs
    });

    if (this.current === session) {
      this.current = null;
      this.capture = null;
      this.snapshotTask = null;
      this.settling = null;
    }
    return session;
  }

  private async inspectClip(session: RecordingSession): Promise<number | null> {
    let size: number;
    try {
      size = (await fs.promises.stat(session.clipPath)).size;
    } catch (error) {
      if (!isErrno(error) || error.code !== 'ENOENT') {
        this.log.warn({ err: error, clip: session.clipPath }, 'Cannot inspect clip');
      } else {
        this.log.warn({ session: session.id, clip: session.clipPath }, 'No clip was written');
      }
      return null;
    }

    if (size === 0) {
      this.log.warn({ session: session.id, clip: session.clipPath }, 'Clip is empty; removing it');
      try {
        await fs.promises.unlink(session.clipPath);
      } catch (error) {
        this.log.warn({ err: error, clip: session.clipPath }, 'Cannot remove empty clip');
      }
    }
    return size;
  }

  private saveRecord(session: RecordingSession) {
    if (!this.catalog) {
      return;
    }
    try {
      this.catalog.save({
        sessionId: session.id,
        device: session.device,
        startedAt: session.startedAt.getTime(),
        stoppedAt:
          session.stoppedAtMs === null
            ? null
            : session.startedAt.getTime() + (session.stoppedAtMs - session.startedAtMs),
        snapshotPath: session.snapshot === 'failed' ? null : session.snapshotPath,
        clipPath: session.clipPath,
        clipBytes: session.clipBytes,
        durationMs: session.stoppedAtMs === null ? null : session.stoppedAtMs - session.startedAtMs,
        outcome: session.outcome,
        stopReason: session.stopReason
      });
    } catch (error) {
      this.log.error({ err: error, session: session.id }, 'Failed to record session in catalog');
    }
  }

  private publish(severity: EventPayload['severity'], message: string, meta: Record<string, unknown>) {
    this.bus?.emitEvent({ source: this.device.name, kind: 'recording', severity, message, meta });
  }
}
