import ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import baseLogger, { type PipelineLogger } from '../logger.js';
import type { ResolvedDeviceConfig } from '../config/index.js';

const DEFAULT_START_TIMEOUT_MS = 5000;
const DEFAULT_STOP_GRACE_MS = 10_000;
const STDERR_TAIL_LINES = 20;

export type CaptureSpec = {
  rtspUrl: string;
  clipPath: string;
  rtspTransport: 'tcp' | 'udp';
  audioCodec: string;
  audioBitrate: string;
  ffmpegPath?: string;
};

export type CommandFactory = (spec: CaptureSpec) => ffmpeg.FfmpegCommand;

export type CaptureExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  error: Error | null;
  /** The exit followed a stop request. */
  requested: boolean;
  /** SIGKILL was needed. */
  forced: boolean;
  stderr: string[];
};

export type CaptureProcessOptions = {
  startTimeoutMs?: number;
  stopGraceMs?: number;
  logger?: PipelineLogger;
};

type CaptureState = 'idle' | 'starting' | 'running' | 'stopping' | 'exited';

export function buildRtspUrl(
  device: Pick<ResolvedDeviceConfig, 'host' | 'rtspPort' | 'channel' | 'username' | 'password' | 'streamFormat'>
): string {
  const stream = device.streamFormat === 'h265' ? 'h265Preview' : 'Preview';
  const channel = String(device.channel + 1).padStart(2, '0');
  const auth = `${encodeURIComponent(device.username)}:${encodeURIComponent(device.password)}`;
  return `rtsp://${auth}@${device.host}:${device.rtspPort}/${stream}_${channel}_main`;
}

export function redactUrl(url: string): string {
  return url.replace(/\/\/([^:/@]*):[^@]*@/, '//$1:***@');
}

/** Stream copy of the video, audio re-encoded so the MP4 container accepts it. */
export const createCaptureCommand: CommandFactory = spec => {
  const command = ffmpeg(spec.rtspUrl)
    .inputOptions(['-rtsp_transport', spec.rtspTransport])
    .outputOptions([
      '-c:v',
      'copy',
      '-c:a',
      spec.audioCodec,
      '-b:a',
      spec.audioBitrate,
      '-movflags',
      '+faststart',
      '-f',
      'mp4',
      '-y'
    ])
    .output(spec.clipPath);
  if (spec.ffmpegPath) {
    command.setFfmpegPath(spec.ffmpegPath);
  }
  return command;
};

function parseExitDetails(error: Error | null): Pick<CaptureExit, 'code' | 'signal'> {
  if (!error) {
    return { code: 0, signal: null };
  }
  const signalMatch = /killed with signal (SIG[A-Z0-9]+)/.exec(error.message);
  if (signalMatch?.[1]) {
    const signal = signalMatch[1];
    return { code: null, signal: isSignal(signal) ? signal : null };
  }
  const codeMatch = /exited with code (-?\d+)/.exec(error.message);
  return { code: codeMatch?.[1] ? Number.parseInt(codeMatch[1], 10) : null, signal: null };
}

const KNOWN_SIGNALS = new Set<string>(['SIGINT', 'SIGTERM', 'SIGKILL', 'SIGQUIT', 'SIGHUP', 'SIGABRT', 'SIGSEGV']);

function isSignal(value: string): value is NodeJS.Signals {
  return KNOWN_SIGNALS.has(value);
}

async function exitedWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>(resolve => {
    timer = setTimeout(() => resolve(false), Math.max(0, ms));
    timer.unref?.();
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * One ffmpeg capture run. Emits `exit` with a {@link CaptureExit} exactly once, and
 * `unexpected-exit` as well when the process ended without a stop request.
 */
export class CaptureProcess extends EventEmitter {
  private readonly command: ffmpeg.FfmpegCommand;
  private readonly startTimeoutMs: number;
  private readonly stopGraceMs: number;
  private readonly log: PipelineLogger;
  private readonly stderrTail: string[] = [];
  private readonly exitPromise: Promise<CaptureExit>;
  private resolveExit: (exit: CaptureExit) => void = () => {};
  private rejectStart: ((error: Error) => void) | null = null;
  private state: CaptureState = 'idle';
  private exitInfo: CaptureExit | null = null;
  private stopRequested = false;
  private killSent = false;
  private commandLineText: string | null = null;

  constructor(command: ffmpeg.FfmpegCommand, options: CaptureProcessOptions = {}) {
    super();
    this.command = command;
    this.startTimeoutMs = options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    this.log = options.logger ?? baseLogger;
    this.exitPromise = new Promise(resolve => {
      this.resolveExit = resolve;
    });
  }

  get status(): CaptureState {
    return this.state;
  }

  get exit(): CaptureExit | null {
    return this.exitInfo;
  }

  get commandLine() {
    return this.commandLineText;
  }

  /** Resolves once ffmpeg has been spawned; rejects if it fails first or does not start in time. */
  start(): Promise<void> {
    if (this.state !== 'idle') {
      return Promise.reject(new Error(`Capture already ${this.state}`));
    }
    this.state = 'starting';

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.state !== 'starting') {
          return;
        }
        this.rejectStart = null;
        this.stopRequested = true;
        this.sendSignal('SIGKILL');
        reject(new Error(`ffmpeg did not start within ${this.startTimeoutMs} ms`));
      }, this.startTimeoutMs);
      timer.unref?.();

      this.rejectStart = error => {
        clearTimeout(timer);
        reject(error);
      };

      this.command.once('start', (commandLine: string) => {
        this.commandLineText = commandLine;
        if (this.state !== 'starting') {
          return;
        }
        clearTimeout(timer);
        this.rejectStart = null;
        this.state = 'running';
        resolve();
      });
      this.command.on('stderr', (line: string) => {
        this.stderrTail.push(line);
        if (this.stderrTail.length > STDERR_TAIL_LINES) {
          this.stderrTail.shift();
        }
      });
      this.command.once('error', (error: Error) => {
        this.finish(error);
      });
      this.command.once('end', () => {
        this.finish(null);
      });

      try {
        this.command.run();
      } catch (error) {
        this.finish(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  /**
   * Asks ffmpeg to finish the file (SIGINT), escalating to SIGKILL after the grace period.
   * Safe to call repeatedly; every call resolves with the same exit.
   */
  async stop(): Promise<CaptureExit> {
    if (this.exitInfo) {
      return this.exitInfo;
    }
    if (!this.stopRequested) {
      this.stopRequested = true;
      this.state = 'stopping';
      this.sendSignal('SIGINT');
    }

    if (await exitedWithin(this.exitPromise, this.stopGraceMs)) {
      return this.exitPromise;
    }

    if (!this.killSent) {
      this.log.warn({ graceMs: this.stopGraceMs }, 'ffmpeg ignored graceful stop; killing');
      this.sendSignal('SIGKILL');
    }

    if (!(await exitedWithin(this.exitPromise, this.stopGraceMs))) {
      this.finish(new Error('ffmpeg did not exit after SIGKILL'));
    }
    return this.exitPromise;
  }

  waitForExit(): Promise<CaptureExit> {
    return this.exitPromise;
  }

  private sendSignal(signal: NodeJS.Signals) {
    if (signal === 'SIGKILL') {
      this.killSent = true;
    }
    try {
      this.command.kill(signal);
    } catch (error) {
      this.log.debug({ err: error, signal }, 'Signalling ffmpeg failed');
    }
  }

  private finish(error: Error | null) {
    if (this.exitInfo) {
      return;
    }
    const exit: CaptureExit = {
      ...parseExitDetails(error),
      error,
      requested: this.stopRequested,
      forced: this.killSent,
      stderr: [...this.stderrTail]
    };
    this.exitInfo = exit;
    this.state = 'exited';

    if (this.rejectStart) {
      const rejectStart = this.rejectStart;
      this.rejectStart = null;
      rejectStart(error ?? new Error('ffmpeg exited before starting'));
    }

    this.resolveExit(exit);
    this.emit('exit', exit);
    if (!exit.requested) {
      this.emit('unexpected-exit', exit);
    }
  }
}
