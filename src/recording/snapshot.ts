import axios, { type AxiosInstance } from 'axios';
import { randomBytes } from 'node:crypto';
import type { ResolvedDeviceConfig } from '../config/index.js';

const JPEG_MARKER = Buffer.from([0xff, 0xd8]);
const DEFAULT_TIMEOUT_MS = 10_000;

export type SnapshotDevice = Pick<ResolvedDeviceConfig, 'name' | 'host' | 'port' | 'channel' | 'username' | 'password'>;

export interface SnapshotFetcher {
  fetch(device: SnapshotDevice, signal?: AbortSignal): Promise<Buffer>;
}

export type HttpSnapshotFetcherOptions = {
  http?: AxiosInstance;
  timeoutMs?: number;
  random?: () => string;
};

export function isJpeg(payload: Buffer): boolean {
  return payload.length > JPEG_MARKER.length && payload.subarray(0, JPEG_MARKER.length).equals(JPEG_MARKER);
}

/** Single-frame grab through the camera's HTTP API (`cmd=Snap`). */
export class HttpSnapshotFetcher implements SnapshotFetcher {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly random: () => string;

  constructor(options: HttpSnapshotFetcherOptions = {}) {
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.random = options.random ?? (() => randomBytes(8).toString('hex'));
  }

  async fetch(device: SnapshotDevice, signal?: AbortSignal): Promise<Buffer> {
    const response = await this.http.get<ArrayBuffer>(`http://${device.host}:${device.port}/cgi-bin/api.cgi`, {
      params: {
        cmd: 'Snap',
        channel: device.channel,
        rs: this.random(),
        user: device.username,
        password: device.password
      },
      responseType: 'arraybuffer',
      timeout: this.timeoutMs,
      signal
    });

    const payload = Buffer.from(response.data);
    if (!isJpeg(payload)) {
      throw new Error(`Snapshot from ${device.name} is not a JPEG (${payload.length} bytes)`);
    }
    return payload;
  }
}
