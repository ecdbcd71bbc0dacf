export type EventSeverity = 'info' | 'warning' | 'critical';

export type PipelineEventKind = 'subscription' | 'detection' | 'recording' | 'supervisor';

export interface EventPayload {
  ts?: number | Date;
  source: string;
  kind: PipelineEventKind;
  severity: EventSeverity;
  message: string;
  meta?: Record<string, unknown>;
}

export interface EventRecord {
  ts: number;
  source: string;
  kind: PipelineEventKind;
  severity: EventSeverity;
  message: string;
  meta: Record<string, unknown> | undefined;
}

export interface DetectionEvent {
  device: string;
  /** Monotonic receive time in milliseconds, from the pipeline clock. */
  observedAt: number;
  /** Device-reported time of the notification, or the local wall time when absent. */
  wallTime: Date;
  isPresent: boolean;
  topic: string;
}

export type SessionStatus = 'STARTING' | 'RUNNING' | 'STOPPING' | 'STOPPED';

export type RecordingOutcome = 'complete' | 'incomplete' | 'empty' | 'failed';

export interface RecordingRecord {
  sessionId: string;
  device: string;
  startedAt: number;
  stoppedAt: number | null;
  snapshotPath: string | null;
  clipPath: string;
  clipBytes: number | null;
  durationMs: number | null;
  outcome: RecordingOutcome | null;
  stopReason: string | null;
}
