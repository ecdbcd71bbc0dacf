import { describe, expect, it } from 'vitest';
import {
  DEFAULT_RESTART_SEVERITY_THRESHOLDS,
  evaluateRestartSeverity,
  formatRestartSeverityReason
} from '../src/pipeline/channelHealth.js';

describe('evaluateRestartSeverity', () => {
  it('is quiet below every threshold', () => {
    const evaluation = evaluateRestartSeverity({ restarts: 2, downtimeMs: 59_999 });

    expect(evaluation).toEqual({ severity: 'none', triggeredBy: null, threshold: null, actual: 2 });
    expect(formatRestartSeverityReason(evaluation)).toBeNull();
  });

  it('warns on restart count before downtime', () => {
    const evaluation = evaluateRestartSeverity({ restarts: 3, downtimeMs: 90_000 });

    expect(evaluation).toEqual({ severity: 'warning', triggeredBy: 'restarts', threshold: 3, actual: 3 });
    expect(formatRestartSeverityReason(evaluation)).toBe('restarts 3 >= 3');
  });

  it('warns on downtime alone', () => {
    const evaluation = evaluateRestartSeverity({ restarts: 1, downtimeMs: 60_000 });

    expect(formatRestartSeverityReason(evaluation)).toBe('restart downtime 60000ms >= 60000ms');
  });

  it('escalates to critical', () => {
    expect(evaluateRestartSeverity({ restarts: 6, downtimeMs: 0 }).severity).toBe('critical');
    expect(evaluateRestartSeverity({ restarts: 4, downtimeMs: 180_000 })).toEqual({
      severity: 'critical',
      triggeredBy: 'downtime',
      threshold: 180_000,
      actual: 180_000
    });
  });

  it('accepts custom thresholds', () => {
    const thresholds = {
      ...DEFAULT_RESTART_SEVERITY_THRESHOLDS,
      warning: { restarts: 1, downtimeMs: 1000 }
    };

    expect(evaluateRestartSeverity({ restarts: 1, downtimeMs: 0 }, thresholds).severity).toBe('warning');
  });
});
