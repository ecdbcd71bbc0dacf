export type RestartSeverityLevel = 'none' | 'warning' | 'critical';

export type RestartSeverityThreshold = {
  restarts: number;
  downtimeMs: number;
};

export type RestartSeverityThresholds = {
  warning: RestartSeverityThreshold;
  critical: RestartSeverityThreshold;
};

export type RestartSeverityEvaluation = {
  severity: RestartSeverityLevel;
  triggeredBy: 'restarts' | 'downtime' | null;
  threshold: number | null;
  actual: number;
};

export type RestartStats = {
  /** Pipeline restarts since the supervisor started. */
  restarts: number;
  /** Total time spent waiting to restart. */
  downtimeMs: number;
};

export const DEFAULT_RESTART_SEVERITY_THRESHOLDS: RestartSeverityThresholds = {
  warning: {
    restarts: 3,
    downtimeMs: 60_000
  },
  critical: {
    restarts: 6,
    downtimeMs: 180_000
  }
};

export function evaluateRestartSeverity(
  stats: RestartStats,
  thresholds: RestartSeverityThresholds = DEFAULT_RESTART_SEVERITY_THRESHOLDS
): RestartSeverityEvaluation {
  const levels: Array<Exclude<RestartSeverityLevel, 'none'>> = ['critical', 'warning'];
  for (const severity of levels) {
    const threshold = thresholds[severity];
    if (stats.restarts >= threshold.restarts) {
      return { severity, triggeredBy: 'restarts', threshold: threshold.restarts, actual: stats.restarts };
    }
    if (stats.downtimeMs >= threshold.downtimeMs) {
      return { severity, triggeredBy: 'downtime', threshold: threshold.downtimeMs, actual: stats.downtimeMs };
    }
  }

  return { severity: 'none', triggeredBy: null, threshold: null, actual: stats.restarts };
}

export function formatRestartSeverityReason(evaluation: RestartSeverityEvaluation): string | null {
  if (evaluation.severity === 'none' || !evaluation.triggeredBy || evaluation.threshold === null) {
    return null;
  }

  if (evaluation.triggeredBy === 'restarts') {
    return `restarts ${evaluation.actual} >= ${evaluation.threshold}`;
  }

  return `restart downtime ${evaluation.actual}ms >= ${evaluation.threshold}ms`;
}
