import { EventEmitter } from 'node:events';
import type { MergeScope, MergeStrategy, RetentionWarning } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

export type TranscoderOutcomeLabel = 'ok' | 'exit' | 'timeout' | 'spawn';

export type PassOutcomeLabel = 'processed' | 'waiting' | 'error';

export type RetentionSweepKind = 'original' | 'merged';

type RetentionRunContext = {
  sweep: RetentionSweepKind;
  removed: number;
};

type ReconciliationContext = {
  checkedHours: number;
  checkedDays: number;
  invalidHours: number;
  invalidDays: number;
  removed: boolean;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
    currentLevel: string;
    levelChanges: CounterMap;
  };
  merges: {
    hour: CounterMap;
    day: CounterMap;
    byStrategy: CounterMap;
    lastFailure: { scope: MergeScope; output: string; at: string } | null;
  };
  transcoder: {
    invocations: number;
    byOutcome: CounterMap;
  };
  ledger: {
    reconciliations: number;
    checkedKeys: number;
    invalidHours: number;
    invalidDays: number;
    removedKeys: number;
    saveFailures: number;
  };
  retention: {
    runs: CounterMap;
    removed: CounterMap;
    warnings: number;
    lastWarning: RetentionWarning | null;
  };
  watchdog: {
    resets: number;
    expirations: number;
    lastResetAt: string | null;
  };
  scheduler: {
    passes: CounterMap;
    cameraFailures: number;
    lastPassAt: string | null;
  };
  latencies: Record<string, LatencyStats>;
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

class MetricsRegistry {
  private readonly resetEmitter = new EventEmitter();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly mergeCounters: Record<MergeScope, Map<string, number>> = {
    hour: new Map(),
    day: new Map()
  };
  private readonly mergeStrategies = new Map<string, number>();
  private lastMergeFailure: { scope: MergeScope; output: string; at: number } | null = null;
  private transcoderInvocations = 0;
  private readonly transcoderOutcomes = new Map<string, number>();
  private reconciliations = 0;
  private checkedKeys = 0;
  private invalidHours = 0;
  private invalidDays = 0;
  private removedKeys = 0;
  private ledgerSaveFailures = 0;
  private readonly retentionRuns = new Map<string, number>();
  private readonly retentionRemoved = new Map<string, number>();
  private retentionWarnings = 0;
  private lastRetentionWarning: RetentionWarning | null = null;
  private watchdogResets = 0;
  private watchdogExpirations = 0;
  private lastWatchdogResetAt: number | null = null;
  private readonly schedulerPasses = new Map<string, number>();
  private cameraFailures = 0;
  private lastPassAt: number | null = null;
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.mergeCounters.hour.clear();
    this.mergeCounters.day.clear();
    this.mergeStrategies.clear();
    this.lastMergeFailure = null;
    this.transcoderInvocations = 0;
    this.transcoderOutcomes.clear();
    this.reconciliations = 0;
    this.checkedKeys = 0;
    this.invalidHours = 0;
    this.invalidDays = 0;
    this.removedKeys = 0;
    this.ledgerSaveFailures = 0;
    this.retentionRuns.clear();
    this.retentionRemoved.clear();
    this.retentionWarnings = 0;
    this.lastRetentionWarning = null;
    this.watchdogResets = 0;
    this.watchdogExpirations = 0;
    this.lastWatchdogResetAt = null;
    this.schedulerPasses.clear();
    this.cameraFailures = 0;
    this.lastPassAt = null;
    this.latencyStats.clear();
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (previousNormalized && previousNormalized !== normalized) {
      this.logLevelChangeCounters.set(
        normalized,
        (this.logLevelChangeCounters.get(normalized) ?? 0) + 1
      );
    }
  }

  recordMerge(scope: MergeScope, context: { output: string; strategy: MergeStrategy | null; durationMs: number }) {
    const outcome = context.strategy ? 'success' : 'failure';
    const counters = this.mergeCounters[scope];
    counters.set(outcome, (counters.get(outcome) ?? 0) + 1);
    if (context.strategy) {
      this.mergeStrategies.set(context.strategy, (this.mergeStrategies.get(context.strategy) ?? 0) + 1);
    } else {
      this.lastMergeFailure = { scope, output: context.output, at: Date.now() };
    }
    this.observeLatency(`merge.${scope}.ms`, context.durationMs);
  }

  recordTranscoderInvocation(outcome: TranscoderOutcomeLabel) {
    this.transcoderInvocations += 1;
    this.transcoderOutcomes.set(outcome, (this.transcoderOutcomes.get(outcome) ?? 0) + 1);
  }

  recordReconciliation(context: ReconciliationContext) {
    this.reconciliations += 1;
    this.checkedKeys += context.checkedHours + context.checkedDays;
    this.invalidHours += context.invalidHours;
    this.invalidDays += context.invalidDays;
    if (context.removed) {
      this.removedKeys += context.invalidHours + context.invalidDays;
    }
  }

  recordLedgerSaveFailure() {
    this.ledgerSaveFailures += 1;
  }

  recordRetentionRun(context: RetentionRunContext) {
    this.retentionRuns.set(context.sweep, (this.retentionRuns.get(context.sweep) ?? 0) + 1);
    this.retentionRemoved.set(
      context.sweep,
      (this.retentionRemoved.get(context.sweep) ?? 0) + context.removed
    );
  }

  recordRetentionWarning(warning: RetentionWarning) {
    this.retentionWarnings += 1;
    this.lastRetentionWarning = { ...warning };
  }

  recordWatchdogReset() {
    this.watchdogResets += 1;
    this.lastWatchdogResetAt = Date.now();
  }

  recordWatchdogExpired() {
    this.watchdogExpirations += 1;
  }

  recordSchedulerPass(outcome: PassOutcomeLabel) {
    this.schedulerPasses.set(outcome, (this.schedulerPasses.get(outcome) ?? 0) + 1);
    this.lastPassAt = Date.now();
  }

  recordCameraFailure() {
    this.cameraFailures += 1;
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
      lastErrorMessage: this.lastErrorMessage,
      currentLevel: this.currentLogLevel,
      levelChanges: mapFrom(this.logLevelChangeCounters)
    };
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      merges: {
        hour: mapFrom(this.mergeCounters.hour),
        day: mapFrom(this.mergeCounters.day),
        byStrategy: mapFrom(this.mergeStrategies),
        lastFailure: this.lastMergeFailure
          ? {
              scope: this.lastMergeFailure.scope,
              output: this.lastMergeFailure.output,
              at: new Date(this.lastMergeFailure.at).toISOString()
            }
          : null
      },
      transcoder: {
        invocations: this.transcoderInvocations,
        byOutcome: mapFrom(this.transcoderOutcomes)
      },
      ledger: {
        reconciliations: this.reconciliations,
        checkedKeys: this.checkedKeys,
        invalidHours: this.invalidHours,
        invalidDays: this.invalidDays,
        removedKeys: this.removedKeys,
        saveFailures: this.ledgerSaveFailures
      },
      retention: {
        runs: mapFrom(this.retentionRuns),
        removed: mapFrom(this.retentionRemoved),
        warnings: this.retentionWarnings,
        lastWarning: this.lastRetentionWarning ? { ...this.lastRetentionWarning } : null
      },
      watchdog: {
        resets: this.watchdogResets,
        expirations: this.watchdogExpirations,
        lastResetAt: this.lastWatchdogResetAt ? new Date(this.lastWatchdogResetAt).toISOString() : null
      },
      scheduler: {
        passes: mapFrom(this.schedulerPasses),
        cameraFailures: this.cameraFailures,
        lastPassAt: this.lastPassAt ? new Date(this.lastPassAt).toISOString() : null
      },
      latencies: mapFromLatencies(this.latencyStats)
    };
  }
}

function orderedLogLevelEntries(source: Map<string, number>): Array<[string, number]> {
  const normalized = new Map<string, number>();
  for (const [key, value] of source.entries()) {
    const lower = key.toLowerCase();
    normalized.set(lower, (normalized.get(lower) ?? 0) + value);
  }

  const ordered: Array<[string, number]> = [];
  for (const level of PINO_LEVEL_ORDER) {
    ordered.push([level, normalized.get(level) ?? 0]);
    normalized.delete(level);
  }

  const extras = Array.from(normalized.entries()).sort(([a], [b]) => a.localeCompare(b));
  return ordered.concat(extras);
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  for (const [level, value] of orderedLogLevelEntries(source)) {
    result[level] = value;
  }
  return result;
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromLatencies(
  source: Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>
): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [metric, stats] of source.entries()) {
    result[metric] = {
      count: stats.count,
      totalMs: stats.totalMs,
      minMs: stats.count > 0 ? stats.minMs : 0,
      maxMs: stats.maxMs,
      averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
    };
  }
  return result;
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
