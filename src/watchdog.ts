import { performance } from 'node:perf_hooks';
import loggerModule from './logger.js';
import metricsModule, { type MetricsRegistry } from './metrics/index.js';

type WatchdogLogger = Pick<typeof loggerModule, 'info' | 'error' | 'fatal'>;

export type WatchdogOptions = {
  timeoutMs: number;
  checkIntervalMs?: number;
  onExpire?: (idleMs: number) => void;
  clock?: () => number;
  logger?: WatchdogLogger;
  metrics?: MetricsRegistry;
};

const DEFAULT_CHECK_INTERVAL_MS = 5_000;

/**
 * Dead-man's switch over the main loop. `reset()` pushes a monotonic
 * deadline forward; a background interval fires `onExpire` once the deadline
 * passes. The default expiry handler terminates the process.
 */
export class LivenessWatchdog {
  private readonly timeoutMs: number;
  private readonly checkIntervalMs: number;
  private readonly onExpire: (idleMs: number) => void;
  private readonly clock: () => number;
  private readonly logger: WatchdogLogger;
  private readonly metrics: MetricsRegistry;
  private deadline = 0;
  private lastResetAt = 0;
  private timer: NodeJS.Timeout | null = null;
  private expired = false;

  constructor(options: WatchdogOptions) {
    this.timeoutMs = Math.max(1, options.timeoutMs);
    this.checkIntervalMs = Math.max(
      1,
      Math.min(options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS, this.timeoutMs)
    );
    this.clock = options.clock ?? (() => performance.now());
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.onExpire =
      options.onExpire ??
      (idleMs => {
        this.logger.fatal({ idleMs, timeoutMs: this.timeoutMs }, 'Watchdog expired, terminating process');
        process.exit(1);
      });
  }

  get running() {
    return this.timer !== null;
  }

  start() {
    if (this.timer) {
      return;
    }
    this.expired = false;
    this.reset();
    this.timer = setInterval(() => {
      this.check();
    }, this.checkIntervalMs);
    this.timer.unref?.();
    this.logger.info({ timeoutMs: this.timeoutMs }, 'Watchdog started');
  }

  reset() {
    this.lastResetAt = this.clock();
    this.deadline = this.lastResetAt + this.timeoutMs;
    this.metrics.recordWatchdogReset();
  }

  /** Returns true when the deadline has passed and expiry was signalled. */
  check(): boolean {
    if (this.expired || !this.timer) {
      return false;
    }
    const now = this.clock();
    if (now <= this.deadline) {
      return false;
    }
    this.expired = true;
    this.metrics.recordWatchdogExpired();
    this.stop();
    this.onExpire(now - this.lastResetAt);
    return true;
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
