import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  LOAD: 'loadMs',
  RESOLVE: 'resolveMs',
  SYNTHESIZE: 'synthesizeMs',
  DERIVE: 'deriveMs',
  ASSEMBLE: 'assembleMs',
  SERIALIZE: 'serializeMs',
  TRANSLATE: 'translateMs',
  VALIDATE: 'validateMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;
type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

export type PhaseDurations = Record<MetricsPhaseKey, number>;

export interface MetricsSnapshot extends PhaseDurations {
  definitionsResolved: number;
  featuresEmitted: number;
  constraintsDerived: number;
  documentsProcessed: number;
  memoryPeakMB: number;
}

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

type CounterKey = Exclude<
  keyof MetricsSnapshot,
  MetricsPhaseKey | 'memoryPeakMB'
>;

function emptyDurations(): PhaseDurations {
  return {
    loadMs: 0,
    resolveMs: 0,
    synthesizeMs: 0,
    deriveMs: 0,
    assembleMs: 0,
    serializeMs: 0,
    translateMs: 0,
    validateMs: 0,
  };
}

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers = new Map<MetricsPhaseKey, TimerState>();
  private readonly durations: PhaseDurations = emptyDurations();
  private readonly counters: Record<CounterKey, number> = {
    definitionsResolved: 0,
    featuresEmitted: 0,
    constraintsDerived: 0,
    documentsProcessed: 0,
  };
  private memoryPeakMB = 0;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers.get(key) ?? { total: 0 };
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }

    this.timers.set(key, { total: current.total, startedAt: this.now() });
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers.get(key);
    if (!current || !isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }

    const duration = this.now() - current.startedAt;
    this.accumulateDuration(key, duration);
    this.timers.set(key, { total: this.durations[key] });
  }

  /** Time a synchronous stage, ending the timer even when it throws */
  public measure<T>(phase: MetricPhase, fn: () => T): T {
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public recordDuration(phase: MetricPhase, durationMs: number): void {
    if (!this.enabled) {
      return;
    }
    this.accumulateDuration(METRIC_PHASES[phase], durationMs);
  }

  public addCount(counter: CounterKey, count: number): void {
    if (!this.enabled) {
      return;
    }
    this.counters[counter] += count;
  }

  public observeMemoryPeak(megabytes: number): void {
    if (!this.enabled) {
      return;
    }
    this.memoryPeakMB = Math.max(this.memoryPeakMB, megabytes);
  }

  public snapshotMetrics(): MetricsSnapshot {
    return {
      ...this.durations,
      ...this.counters,
      memoryPeakMB: this.memoryPeakMB,
    };
  }

  private accumulateDuration(key: MetricsPhaseKey, durationMs: number): void {
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.durations[key] += safeDuration;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
