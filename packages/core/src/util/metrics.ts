import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  BODY: 'bodyMs',
  CLEANUP: 'cleanupMs',
  GENERATE: 'generateMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;
export type MetricsVerbosity = 'runtime' | 'ci';

export interface MetricsSnapshot {
  bodyMs: number;
  cleanupMs: number;
  generateMs: number;
  /** Instructions written, header and terminator included. */
  instructions: number;
  targetInstructions: number;
  cleanupInstructions: number;
  markPushes: number;
  markPops: number;
  stackUnderflows: number;
  maxStackDepth: number;
  mutationsApplied: number;
  rewritesApplied: number;
  outputBytes: number;
  framed: boolean;
  byInstruction?: Record<string, number>;
  byMutator?: Record<string, number>;
}

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

function emptySnapshot(): MetricsSnapshot {
  return {
    bodyMs: 0,
    cleanupMs: 0,
    generateMs: 0,
    instructions: 0,
    targetInstructions: 0,
    cleanupInstructions: 0,
    markPushes: 0,
    markPops: 0,
    stackUnderflows: 0,
    maxStackDepth: 0,
    mutationsApplied: 0,
    rewritesApplied: 0,
    outputBytes: 0,
    framed: false,
    byInstruction: {},
    byMutator: {},
  };
}

function idleTimers(): Record<MetricsPhaseKey, TimerState> {
  return {
    bodyMs: { total: 0 },
    cleanupMs: { total: 0 },
    generateMs: { total: 0 },
  };
}

export interface MetricsCollectorOptions {
  now?: () => number;
  verbosity?: MetricsVerbosity;
  enabled?: boolean;
}

/**
 * Per-generator counters. The core never logs; callers read a snapshot
 * and decide what to print.
 */
export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private timers: Record<MetricsPhaseKey, TimerState>;
  private snapshot: MetricsSnapshot;
  private verbosity: MetricsVerbosity;
  private inCleanup = false;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.verbosity = options.verbosity ?? 'runtime';
    this.snapshot = emptySnapshot();
    this.timers = idleTimers();
  }

  public setVerbosity(mode: MetricsVerbosity): void {
    this.verbosity = mode;
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public reset(): void {
    this.snapshot = emptySnapshot();
    this.timers = idleTimers();
    this.inCleanup = false;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }
    this.timers[key] = { total: current.total, startedAt: this.now() };
    if (phase === 'CLEANUP') this.inCleanup = true;
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }
    const duration = Math.max(0, this.now() - current.startedAt);
    const total = current.total + duration;
    this.snapshot[key] = total;
    this.timers[key] = { total };
    if (phase === 'CLEANUP') this.inCleanup = false;
  }

  public recordInstruction(name: string): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.instructions += 1;
    if (this.inCleanup) this.snapshot.cleanupInstructions += 1;
    const counts = (this.snapshot.byInstruction ??= {});
    counts[name] = (counts[name] ?? 0) + 1;
  }

  public recordMarks(pushed: number, popped: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.markPushes += pushed;
    this.snapshot.markPops += popped;
  }

  public recordUnderflows(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.stackUnderflows += count;
  }

  public observeStackDepth(depth: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.maxStackDepth = Math.max(this.snapshot.maxStackDepth, depth);
  }

  public recordMutation(mutator: string): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.mutationsApplied += 1;
    const counts = (this.snapshot.byMutator ??= {});
    counts[mutator] = (counts[mutator] ?? 0) + 1;
  }

  public recordRewrite(mutator: string): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.rewritesApplied += 1;
    const counts = (this.snapshot.byMutator ??= {});
    counts[mutator] = (counts[mutator] ?? 0) + 1;
  }

  public setTarget(count: number): void {
    if (this.enabled) this.snapshot.targetInstructions = count;
  }

  public setOutput(bytes: number, framed: boolean): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.outputBytes = bytes;
    this.snapshot.framed = framed;
  }

  public snapshotMetrics(
    options: { verbosity?: MetricsVerbosity } = {}
  ): MetricsSnapshot {
    const mode = options.verbosity ?? this.verbosity;
    const basic: MetricsSnapshot = {
      ...this.snapshot,
      byInstruction: { ...this.snapshot.byInstruction },
      byMutator: { ...this.snapshot.byMutator },
    };

    if (mode === 'runtime') {
      // per-name tables only in ci mode
      delete basic.byInstruction;
      delete basic.byMutator;
    }

    return basic;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
