import type {
  SegmenterCounter,
  ISegmenterMonitor,
  ISegmenterMonitorConfig,
  ISegmenterStats,
} from "./monitor.domain";

const emptyCounters = (): Record<SegmenterCounter, number> => ({
  wordsIn: 0,
  cacheHits: 0,
  cacheMisses: 0,
  mergePasses: 0,
});

export class SegmenterMonitor implements ISegmenterMonitor {
  readonly _mode: "disabled" | "enabled";
  private _start: number | null = null;
  private _counters = emptyCounters();

  constructor(config: ISegmenterMonitorConfig = {}) {
    this._mode = config.mode ?? "enabled";
  }

  start(): void {
    if (this._mode === "disabled") return;
    if (this._start === null) this._start = performance.now();
  }

  increment(counter: SegmenterCounter, amount = 1): void {
    if (this._mode === "disabled") return;
    this._counters[counter] += amount;
  }

  reset(): void {
    this._counters = emptyCounters();
    this._start = null;
  }

  getCounters(): Record<SegmenterCounter, number> {
    return { ...this._counters };
  }

  get stats(): ISegmenterStats | null {
    if (this._start === null) return null;
    const c = this.getCounters();
    const lookups = c.cacheHits + c.cacheMisses;

    return {
      durationMS: Number((performance.now() - this._start).toFixed(3)),
      ...c,
      hitRate: lookups > 0 ? Number((c.cacheHits / lookups).toFixed(4)) : 0,
    };
  }
}

export class NoOpSegmenterMonitor implements ISegmenterMonitor {
  readonly _mode = "disabled" as const;
  start() {}
  increment(_counter: SegmenterCounter, _amount = 1) {}
  reset() {}
  getCounters(): Record<SegmenterCounter, number> {
    return emptyCounters();
  }
  get stats(): ISegmenterStats | null {
    return null;
  }
}
