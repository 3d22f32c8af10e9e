export type SegmenterCounter =
  | "wordsIn"
  | "cacheHits"
  | "cacheMisses"
  | "mergePasses";

export interface ISegmenterStats {
  durationMS: number;
  wordsIn: number;
  cacheHits: number;
  cacheMisses: number;
  mergePasses: number;
  hitRate: number;
}

export interface ISegmenterMonitor {
  readonly _mode: "disabled" | "enabled";
  start(): void;
  increment(counter: SegmenterCounter, amount?: number): void;
  reset(): void;
  getCounters(): Record<SegmenterCounter, number>;
  readonly stats: ISegmenterStats | null;
}

export interface ISegmenterMonitorConfig {
  mode?: "disabled" | "enabled";
}
