export { MergeTable } from "./merge-table";
export {
  isIMergeTable,
  type IMergeTable,
  type MergeRule,
} from "./merge-table.domain";
export { BPESegmenter, mergePair } from "./segmenter";
export {
  DEFAULT_CACHE_SIZE,
  DEFAULT_SEPARATOR,
  END_OF_WORD,
  type ISegmenter,
  type ISegmenterConfig,
} from "./segmenter.domain";
export { SegmenterMonitor, NoOpSegmenterMonitor } from "./monitor";
export type {
  ISegmenterMonitor,
  ISegmenterMonitorConfig,
  ISegmenterStats,
  SegmenterCounter,
} from "./monitor.domain";
export { joinSubwords, stripEndOfSentence, END_OF_SENTENCE } from "./join";
export { MalformedRuleError } from "./errors";
