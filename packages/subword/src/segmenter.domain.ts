import type { IMergeTable } from "./merge-table.domain";
import type { ISegmenterMonitorConfig, ISegmenterStats } from "./monitor.domain";
import type { SegmenterMonitor } from "./monitor";

export const END_OF_WORD = "</w>";
export const DEFAULT_SEPARATOR = "@@";
export const DEFAULT_CACHE_SIZE = 65536;

export interface ISegmenterConfig {
  /** A built table, or the raw `first second` declarations to parse */
  mergeTable: IMergeTable | Iterable<string>;
  /** Appended to every symbol of a word but the last */
  separator?: string;
  /** Words passed through unsegmented */
  ignore?: Iterable<string>;
  /** Maximum number of words kept in the segmentation cache */
  cacheSize?: number;
  monitor?: SegmenterMonitor | ISegmenterMonitorConfig | false;
}

export interface ISegmenter {
  readonly separator: string;

  /**
   * Split one word into subword symbols using the merge table
   */
  segment(word: string): string[];

  /**
   * Segment every whitespace-delimited word and re-join with the separator
   * marking word-internal boundaries
   */
  segmentSentence(text: string): string;

  readonly stats: ISegmenterStats | null;
}
