import { LRUCache } from "lru-cache";
import { createLogger } from "@lexalign/shared";
import { isIMergeTable, type IMergeTable } from "./merge-table.domain";
import { MergeTable } from "./merge-table";
import {
  DEFAULT_CACHE_SIZE,
  DEFAULT_SEPARATOR,
  END_OF_WORD,
  type ISegmenter,
  type ISegmenterConfig,
} from "./segmenter.domain";
import type { ISegmenterMonitor, ISegmenterStats } from "./monitor.domain";
import { NoOpSegmenterMonitor, SegmenterMonitor } from "./monitor";

const logger = createLogger("segmenter");

/**
 * Byte-pair-encoding segmenter. Applies the merge table to single words and
 * memoizes the result per word for the lifetime of the instance.
 */
export class BPESegmenter implements ISegmenter {
  readonly separator: string;

  private readonly _table: IMergeTable;
  private readonly _ignore: ReadonlySet<string>;
  private readonly _cache: LRUCache<string, readonly string[]>;
  private readonly _monitor: ISegmenterMonitor;

  constructor({
    mergeTable,
    separator,
    ignore,
    cacheSize,
    monitor,
  }: ISegmenterConfig) {
    this._table = isIMergeTable(mergeTable)
      ? mergeTable
      : MergeTable.fromLines(mergeTable);
    this.separator = separator ?? DEFAULT_SEPARATOR;
    this._ignore = new Set(ignore ?? []);
    this._cache = new LRUCache<string, readonly string[]>({
      max: cacheSize ?? DEFAULT_CACHE_SIZE,
    });

    this._monitor =
      monitor instanceof SegmenterMonitor
        ? monitor
        : monitor
          ? new SegmenterMonitor(monitor)
          : new NoOpSegmenterMonitor();
  }

  get stats(): ISegmenterStats | null {
    return this._monitor.stats;
  }

  segment(word: string): string[] {
    this._monitor.start();
    this._monitor.increment("wordsIn");

    const cached = this._cache.get(word);
    if (cached) {
      this._monitor.increment("cacheHits");
      return [...cached];
    }
    this._monitor.increment("cacheMisses");

    const symbols = this.encode(word);
    this._cache.set(word, symbols);
    logger.trace({ word, symbols }, "segmented");
    return [...symbols];
  }

  segmentSentence(text: string): string {
    const output: string[] = [];

    for (const word of text.split(/\s+/)) {
      if (word.length === 0) continue;
      if (this._ignore.has(word)) {
        output.push(word);
        continue;
      }

      const symbols = this.segment(word);
      for (let i = 0; i < symbols.length - 1; i++) {
        output.push(symbols[i] + this.separator);
      }
      if (symbols.length > 0) output.push(symbols[symbols.length - 1]);
    }

    return output.join(" ");
  }

  private encode(word: string): string[] {
    let symbols = [...Array.from(word), END_OF_WORD];

    while (symbols.length > 1) {
      const bigram = this.lowestRankedPair(symbols);
      if (!bigram) break;

      symbols = mergePair(symbols, bigram[0], bigram[1]);
      this._monitor.increment("mergePasses");
    }

    return stripEndOfWord(symbols);
  }

  /**
   * The adjacent pair with the smallest rank; equal ranks resolve to the
   * leftmost pair
   */
  private lowestRankedPair(symbols: string[]): [string, string] | null {
    let best: [string, string] | null = null;
    let bestRank = Infinity;

    for (let i = 0; i < symbols.length - 1; i++) {
      const rank = this._table.rank(symbols[i], symbols[i + 1]);
      if (rank !== undefined && rank < bestRank) {
        bestRank = rank;
        best = [symbols[i], symbols[i + 1]];
      }
    }

    return best;
  }
}

/**
 * One merge pass: every non-overlapping occurrence of `first second`, scanned
 * left to right, becomes a single symbol.
 */
export function mergePair(
  symbols: readonly string[],
  first: string,
  second: string,
): string[] {
  const merged: string[] = [];
  let i = 0;

  while (i < symbols.length) {
    if (
      i < symbols.length - 1 &&
      symbols[i] === first &&
      symbols[i + 1] === second
    ) {
      merged.push(first + second);
      i += 2;
    } else {
      merged.push(symbols[i]);
      i += 1;
    }
  }

  return merged;
}

function stripEndOfWord(symbols: string[]): string[] {
  const last = symbols[symbols.length - 1];
  if (last === undefined) return symbols;

  if (last === END_OF_WORD) return symbols.slice(0, -1);
  if (last.endsWith(END_OF_WORD)) {
    return [...symbols.slice(0, -1), last.slice(0, -END_OF_WORD.length)];
  }
  return symbols;
}
