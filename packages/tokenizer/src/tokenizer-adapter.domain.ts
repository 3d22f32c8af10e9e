import type { ISegmenter } from "@lexalign/subword";
import type { ILineTransport } from "./transport.domain";

export interface ITokenizerAdapterConfig {
  lang: string;
  transport: ILineTransport;
  /** When set, tokenizer output is split into subwords before returning */
  segmenter?: ISegmenter;
}

export interface ICreateTokenizerAdapterConfig {
  lang: string;
  /** Path to the tokenizer script; defaults to TOKENIZER_SCRIPT */
  script?: string;
  /** Path to a merge-table file enabling subword segmentation */
  subwordCodes?: string;
  separator?: string;
  cacheSize?: number;
}

/**
 * Pre- and post-processing for one language
 */
export interface ITokenizerAdapter {
  readonly lang: string;

  /**
   * Tokenize a raw sentence. Calls are served one at a time, in call order.
   */
  tokenize(text: string): Promise<string[]>;

  detokenize(text: string): string;

  truecase(text: string): string;

  detruecase(text: string): string;

  mapTerms(tokens: string[]): string[];

  close(): Promise<void>;
}
