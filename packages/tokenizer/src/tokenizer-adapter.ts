import { createLogger } from "@lexalign/shared";
import { BPESegmenter, MergeTable, type ISegmenter } from "@lexalign/subword";
import type {
  ICreateTokenizerAdapterConfig,
  ITokenizerAdapter,
  ITokenizerAdapterConfig,
} from "./tokenizer-adapter.domain";
import type { ILineTransport } from "./transport.domain";
import { exchange } from "./protocol";
import { ProcessTransport, mosesTokenizerCommand } from "./process-transport";
import { variables } from "./environment";

const logger = createLogger("tokenizer-adapter");

export class TokenizerAdapter implements ITokenizerAdapter {
  readonly lang: string;

  private readonly _transport: ILineTransport;
  private readonly _segmenter: ISegmenter | undefined;
  // tail of the request chain; only orders calls, never carries a result
  private _queue: Promise<void> = Promise.resolve();

  constructor({ lang, transport, segmenter }: ITokenizerAdapterConfig) {
    this.lang = lang;
    this._transport = transport;
    this._segmenter = segmenter;
  }

  tokenize(text: string): Promise<string[]> {
    if (text.trim().length === 0) return Promise.resolve([]);

    const request = this._queue.then(() => this.request(text));
    this._queue = request.then(
      () => undefined,
      () => undefined,
    );
    return request;
  }

  private async request(text: string): Promise<string[]> {
    // the service answers one line per input line
    const line = await exchange(this._transport, text.replace(/\r?\n/g, " "));
    logger.debug({ lang: this.lang, text, line }, "tokenized");

    const tokenized = this._segmenter
      ? this._segmenter.segmentSentence(line)
      : line;
    return tokenized.split(/\s+/).filter((token) => token.length > 0);
  }

  detokenize(text: string): string {
    return text;
  }

  truecase(text: string): string {
    return text;
  }

  detruecase(text: string): string {
    return text;
  }

  mapTerms(tokens: string[]): string[] {
    return tokens;
  }

  async close(): Promise<void> {
    await this._queue;
    await this._transport.close();
  }
}

/**
 * Spawn the tokenizer process for `lang` and, when a merge-table file is
 * given, load it for subword segmentation.
 */
export async function createTokenizerAdapter({
  lang,
  script,
  subwordCodes,
  separator,
  cacheSize,
}: ICreateTokenizerAdapterConfig): Promise<TokenizerAdapter> {
  const segmenter = subwordCodes
    ? new BPESegmenter({
        mergeTable: await MergeTable.fromFile(subwordCodes),
        separator: separator ?? variables.BPE_SEPARATOR,
        cacheSize: cacheSize ?? variables.SEGMENTER_CACHE_SIZE,
      })
    : undefined;

  const transport = ProcessTransport.spawn(
    mosesTokenizerCommand(script ?? variables.TOKENIZER_SCRIPT, lang),
  );

  return new TokenizerAdapter({ lang, transport, segmenter });
}
