import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { TokenizerProtocolError } from "./errors";

/**
 * Pull-style line reader over a readable stream. Lines arriving before they
 * are asked for are buffered by readline and handed out one per
 * `readLine()` call.
 */
export class LineReader {
  private readonly _lines: AsyncIterator<string>;

  constructor(stream: Readable) {
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    // a destroyed stream emits close without end
    stream.once("close", () => lines.close());
    this._lines = lines[Symbol.asyncIterator]();
  }

  /**
   * @returns null once the stream has ended
   */
  async readLine(): Promise<string | null> {
    try {
      const result = await this._lines.next();
      return result.done ? null : result.value;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TokenizerProtocolError(
        `Tokenizer output failed: ${message}`,
        {},
        { cause: error },
      );
    }
  }
}
