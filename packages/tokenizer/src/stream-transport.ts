import type { Readable, Writable } from "node:stream";
import type { ILineTransport } from "./transport.domain";
import { LineReader } from "./line-reader";
import { TokenizerProtocolError } from "./errors";
import { createLogger } from "@lexalign/shared";

const logger = createLogger("stream-transport");

/**
 * Line transport over a pair of streams: requests go to `input`, responses
 * are read from `output`.
 */
export class StreamTransport implements ILineTransport {
  protected readonly _input: Writable;
  protected readonly _reader: LineReader;

  constructor(input: Writable, output: Readable) {
    this._input = input;
    this._reader = new LineReader(output);
    // write() rejects with the same error; the listener keeps it from
    // surfacing as an unhandled stream error
    this._input.on("error", (error: Error) => {
      logger.warn({ err: error }, "Tokenizer input failed");
    });
  }

  write(text: string): Promise<void> {
    if (this._input.writableEnded || this._input.destroyed) {
      return Promise.reject(
        new TokenizerProtocolError("Tokenizer input is closed", { text }),
      );
    }

    return new Promise<void>((resolve, reject) => {
      this._input.write(text, "utf8", (error?: Error | null) => {
        if (error) {
          reject(
            new TokenizerProtocolError(
              `Failed to write to tokenizer: ${error.message}`,
              { text },
              { cause: error },
            ),
          );
        } else {
          resolve();
        }
      });
    });
  }

  readLine(): Promise<string | null> {
    return this._reader.readLine();
  }

  async close(): Promise<void> {
    if (!this._input.writableEnded) this._input.end();
  }
}
