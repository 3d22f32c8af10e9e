import { PassThrough } from "node:stream";
import { createInterface } from "node:readline";
import type { ILineTransport } from "../../transport.domain";
import { StreamTransport } from "../../stream-transport";

/**
 * Replays canned response lines and records every operation in `log`
 */
export class ScriptedTransport implements ILineTransport {
  readonly writes: string[] = [];
  readonly log: string[] = [];
  closed = false;

  constructor(private readonly _responses: string[]) {}

  async write(text: string): Promise<void> {
    this.writes.push(text);
    this.log.push(`write:${text.trim()}`);
  }

  async readLine(): Promise<string | null> {
    this.log.push("read");
    return this._responses.shift() ?? null;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * In-process stand-in for the tokenizer process: answers every input line
 * with `tokenize(line)` and every blank line with a blank line.
 */
export function fakeTokenizerService(tokenize: (line: string) => string) {
  const stdin = new PassThrough();
  const stdout = new PassThrough();

  const lines = createInterface({ input: stdin });
  lines.on("line", (line) => {
    stdout.write(`${line.trim().length === 0 ? "" : tokenize(line)}\n`);
  });
  lines.on("close", () => stdout.end());

  return { stdin, stdout, transport: new StreamTransport(stdin, stdout) };
}

export const splitPunctuation = (line: string) =>
  line.replace(/([,.!?])/g, " $1");
