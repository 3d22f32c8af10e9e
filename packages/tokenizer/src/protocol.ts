import type { ILineTransport } from "./transport.domain";
import { TokenizerProtocolError } from "./errors";

/**
 * One request/response round trip with a line tokenizer.
 *
 * The request is the text followed by a blank line. The service may emit
 * blank lines before its answer; those are skipped. The answer is followed
 * by exactly one more line, which is read and dropped.
 */
export async function exchange(
  transport: ILineTransport,
  text: string,
): Promise<string> {
  await transport.write(`${text}\n\n`);

  let line = await transport.readLine();
  while (line !== null && line.trim().length === 0) {
    line = await transport.readLine();
  }

  if (line === null) {
    throw new TokenizerProtocolError(
      "Tokenizer closed its output before answering",
      { text },
    );
  }

  // trailing marker line
  await transport.readLine();

  return line.trimEnd();
}
