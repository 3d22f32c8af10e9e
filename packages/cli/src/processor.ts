import { once } from "node:events";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { ProcessingStats } from "./types";

/**
 * Apply `transform` to every line of `input`, writing each result followed by
 * a newline. Honors backpressure on `output`.
 */
export async function processLines(
  input: Readable,
  output: Writable,
  transform: (line: string) => string,
): Promise<ProcessingStats> {
  const startTime = performance.now();
  const lines = createInterface({ input, crlfDelay: Infinity });

  let count = 0;
  for await (const line of lines) {
    count++;
    if (!output.write(`${transform(line)}\n`)) {
      await once(output, "drain");
    }
  }

  return { lines: count, durationMS: performance.now() - startTime };
}
