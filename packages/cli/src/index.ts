#!/usr/bin/env tsx
import { createLogger, isLexalignError } from "@lexalign/shared";
import { BPESegmenter, MergeTable, joinSubwords } from "@lexalign/subword";
import { USAGE, UsageError, parseCliArgs } from "./args";
import { processLines } from "./processor";
import type { CliOptions, ProcessingStats } from "./types";

const logger = createLogger("cli");

async function run(options: CliOptions): Promise<ProcessingStats | null> {
  switch (options.command) {
    case "help":
      process.stdout.write(USAGE);
      return null;

    case "segment": {
      const segmenter = new BPESegmenter({
        mergeTable: await MergeTable.fromFile(options.codes),
        separator: options.separator,
        ignore: options.ignore,
        monitor: { mode: "enabled" },
      });
      const stats = await processLines(process.stdin, process.stdout, (line) =>
        segmenter.segmentSentence(line),
      );
      logger.debug({ stats: segmenter.stats }, "Segmenter stats");
      return stats;
    }

    case "join":
      return processLines(process.stdin, process.stdout, (line) =>
        joinSubwords(line, options.separator),
      );
  }
}

async function main(): Promise<void> {
  try {
    const stats = await run(parseCliArgs(process.argv.slice(2)));
    if (stats) {
      logger.info(
        { lines: stats.lines, durationMS: stats.durationMS.toFixed(1) },
        "Done",
      );
    }
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(`${error.message}\n${USAGE}`);
      process.exitCode = 1;
      return;
    }
    logger.error(
      isLexalignError(error) ? { code: error.code, ...error.details } : {},
      error instanceof Error ? error.message : String(error),
    );
    process.exitCode = 1;
  }
}

void main();
