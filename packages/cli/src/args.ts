import { parseArgs } from "node:util";
import { LexalignError } from "@lexalign/shared";
import { DEFAULT_OPTIONS, type CliOptions } from "./types";

export class UsageError extends LexalignError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export const USAGE = `
lexalign - subword segmentation over stdin/stdout

Usage:
  lexalign segment --codes <file> [options]
  lexalign join [options]

Commands:
  segment               Split every word of each input line into BPE subwords
  join                  Undo segmentation, gluing subwords back into words

Options:
  --codes <file>        Merge table, one "first second" rule per line (segment)
  --separator <sep>     Subword continuation marker (default: @@)
  --ignore <a,b,...>    Words passed through unsegmented (segment)
  --help                Show this help

Examples:
  lexalign segment --codes codes.bpe < corpus.tok > corpus.bpe
  lexalign join < hypotheses.bpe > hypotheses.txt
`;

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      codes: { type: "string" },
      separator: { type: "string" },
      ignore: { type: "string" },
      help: { type: "boolean" },
    },
    allowPositionals: true,
  });

  if (values.help) return { command: "help" };

  const [command, ...rest] = positionals;
  if (rest.length > 0) {
    throw new UsageError(`Unexpected arguments: ${rest.join(" ")}`);
  }

  const separator = values.separator || DEFAULT_OPTIONS.separator;

  switch (command) {
    case "segment": {
      if (!values.codes) {
        throw new UsageError("segment requires --codes <file>");
      }
      return {
        command,
        codes: values.codes,
        separator,
        ignore: values.ignore
          ? values.ignore
              .split(",")
              .map((word) => word.trim())
              .filter((word) => word.length > 0)
          : [],
      };
    }
    case "join":
      return { command, separator };
    case undefined:
      throw new UsageError("Missing command");
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}
