import { LexalignError } from "@lexalign/shared";

export class MalformedRuleError extends LexalignError {
  constructor(
    readonly lineNumber: number,
    readonly line: string,
  ) {
    super(
      "MALFORMED_RULE",
      `Merge rule on line ${lineNumber} must have exactly two symbols: "${line}"`,
      { lineNumber, line },
    );
  }
}
