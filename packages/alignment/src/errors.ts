import { LexalignError } from "@lexalign/shared";
import type { Span } from "./domain";

export class OrphanSpanEndError extends LexalignError {
  constructor(readonly position: number) {
    super(
      "ORPHAN_SPAN_END",
      `Constraint span ends at ${position} but no span is open`,
      { position },
    );
  }
}

export class InvalidSpanError extends LexalignError {
  constructor(
    readonly span: Span,
    readonly length: number,
  ) {
    super(
      "INVALID_SPAN",
      `Constraint span [${span[0]}, ${span[1]}) is empty or outside a text of length ${length}`,
      { span, length },
    );
  }
}

export class AlignmentOverrunError extends LexalignError {
  constructor(
    readonly tokenized: string,
    readonly detokenized: string,
    readonly position: number,
  ) {
    super(
      "ALIGNMENT_OVERRUN",
      `Ran past the end of "${tokenized}" while aligning "${detokenized}" at ${position}`,
      { tokenized, detokenized, position },
    );
  }
}

export class LengthMismatchError extends LexalignError {
  constructor(
    readonly tokens: number,
    readonly tags: number,
  ) {
    super(
      "LENGTH_MISMATCH",
      `Expected one constraint tag per token, got ${tokens} tokens and ${tags} tags`,
      { tokens, tags },
    );
  }
}
