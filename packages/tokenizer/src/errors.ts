import { LexalignError, type ErrorDetails } from "@lexalign/shared";

export class TokenizerProtocolError extends LexalignError {
  constructor(
    message: string,
    details: ErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super("TOKENIZER_PROTOCOL", message, details, options);
  }
}
