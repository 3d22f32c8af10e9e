import { LexalignError } from "@lexalign/shared";

export class ModelNotFoundError extends LexalignError {
  constructor(
    readonly sourceLang: string,
    readonly targetLang: string,
  ) {
    super(
      "MODEL_NOT_FOUND",
      `No model is loaded for ${sourceLang}-${targetLang}`,
      { sourceLang, targetLang },
    );
  }
}
