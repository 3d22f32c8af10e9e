import {
  DEFAULT_SEPARATOR,
  END_OF_SENTENCE,
  joinSubwords,
} from "@lexalign/subword";
import type { AnnotatedText, ConstraintTag } from "./domain";
import { LengthMismatchError } from "./errors";
import { remapConstraintIndices } from "./remap";
import { tokenAnnotationsToSpans } from "./spans";

export interface PostprocessOptions {
  separator?: string;
  endOfSentence?: string;
}

/**
 * Turn a decoded hypothesis into display text: drop the end-of-sentence
 * token, join subwords, and move the constraint spans along with the text.
 */
export function postprocessHypothesis(
  tokens: readonly string[],
  tags: readonly ConstraintTag[],
  {
    separator = DEFAULT_SEPARATOR,
    endOfSentence = END_OF_SENTENCE,
  }: PostprocessOptions = {},
): AnnotatedText {
  if (tokens.length !== tags.length) {
    throw new LengthMismatchError(tokens.length, tags.length);
  }

  const length =
    tokens[tokens.length - 1] === endOfSentence
      ? tokens.length - 1
      : tokens.length;

  const segmented = tokenAnnotationsToSpans(
    tokens.slice(0, length),
    tags.slice(0, length),
  );
  const text = joinSubwords(segmented.text, separator);

  return {
    text,
    spans: remapConstraintIndices(segmented.text, text, segmented.spans),
  };
}
