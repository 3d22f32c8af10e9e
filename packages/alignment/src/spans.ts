import type { AnnotatedText, ConstraintTag, Span } from "./domain";
import { LengthMismatchError } from "./errors";

/**
 * Join tokens with single spaces and report which character ranges of the
 * result were produced by constrained tokens.
 */
export function tokenAnnotationsToSpans(
  tokens: readonly string[],
  tags: readonly ConstraintTag[],
): AnnotatedText {
  if (tokens.length !== tags.length) {
    throw new LengthMismatchError(tokens.length, tags.length);
  }

  const spans: Span[] = [];
  let text = "";
  let openTag: string | number | null = null;
  let openStart = 0;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const tag = tags[i] ?? null;

    if (openTag !== null && tag !== openTag) {
      spans.push([openStart, text.length]);
      openTag = null;
    }

    if (tag !== null && tag !== openTag) {
      // the joining space is not part of the span
      openStart = text.length > 0 ? text.length + 1 : 0;
      openTag = tag;
    }

    text = text.length > 0 ? `${text} ${token}` : token;
  }

  if (openTag !== null) spans.push([openStart, text.length]);

  return { text, spans };
}
