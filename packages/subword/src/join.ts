import { DEFAULT_SEPARATOR } from "./segmenter.domain";

export const END_OF_SENTENCE = "</S>";

/**
 * Undo subword segmentation: `"fo@@ o bar"` becomes `"foo bar"`. Separators
 * followed by a space go first, then any left dangling at the end of a token.
 */
export function joinSubwords(
  text: string,
  separator: string = DEFAULT_SEPARATOR,
): string {
  return text.replaceAll(`${separator} `, "").replaceAll(separator, "");
}

export function stripEndOfSentence(text: string): string {
  if (!text.endsWith(END_OF_SENTENCE)) return text;
  return text.slice(0, -END_OF_SENTENCE.length).trimEnd();
}
