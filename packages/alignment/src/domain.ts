/**
 * Half-open `[start, end)` character range
 */
export type Span = [start: number, end: number];

/**
 * Identifier of the constraint a token belongs to. Adjacent tokens with
 * equal tags form one constraint; null or undefined means unconstrained.
 */
export type ConstraintTag = string | number | null | undefined;

export interface AnnotatedText {
  text: string;
  spans: Span[];
}
