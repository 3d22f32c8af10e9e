import type { Span } from "./domain";
import {
  AlignmentOverrunError,
  InvalidSpanError,
  OrphanSpanEndError,
} from "./errors";

/**
 * Carry constraint spans from a tokenized string to its post-processed form.
 *
 * `detokenized` must be `tokenized` with characters removed (separators,
 * spaces around them) and none substituted. Walking the shorter string, the
 * tokenized cursor skips every character missing from it; each skip grows the
 * offset subtracted from the boundaries found at later positions.
 *
 * Within one call no two spans may share a start, and no two an end. Every
 * span must be non-empty and lie inside `tokenized`. The result keeps the
 * order of `spans`.
 */
export function remapConstraintIndices(
  tokenized: string,
  detokenized: string,
  spans: readonly Span[],
): Span[] {
  for (const span of spans) {
    const [start, end] = span;
    if (!(start >= 0 && start < end && end <= tokenized.length)) {
      throw new InvalidSpanError(span, tokenized.length);
    }
  }

  // start position -> index of its span in the input
  const starts = new Map(
    spans.map(([start], index): [number, number] => [start, index]),
  );
  const ends = new Set(spans.map(([, end]) => end));

  const remapped = new Array<Span | undefined>(spans.length);
  let cursor = 0;
  let offset = 0;
  const state: { pending: { start: number; index: number } | null } = {
    pending: null,
  };

  // An end is closed before a start opens so that [a, b) and [b, c) both survive
  const visit = () => {
    if (ends.has(cursor)) {
      const { pending } = state;
      if (pending === null) throw new OrphanSpanEndError(cursor);
      remapped[pending.index] = [pending.start, cursor - offset];
      state.pending = null;
    }
    const index = starts.get(cursor);
    if (index !== undefined) state.pending = { start: cursor - offset, index };
  };

  for (let i = 0; i < detokenized.length; i++) {
    visit();

    while (detokenized[i] !== tokenized[cursor]) {
      cursor++;
      offset++;
      if (cursor >= tokenized.length) {
        throw new AlignmentOverrunError(tokenized, detokenized, i);
      }
      visit();
    }

    cursor++;
  }

  if (state.pending !== null) {
    remapped[state.pending.index] = [state.pending.start, cursor - offset];
  }

  return remapped.filter((span): span is Span => span !== undefined);
}

/**
 * Position in `tokenized` of every character of `detokenized`, under the same
 * removal-only assumption as {@link remapConstraintIndices}.
 */
export function alignCharacters(
  tokenized: string,
  detokenized: string,
): number[] {
  const positions: number[] = [];
  let cursor = 0;

  for (let i = 0; i < detokenized.length; i++) {
    while (detokenized[i] !== tokenized[cursor]) {
      cursor++;
      if (cursor >= tokenized.length) {
        throw new AlignmentOverrunError(tokenized, detokenized, i);
      }
    }
    positions.push(cursor);
    cursor++;
  }

  return positions;
}

/**
 * Inverse of {@link remapConstraintIndices}: map spans over `detokenized`
 * back onto `tokenized`.
 */
export function expandConstraintIndices(
  tokenized: string,
  detokenized: string,
  spans: readonly Span[],
): Span[] {
  const positions = alignCharacters(tokenized, detokenized);
  const at = (index: number) => positions[index] ?? tokenized.length;

  return spans.map(([start, end]): Span =>
    end > start ? [at(start), at(end - 1) + 1] : [at(start), at(start)],
  );
}
