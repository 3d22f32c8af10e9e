/**
 * A merge rule is an ordered pair of symbols that may be fused into one.
 */
export type MergeRule = readonly [first: string, second: string];

export interface IMergeTable extends Iterable<[string, string, number]> {
  /**
   * Priority of the pair, lower merges first
   * @returns undefined when the pair is not a rule
   */
  rank(first: string, second: string): number | undefined;

  has(first: string, second: string): boolean;

  /** Number of distinct rules */
  readonly size: number;

  /** Declarations dropped because an earlier line already declared the pair */
  readonly duplicates: number;
}

export const isIMergeTable = (obj: unknown): obj is IMergeTable => {
  if (typeof obj !== "object" || obj === null) return false;
  const table = obj as IMergeTable;
  return (
    typeof table.rank === "function" &&
    typeof table.has === "function" &&
    typeof table.size === "number"
  );
};
