import { readFile } from "node:fs/promises";
import { createLogger } from "@lexalign/shared";
import type { IMergeTable, MergeRule } from "./merge-table.domain";
import { MalformedRuleError } from "./errors";

const logger = createLogger("merge-table");

const VERSION_HEADER = "#version";

const pairKey = (first: string, second: string) => `${first} ${second}`;

export class MergeTable implements IMergeTable {
  private readonly _ranks = new Map<string, number>();
  private readonly _rules: [string, string, number][] = [];
  private _declarations = 0;
  private _duplicates = 0;

  /**
   * Parse merge declarations, one `first second` pair per line. Rules are
   * ranked by declaration order and a repeated pair keeps its first rank.
   */
  static fromLines(lines: Iterable<string>): MergeTable {
    const table = new MergeTable();
    let lineNumber = 0;

    for (const raw of lines) {
      lineNumber++;
      const line = raw.trim();
      if (line.length === 0) continue;
      if (lineNumber === 1 && line.startsWith(VERSION_HEADER)) continue;

      const fields = line.split(/\s+/);
      if (fields.length !== 2) throw new MalformedRuleError(lineNumber, raw);

      table.add(fields[0], fields[1]);
    }

    return table;
  }

  static fromRules(rules: Iterable<MergeRule>): MergeTable {
    const table = new MergeTable();
    for (const [first, second] of rules) table.add(first, second);
    return table;
  }

  static async fromFile(path: string): Promise<MergeTable> {
    const text = await readFile(path, "utf8");
    const table = MergeTable.fromLines(text.split(/\r?\n/));
    logger.info(
      { path, rules: table.size, duplicates: table.duplicates },
      "Loaded merge table",
    );
    return table;
  }

  private add(first: string, second: string): void {
    const key = pairKey(first, second);
    const rank = this._declarations++;
    if (this._ranks.has(key)) {
      this._duplicates++;
      return;
    }
    this._ranks.set(key, rank);
    this._rules.push([first, second, rank]);
  }

  rank(first: string, second: string): number | undefined {
    return this._ranks.get(pairKey(first, second));
  }

  has(first: string, second: string): boolean {
    return this._ranks.has(pairKey(first, second));
  }

  get size(): number {
    return this._rules.length;
  }

  get duplicates(): number {
    return this._duplicates;
  }

  *[Symbol.iterator](): Iterator<[string, string, number]> {
    for (const [first, second, rank] of this._rules) {
      yield [first, second, rank];
    }
  }
}
