/**
 * Tabular results.
 *
 * Every retrieval produces a table: an ordered column list, rows keyed by
 * column name, and a bag of named string attributes describing where the
 * rows came from. `null` is the missing marker for both cells and
 * attributes.
 */

/** A single cell value */
export type Cell = string | number | Date | null;

/** A row keyed by column name; an absent key reads as missing */
export type Row = { [column: string]: Cell | undefined };

/** Named string attributes carried alongside a table's rows */
export type TableAttributes = { [name: string]: string | null | undefined };

export interface Table<R extends Row = Row> {
  /** Column names, in display order */
  columns: string[];
  rows: R[];
  attributes: TableAttributes;
}
