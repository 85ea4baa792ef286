/**
 * Table operations.
 *
 * `bindRows` is the row-union primitive used to merge per-site results. It
 * keeps columns and rows only: attributes on its inputs are discarded. Any
 * attribute that must survive a merge is taken off the table first with
 * `saveAttributes`/`stripAttributes` and carried alongside.
 */

import type { Cell, Row, Table, TableAttributes } from "@gwsos/types";

export function emptyTable<R extends Row>(columns: readonly string[] = []): Table<R> {
  return { columns: [...columns], rows: [], attributes: {} };
}

/** Attribute values taken off a table; null marks a missing attribute */
export type SavedAttributes = { [name: string]: string | null };

/**
 * Read the named attributes off a table. Missing attributes read as null;
 * keys follow the order of `names`.
 */
export function saveAttributes(names: readonly string[], table: Table<Row>): SavedAttributes {
  const saved: SavedAttributes = {};
  for (const name of names) {
    saved[name] = table.attributes[name] ?? null;
  }
  return saved;
}

/** Copy of the table without the named attributes */
export function stripAttributes<T extends Table<Row>>(names: readonly string[], table: T): T {
  const attributes: TableAttributes = {};
  for (const [name, value] of Object.entries(table.attributes)) {
    if (!names.includes(name)) attributes[name] = value;
  }
  return { ...table, attributes };
}

/** Copy of the table with the given attribute values set */
export function withAttributes<T extends Table<Row>>(table: T, values: TableAttributes): T {
  return { ...table, attributes: { ...table.attributes, ...values } };
}

function nulls(columns: readonly string[]): Row {
  const row: Row = {};
  for (const column of columns) row[column] = null;
  return row;
}

/**
 * Row-wise union of two tables.
 *
 * Columns are `a`'s followed by any new columns from `b`; cells missing
 * from either side are filled with null. The result has no attributes.
 */
export function bindRows<R extends Row>(a: Table<R>, b: Table<R>): Table<R> {
  const columns = [...a.columns];
  for (const column of b.columns) {
    if (!columns.includes(column)) columns.push(column);
  }

  const blank = nulls(columns);
  const rows = [...a.rows, ...b.rows].map((row) => Object.assign({}, blank, row));
  return { columns, rows, attributes: {} };
}

/** Add a constant-valued column as the new leftmost column */
export function prependColumn<R extends Row>(table: Table<R>, name: string, value: Cell): Table<R> {
  return {
    columns: [name, ...table.columns.filter((column) => column !== name)],
    rows: table.rows.map((row) => Object.assign({ [name]: value }, row, { [name]: value })),
    attributes: { ...table.attributes },
  };
}

/** Move an existing column to the front; no-op when the column is absent */
export function relocateColumnFirst<R extends Row>(table: Table<R>, name: string): Table<R> {
  if (!table.columns.includes(name)) return table;
  return {
    ...table,
    columns: [name, ...table.columns.filter((column) => column !== name)],
    rows: table.rows.map((row) => Object.assign({ [name]: row[name] ?? null }, row)),
  };
}
