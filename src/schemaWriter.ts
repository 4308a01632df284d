import { FieldValue, KeyField, StoreRecord } from "./shared/types";

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Header for a heterogeneous record set: the key column, then the sorted
 * union of every other key seen on any record.
 */
export function computeColumns(records: StoreRecord[], keyField: KeyField): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (key !== keyField) keys.add(key);
    }
  }
  return [keyField, ...Array.from(keys).sort()];
}

/**
 * Render one value as a CSV cell. Missing values become empty cells,
 * never the text "null" or "undefined".
 */
export function formatCell(value: FieldValue): string {
  let text: string;
  if (value === undefined || value === null) {
    text = "";
  } else if (typeof value === "number") {
    text = Number.isFinite(value) ? String(value) : "";
  } else if (typeof value === "boolean") {
    text = value ? "true" : "false";
  } else {
    text = value;
  }

  if (NEEDS_QUOTING.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Serialize the full table. The store is always rewritten whole because
 * any previously written row may have changed.
 */
export function serializeTable(records: StoreRecord[], keyField: KeyField): string {
  const columns = computeColumns(records, keyField);
  const lines = [columns.map(formatCell).join(",")];

  for (const record of records) {
    lines.push(columns.map((column) => formatCell(record[column])).join(","));
  }

  return `${lines.join("\n")}\n`;
}
