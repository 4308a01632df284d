import * as fs from "fs";
import * as path from "path";
import { serializeTable } from "./schemaWriter";
import { StoreError } from "./shared/errors";
import { setupLogger } from "./shared/logger";
import { KeyField, StoreRecord } from "./shared/types";

const logger = setupLogger("tabular-store");

export interface ParsedTable {
  headers: string[];
  rows: string[][];
}

/**
 * Parse CSV text with quoted fields, doubled quotes, embedded line breaks
 * and CRLF line endings. Blank lines are dropped.
 */
export function parseTable(text: string): ParsedTable {
  if (text.charCodeAt(0) === 0xfeff) text = text.slice(1);

  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let inQuotes = false;

  const endRow = () => {
    row.push(cell);
    if (row.length > 1 || row[0] !== "") rows.push(row);
    row = [];
    cell = "";
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        cell += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(cell);
      cell = "";
    } else if (char === "\n") {
      endRow();
    } else if (char === "\r") {
      if (text[i + 1] === "\n") i++;
      endRow();
    } else {
      cell += char;
    }
  }

  if (inQuotes) {
    throw new Error("Unterminated quoted field");
  }
  if (cell !== "" || row.length > 0) endRow();

  const [headers = [], ...body] = rows;
  return { headers, rows: body };
}

/**
 * CSV file holding one record per row, keyed by its first column
 */
export class TabularStore {
  private filePath: string;
  private keyField: KeyField;

  constructor(filePath: string, keyField: KeyField) {
    this.filePath = filePath;
    this.keyField = keyField;
  }

  /**
   * Read every row back as a record. Every header column is kept on every
   * record, as an empty string where the cell was blank, so the column set
   * survives a round trip.
   */
  load(): StoreRecord[] {
    if (!fs.existsSync(this.filePath)) {
      logger.info(`No existing store at ${this.filePath}, starting empty`);
      return [];
    }

    let parsed: ParsedTable;
    try {
      parsed = parseTable(fs.readFileSync(this.filePath, "utf-8"));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreError(this.filePath, `could not read store: ${message}`);
    }

    const { headers, rows } = parsed;
    if (headers.length > 0 && !headers.includes(this.keyField)) {
      throw new StoreError(this.filePath, `missing key column "${this.keyField}"`);
    }

    return rows.map((cells, index) => {
      if (cells.length > headers.length) {
        throw new StoreError(
          this.filePath,
          `row ${index + 2} has ${cells.length} cells but the header has ${headers.length}`
        );
      }
      const record: StoreRecord = {};
      headers.forEach((header, column) => {
        record[header] = cells[column] ?? "";
      });
      return record;
    });
  }

  /**
   * Rewrite the whole file. The table is written next to the target and
   * renamed over it, so a failed write leaves the previous store intact.
   */
  save(records: StoreRecord[]): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const tempPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tempPath, serializeTable(records, this.keyField), "utf-8");
    fs.renameSync(tempPath, this.filePath);
    logger.info(`Saved ${records.length} records to ${this.filePath}`);
  }
}

export default TabularStore;
