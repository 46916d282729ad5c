import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { CONNECTIONS_TABLE, TABLES, type OutputSink } from "./sink.js";
import type { CrawlEntity, EntityKind } from "./types.js";

export interface CsvSinkOptions {
  dir: string;
}

type CsvRow = Record<string, unknown>;

const BOM = "\ufeff";
const LIST_SEPARATOR = ";";

/**
 * Flat-file sink: one CSV file per table, appended to across runs. Keys that
 * are already on disk are loaded when the sink opens so a resumed run never
 * writes the same row twice.
 */
export class CsvSink implements OutputSink {
  private readonly dir: string;
  private readonly seen = new Map<string, Set<string>>();
  private readonly headers = new Map<string, string[]>();

  constructor(options: CsvSinkOptions) {
    this.dir = options.dir;
    fs.mkdirSync(this.dir, { recursive: true });
    for (const table of [...Object.values(TABLES), CONNECTIONS_TABLE]) {
      this.loadExisting(table);
    }
  }

  async saveBatch(kind: EntityKind, records: CrawlEntity[]): Promise<void> {
    this.append(TABLES[kind], records, (row) => String(row.id));
  }

  async saveConnections(parentId: string, childIds: string[], collection: string): Promise<void> {
    const rows: CsvRow[] = childIds.map((id) => ({ id, parent_id: parentId, collection }));
    this.append(CONNECTIONS_TABLE, rows, (row) =>
      connectionKey(String(row.id), String(row.parent_id), String(row.collection))
    );
  }

  async close(): Promise<void> {
    this.seen.clear();
    this.headers.clear();
  }

  filePath(table: string): string {
    return path.join(this.dir, `${table}.csv`);
  }

  private append(table: string, rows: CsvRow[], keyOf: (row: CsvRow) => string) {
    const seen = this.seenFor(table);
    const fresh: CsvRow[] = [];
    const batchKeys = new Set<string>();
    for (const row of rows) {
      const key = keyOf(row);
      if (seen.has(key) || batchKeys.has(key)) continue;
      batchKeys.add(key);
      fresh.push(row);
    }
    if (fresh.length === 0) return;

    let text = "";
    let header = this.headers.get(table);
    if (!header) {
      header = collectColumns(fresh);
      this.headers.set(table, header);
      text += BOM + stringify([header], { quoted: true });
    }
    const columns = header;
    text += stringify(
      fresh.map((row) => columns.map((column) => formatCell(row[column]))),
      { quoted: true }
    );
    fs.appendFileSync(this.filePath(table), text, "utf8");

    for (const key of batchKeys) {
      seen.add(key);
    }
  }

  private seenFor(table: string): Set<string> {
    let seen = this.seen.get(table);
    if (!seen) {
      seen = new Set<string>();
      this.seen.set(table, seen);
    }
    return seen;
  }

  private loadExisting(table: string) {
    const file = this.filePath(table);
    if (!fs.existsSync(file)) return;
    const parsed: unknown = parse(fs.readFileSync(file, "utf8"), {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true
    });
    if (!Array.isArray(parsed) || parsed.length === 0) return;

    const [headerRow, ...dataRows] = parsed.map(toStringRow);
    this.headers.set(table, headerRow);
    const seen = this.seenFor(table);
    const idIndex = headerRow.indexOf("id");
    const parentIndex = headerRow.indexOf("parent_id");
    const collectionIndex = headerRow.indexOf("collection");
    if (idIndex < 0) return;

    for (const row of dataRows) {
      if (table === CONNECTIONS_TABLE) {
        seen.add(connectionKey(row[idIndex], row[parentIndex] ?? "", row[collectionIndex] ?? ""));
      } else {
        seen.add(row[idIndex]);
      }
    }
  }
}

function connectionKey(id: string, parentId: string, collection: string): string {
  return `${id}\u0000${parentId}\u0000${collection}`;
}

function collectColumns(rows: CsvRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      columns.add(key);
    }
  }
  return Array.from(columns).sort();
}

function toStringRow(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map((cell) => (typeof cell === "string" ? cell : String(cell)));
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) {
    return value.map((entry) => formatCell(entry)).join(LIST_SEPARATOR);
  }
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}
