import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { CONNECTIONS_TABLE, TABLES, type OutputSink } from "./sink.js";
import type { CrawlEntity, EntityKind, StoredTaskStatus, TaskStatus } from "./types.js";

export interface TaskStoreOptions {
  dbPath: string;
  restart: boolean;
}

export interface SqliteSinkOptions {
  dbPath: string;
}

export type TaskCounts = Record<StoredTaskStatus, number>;

const IN_MEMORY = ":memory:";

const taskSchemaSql = fs.readFileSync(new URL("../schema.sql", import.meta.url), "utf8");
const outputSchemaSql = fs.readFileSync(new URL("../output-schema.sql", import.meta.url), "utf8");

const STORED_STATUSES = new Set<string>(["created", "collecting", "finished"]);

function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  return db;
}

function removeDatabaseFiles(dbPath: string) {
  if (dbPath === IN_MEMORY) return;
  for (const file of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
    if (fs.existsSync(file)) {
      fs.unlinkSync(file);
    }
  }
}

function isStoredStatus(value: unknown): value is StoredTaskStatus {
  return typeof value === "string" && STORED_STATUSES.has(value);
}

/**
 * Durable item id -> status ledger that makes a crawl resumable. Each
 * `setStatus` is one autocommitted upsert, so a killed process leaves either
 * the old or the new row behind.
 */
export class TaskStore {
  private db: Database.Database;
  private selectStmt: Database.Statement<[string]>;
  private upsertStmt: Database.Statement<[string, string, number]>;

  constructor(options: TaskStoreOptions) {
    if (options.restart) {
      removeDatabaseFiles(options.dbPath);
    }
    this.db = openDatabase(options.dbPath);
    this.db.exec(taskSchemaSql);
    this.selectStmt = this.db.prepare<[string]>("SELECT status FROM tasks WHERE item_id = ?");
    this.upsertStmt = this.db.prepare<[string, string, number]>(
      `INSERT INTO tasks (item_id, status, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(item_id) DO UPDATE SET status = excluded.status, updated_at = excluded.updated_at`
    );
  }

  close() {
    this.db.close();
  }

  getStatus(itemId: string): TaskStatus {
    const row: unknown = this.selectStmt.get(itemId);
    if (!row || typeof row !== "object" || !("status" in row)) return "absent";
    return isStoredStatus(row.status) ? row.status : "absent";
  }

  setStatus(itemId: string, status: StoredTaskStatus) {
    this.upsertStmt.run(itemId, status, Date.now());
  }

  countByStatus(): TaskCounts {
    const counts: TaskCounts = { created: 0, collecting: 0, finished: 0 };
    const rows: unknown[] = this.db
      .prepare("SELECT status, COUNT(*) AS total FROM tasks GROUP BY status")
      .all();
    for (const row of rows) {
      if (!row || typeof row !== "object" || !("status" in row) || !("total" in row)) continue;
      if (isStoredStatus(row.status) && typeof row.total === "number") {
        counts[row.status] = row.total;
      }
    }
    return counts;
  }
}

/**
 * Relational output sink. Entities keep their raw payload as JSON; the
 * primary keys make repeated saves upserts instead of duplicates.
 */
export class SqliteSink implements OutputSink {
  private db: Database.Database;
  private connectionStmt: Database.Statement<[string, string, string]>;
  private entityStmts = new Map<EntityKind, Database.Statement<[string, string | null, string | null, string, number]>>();

  constructor(options: SqliteSinkOptions) {
    this.db = openDatabase(options.dbPath);
    this.db.exec(outputSchemaSql);
    this.connectionStmt = this.db.prepare<[string, string, string]>(
      `INSERT OR IGNORE INTO ${CONNECTIONS_TABLE} (id, parent_id, collection) VALUES (?, ?, ?)`
    );
  }

  async saveBatch(kind: EntityKind, records: CrawlEntity[]): Promise<void> {
    if (records.length === 0) return;
    const stmt = this.entityStatement(kind);
    const savedAt = Date.now();
    const transaction = this.db.transaction((items: CrawlEntity[]) => {
      for (const item of items) {
        stmt.run(
          item.id,
          item.owner_id === null || item.owner_id === undefined ? null : String(item.owner_id),
          item.group_id === null || item.group_id === undefined ? null : String(item.group_id),
          JSON.stringify(item),
          savedAt
        );
      }
    });
    transaction(records);
  }

  async saveConnections(parentId: string, childIds: string[], collection: string): Promise<void> {
    if (childIds.length === 0) return;
    const transaction = this.db.transaction((ids: string[]) => {
      for (const id of ids) {
        this.connectionStmt.run(id, parentId, collection);
      }
    });
    transaction(childIds);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  countRows(table: string): number {
    const row: unknown = this.db.prepare(`SELECT COUNT(*) AS total FROM ${table}`).get();
    if (!row || typeof row !== "object" || !("total" in row)) return 0;
    return typeof row.total === "number" ? row.total : 0;
  }

  private entityStatement(kind: EntityKind) {
    const cached = this.entityStmts.get(kind);
    if (cached) return cached;
    const table = TABLES[kind];
    const stmt = this.db.prepare<[string, string | null, string | null, string, number]>(
      `INSERT INTO ${table} (id, owner_id, group_id, payload, saved_at) VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         owner_id = COALESCE(excluded.owner_id, ${table}.owner_id),
         group_id = COALESCE(excluded.group_id, ${table}.group_id),
         payload = excluded.payload,
         saved_at = excluded.saved_at`
    );
    this.entityStmts.set(kind, stmt);
    return stmt;
  }
}
