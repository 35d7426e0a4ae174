import { mkdir } from "node:fs/promises";
import path from "node:path";
import sqlite3 from "sqlite3";
import type { Database as SqliteDatabase, RunResult } from "sqlite3";
import { DatabaseError } from "./errors.js";
import { SCHEMA_STATEMENTS } from "./schema.js";

export type SqlValue = string | number | null;

export type RunInfo = {
  changes: number;
  lastID: number;
};

/**
 * Promise wrapper over a single sqlite3 connection. Every driver error is
 * surfaced as a DatabaseError carrying the failing statement.
 */
export class Db {
  private txDepth = 0;
  private idleWaiters: Array<() => void> = [];

  private constructor(private readonly raw: SqliteDatabase) {}

  static async open(filename: string): Promise<Db> {
    if (filename !== ":memory:") await mkdir(path.dirname(filename), { recursive: true });
    const raw = await new Promise<SqliteDatabase>((resolve, reject) => {
      const mode = sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE;
      const handle: SqliteDatabase = new sqlite3.Database(filename, mode, (err) => {
        if (err) reject(new DatabaseError(`open ${filename}`, err));
        else resolve(handle);
      });
    });
    const db = new Db(raw);
    await db.exec("PRAGMA foreign_keys = ON");
    await db.applySchema();
    return db;
  }

  private async applySchema(): Promise<void> {
    for (const sql of SCHEMA_STATEMENTS) await this.exec(sql);
  }

  exec(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.raw.exec(sql, (err) => (err ? reject(new DatabaseError(sql, err)) : resolve()));
    });
  }

  run(sql: string, params: SqlValue[] = []): Promise<RunInfo> {
    return new Promise((resolve, reject) => {
      this.raw.run(sql, params, function (this: RunResult, err: Error | null) {
        if (err) reject(new DatabaseError(sql, err));
        else resolve({ changes: this.changes, lastID: this.lastID });
      });
    });
  }

  get<T>(sql: string, params: SqlValue[] = []): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.raw.get(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) reject(new DatabaseError(sql, err));
        else resolve(row);
      });
    });
  }

  all<T>(sql: string, params: SqlValue[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.raw.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) reject(new DatabaseError(sql, err));
        else resolve(rows ?? []);
      });
    });
  }

  get inTransaction(): boolean {
    return this.txDepth > 0;
  }

  /** Resolves once no transaction is open on this connection. */
  whenIdle(): Promise<void> {
    if (!this.inTransaction) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private leaveTransaction(): void {
    this.txDepth--;
    if (this.txDepth > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  /**
   * Runs `fn` inside an exclusive write transaction (`BEGIN IMMEDIATE`), so no
   * other connection can write until it commits. Rolls back when `fn` throws.
   */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.inTransaction) throw new DatabaseError("BEGIN IMMEDIATE", new Error("transaction already open"));
    // Counted before BEGIN is issued so no caller sees the connection as idle meanwhile.
    this.txDepth++;
    try {
      await this.exec("BEGIN IMMEDIATE");
    } catch (e) {
      this.leaveTransaction();
      throw e;
    }
    try {
      const result = await fn();
      await this.exec("COMMIT");
      return result;
    } catch (e) {
      await this.exec("ROLLBACK").catch((rollbackErr: unknown) => {
        console.error("[db] rollback failed", rollbackErr);
      });
      throw e;
    } finally {
      this.leaveTransaction();
    }
  }

  /** Nested unit of work; on failure only this savepoint's writes are undone. */
  async savepoint<T>(name: string, fn: () => Promise<T>): Promise<T> {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
      throw new DatabaseError(`SAVEPOINT ${name}`, new Error("invalid savepoint name"));
    }
    await this.exec(`SAVEPOINT ${name}`);
    try {
      const result = await fn();
      await this.exec(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (e) {
      await this.exec(`ROLLBACK TO SAVEPOINT ${name}`);
      await this.exec(`RELEASE SAVEPOINT ${name}`);
      throw e;
    }
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.raw.close((err) => (err ? reject(new DatabaseError("close", err)) : resolve()));
    });
  }
}
