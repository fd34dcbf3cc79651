import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DiscoveredTariff, DownloadResult, FailedItem, TariffId } from "../types";
import { HarvestStore, RunStatus, StoreStats } from "./types";

type FailedRow = {
  tariffId: string;
  attemptCount: number;
  error: string | null;
};

export class SqliteStore implements HarvestStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, command: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, command, startedAt, finishedAt, status)
        VALUES (@runId, @command, @startedAt, NULL, 'running')
        ON CONFLICT(runId) DO UPDATE SET
          command = excluded.command,
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({
        runId,
        command,
        startedAt,
      });
  }

  async finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
      });
  }

  async upsertDiscovered(items: DiscoveredTariff[], runId: string): Promise<void> {
    const statement = this.db.prepare(`
      INSERT INTO tariffs (
        tariffId, page, displayFields, firstSeenAt, lastSeenAt, lastRunId, lastStatus, updatedAt
      )
      VALUES (
        @tariffId, @page, @displayFields, @seenAt, @seenAt, @runId, 'discovered', @seenAt
      )
      ON CONFLICT(tariffId) DO UPDATE SET
        page = excluded.page,
        displayFields = excluded.displayFields,
        lastSeenAt = excluded.lastSeenAt,
        lastRunId = excluded.lastRunId,
        updatedAt = excluded.updatedAt
    `);

    const insertAll = this.db.transaction((batch: DiscoveredTariff[]) => {
      for (const item of batch) {
        statement.run({
          tariffId: item.tariffId,
          page: item.page,
          displayFields: JSON.stringify(item.displayFields),
          seenAt: item.discoveredAt,
          runId,
        });
      }
    });
    insertAll(items);
  }

  async listDiscovered(): Promise<TariffId[]> {
    const rows = this.db.prepare(`SELECT tariffId FROM tariffs ORDER BY seq ASC`).all() as Array<{ tariffId: string }>;
    return rows.map((row) => row.tariffId);
  }

  async markDownloadResult(result: DownloadResult, runId: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO tariffs (
          tariffId, page, displayFields, firstSeenAt, lastSeenAt, lastRunId, lastStatus,
          attemptCount, savedPath, error, errorKind, updatedAt
        )
        VALUES (
          @tariffId, NULL, '{}', @finishedAt, @finishedAt, @runId, @status,
          @attemptCount, @savedPath, @error, @errorKind, @finishedAt
        )
        ON CONFLICT(tariffId) DO UPDATE SET
          lastRunId = excluded.lastRunId,
          lastStatus = excluded.lastStatus,
          attemptCount = excluded.attemptCount,
          savedPath = excluded.savedPath,
          error = excluded.error,
          errorKind = excluded.errorKind,
          updatedAt = excluded.updatedAt
      `,
      )
      .run({
        tariffId: result.tariffId,
        runId,
        status: result.status,
        attemptCount: result.attemptCount,
        savedPath: result.savedPath ?? null,
        error: result.error ?? null,
        errorKind: result.errorKind ?? null,
        finishedAt: result.finishedAt,
      });
  }

  async listFailed(): Promise<FailedItem[]> {
    const rows = this.db
      .prepare(
        `
        SELECT tariffId, attemptCount, error
        FROM tariffs
        WHERE lastStatus = 'failed'
        ORDER BY seq ASC
      `,
      )
      .all() as FailedRow[];

    return rows.map((row) => ({
      tariffId: row.tariffId,
      attemptCount: row.attemptCount,
      error: row.error ?? "unknown error",
    }));
  }

  async getStats(): Promise<StoreStats> {
    const runs = this.db.prepare(`SELECT COUNT(*) as count FROM runs`).get() as { count: number };
    return {
      totalTariffs: this.countWhere("1 = 1"),
      discovered: this.countWhere("lastStatus = 'discovered'"),
      downloaded: this.countWhere("lastStatus = 'success'"),
      skipped: this.countWhere("lastStatus = 'skipped'"),
      failed: this.countWhere("lastStatus = 'failed'"),
      runs: runs.count,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private countWhere(whereClause: string): number {
    const row = this.db.prepare(`SELECT COUNT(*) as count FROM tariffs WHERE ${whereClause}`).get() as { count: number };
    return row.count;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tariffs (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        tariffId TEXT NOT NULL UNIQUE,
        page INTEGER NULL,
        displayFields TEXT NOT NULL DEFAULT '{}',
        firstSeenAt TEXT NOT NULL,
        lastSeenAt TEXT NOT NULL,
        lastRunId TEXT NOT NULL,
        lastStatus TEXT NOT NULL,
        attemptCount INTEGER NOT NULL DEFAULT 0,
        savedPath TEXT NULL,
        error TEXT NULL,
        errorKind TEXT NULL,
        updatedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        command TEXT NOT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tariffs_status ON tariffs(lastStatus);
    `);
  }
}
