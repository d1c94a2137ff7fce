import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { AuditEntry, AuditRecord, DecisionAction } from "./types";

export interface AuditSink {
  /** Returns false when the record duplicated the fingerprint's latest entry. */
  append(fingerprint: string, record: AuditRecord): boolean;
}

interface AuditRow {
  fingerprint: string;
  timestamp: number;
  ip: string | null;
  user_agent: string;
  http_version: string;
  action: DecisionAction;
}

export class AuditDb implements AuditSink {
  private readonly db: Database.Database;

  constructor(path: string) {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_entries (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        fingerprint TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        ip TEXT,
        user_agent TEXT NOT NULL,
        http_version TEXT NOT NULL,
        action TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_audit_entries_fingerprint ON audit_entries(fingerprint, id);
      CREATE INDEX IF NOT EXISTS idx_audit_entries_timestamp ON audit_entries(timestamp);
    `);
  }

  append(fingerprint: string, record: AuditRecord): boolean {
    const insert = this.db.transaction((): boolean => {
      const latest = this.db
        .prepare(
          `SELECT fingerprint, timestamp, ip, user_agent, http_version, action
           FROM audit_entries WHERE fingerprint = ? ORDER BY id DESC LIMIT 1`,
        )
        .get(fingerprint) as AuditRow | undefined;

      if (latest && isSameRecord(latest, record)) {
        return false;
      }

      this.db
        .prepare(
          `INSERT INTO audit_entries (fingerprint, timestamp, ip, user_agent, http_version, action)
           VALUES (?, ?, ?, ?, ?, ?)`,
        )
        .run(fingerprint, record.timestamp, record.ip, record.userAgent, record.httpVersion, record.action);

      return true;
    });

    return insert();
  }

  listByFingerprint(fingerprint: string, limit = 100): AuditEntry[] {
    const rows = this.db
      .prepare(
        `SELECT fingerprint, timestamp, ip, user_agent, http_version, action
         FROM audit_entries WHERE fingerprint = ? ORDER BY id ASC LIMIT ?`,
      )
      .all(fingerprint, limit) as AuditRow[];

    return rows.map(toEntry);
  }

  purgeExpiredData(retentionDays: number, nowSeconds = Math.floor(Date.now() / 1000)): number {
    const cutoff = nowSeconds - retentionDays * 24 * 60 * 60;
    const result = this.db.prepare(`DELETE FROM audit_entries WHERE timestamp < ?`).run(cutoff);
    return result.changes;
  }

  isHealthy(): boolean {
    try {
      this.db.prepare("SELECT 1").get();
      return true;
    } catch {
      return false;
    }
  }

  close(): void {
    this.db.close();
  }
}

function isSameRecord(row: AuditRow, record: AuditRecord): boolean {
  return (
    row.timestamp === record.timestamp &&
    row.ip === record.ip &&
    row.user_agent === record.userAgent &&
    row.http_version === record.httpVersion &&
    row.action === record.action
  );
}

function toEntry(row: AuditRow): AuditEntry {
  return {
    fingerprint: row.fingerprint,
    timestamp: row.timestamp,
    ip: row.ip,
    userAgent: row.user_agent,
    httpVersion: row.http_version,
    action: row.action,
  };
}
