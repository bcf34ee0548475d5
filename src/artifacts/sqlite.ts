import Database, {
  type Database as DatabaseType,
  type Statement,
} from "better-sqlite3";
import { z } from "zod";
import { VisibilitySchema } from "../schemas/visibility.js";
import { ArtifactError } from "./errors.js";
import { normalizeTag } from "./normalize.js";
import type { BlackboardStore } from "./store.js";
import {
  type Artifact,
  type GetByTypeOpts,
  type ListOpts,
  MAX_PAYLOAD_CHARS,
} from "./types.js";

interface SqliteBlackboardStoreOptions {
  dbPath: string; // ":memory:" for tests, file path for production
  now?: () => number;
}

const ArtifactRowSchema = z.object({
  seq: z.number().int(),
  id: z.string(),
  type: z.string(),
  payload_json: z.string(),
  produced_by: z.string(),
  correlation_id: z.string().nullable(),
  tags_json: z.string(),
  visibility_json: z.string(),
  created_at: z.number(),
  expires_at: z.number().nullable(),
});

const TagsSchema = z.array(z.string());

/**
 * SQLite implementation of BlackboardStore.
 * WAL mode; `seq` preserves publish order independent of id.
 */
export class SqliteBlackboardStore implements BlackboardStore {
  private db: DatabaseType;
  private readonly now: () => number;
  private stmts: {
    fetchById: Statement;
    insertArtifact: Statement;
    deleteExpired: Statement;
  };

  constructor(opts: SqliteBlackboardStoreOptions) {
    this.db = new Database(opts.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 3000");
    this.now = opts.now ?? (() => Date.now());
    this.initSchema();
    this.stmts = this.prepareStatements();
  }

  close(): void {
    this.db.close();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS artifacts (
        seq             INTEGER PRIMARY KEY AUTOINCREMENT,
        id              TEXT NOT NULL UNIQUE,

        -- Content
        type            TEXT NOT NULL,
        payload_json    TEXT NOT NULL,

        -- Provenance
        produced_by     TEXT NOT NULL,
        correlation_id  TEXT,
        tags_json       TEXT NOT NULL DEFAULT '[]',
        visibility_json TEXT NOT NULL,

        -- Lifecycle
        created_at      INTEGER NOT NULL,
        expires_at      INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_artifacts_type ON artifacts(type, seq);
      CREATE INDEX IF NOT EXISTS idx_artifacts_correlation ON artifacts(correlation_id) WHERE correlation_id IS NOT NULL;
      CREATE INDEX IF NOT EXISTS idx_artifacts_expires ON artifacts(expires_at) WHERE expires_at IS NOT NULL;
    `);
  }

  private prepareStatements() {
    return {
      fetchById: this.db.prepare(`
        SELECT * FROM artifacts WHERE id = ?
      `),
      insertArtifact: this.db.prepare(`
        INSERT INTO artifacts (
          id, type, payload_json, produced_by, correlation_id,
          tags_json, visibility_json, created_at, expires_at
        ) VALUES (
          @id, @type, @payload_json, @produced_by, @correlation_id,
          @tags_json, @visibility_json, @created_at, @expires_at
        )
      `),
      deleteExpired: this.db.prepare(`
        DELETE FROM artifacts WHERE expires_at IS NOT NULL AND expires_at <= ?
      `),
    };
  }

  /** Convert SQL null to undefined for optional fields */
  private nullToUndefined<T>(value: T | null): T | undefined {
    return value === null ? undefined : value;
  }

  private rowToArtifact(raw: unknown): Artifact {
    const row = ArtifactRowSchema.parse(raw);
    return {
      id: row.id,
      type: row.type,
      payload: JSON.parse(row.payload_json),
      produced_by: row.produced_by,
      correlation_id: this.nullToUndefined(row.correlation_id),
      tags: TagsSchema.parse(JSON.parse(row.tags_json)),
      visibility: VisibilitySchema.parse(JSON.parse(row.visibility_json)),
      created_at: row.created_at,
      expires_at: this.nullToUndefined(row.expires_at),
    };
  }

  private duplicateId(id: string): ArtifactError {
    return new ArtifactError("DUPLICATE_ID", `Artifact "${id}" already exists`, {
      artifact_id: id,
    });
  }

  private toRow(artifact: Artifact) {
    const payloadJson = JSON.stringify(artifact.payload);
    if (payloadJson.length > MAX_PAYLOAD_CHARS) {
      throw new ArtifactError(
        "DATA_TOO_LARGE",
        `payload exceeds ${MAX_PAYLOAD_CHARS} chars`,
        { type: artifact.type },
      );
    }
    return {
      id: artifact.id,
      type: artifact.type,
      payload_json: payloadJson,
      produced_by: artifact.produced_by,
      correlation_id: artifact.correlation_id ?? null,
      tags_json: JSON.stringify(artifact.tags),
      visibility_json: JSON.stringify(artifact.visibility),
      created_at: artifact.created_at,
      expires_at: artifact.expires_at ?? null,
    };
  }

  async publish(artifact: Artifact): Promise<string> {
    await this.publishMany([artifact]);
    return artifact.id;
  }

  async publishMany(artifacts: readonly Artifact[]): Promise<string[]> {
    const rows = artifacts.map((artifact) => this.toRow(artifact));
    const insertAll = this.db.transaction((batch: typeof rows) => {
      for (const row of batch) {
        if (this.stmts.fetchById.get(row.id) !== undefined) {
          throw this.duplicateId(row.id);
        }
        try {
          this.stmts.insertArtifact.run(row);
        } catch (err) {
          // Another connection inserted the same id between the check and the insert
          if (err instanceof Error && err.message.includes("UNIQUE constraint failed")) {
            throw this.duplicateId(row.id);
          }
          throw err;
        }
      }
    });
    // Rolled back as a whole if any insert throws
    insertAll(rows);
    return rows.map((row) => row.id);
  }

  async get(id: string): Promise<Artifact | null> {
    const row = this.stmts.fetchById.get(id);
    return row === undefined ? null : this.rowToArtifact(row);
  }

  async getByType(type: string, opts: GetByTypeOpts = {}): Promise<Artifact[]> {
    return this.list({
      type,
      correlation_id: opts.correlation_id,
      include_expired: opts.include_expired,
    });
  }

  async list(opts: ListOpts = {}): Promise<Artifact[]> {
    const offset = opts.offset ?? 0;
    if (offset < 0 || (opts.limit !== undefined && opts.limit < 0)) {
      throw new ArtifactError(
        "INVALID_REQUEST",
        "limit and offset must be non-negative",
      );
    }

    // Build WHERE clause dynamically
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (!opts.include_expired) {
      conditions.push("(expires_at IS NULL OR expires_at > ?)");
      params.push(this.now());
    }

    if (opts.type !== undefined) {
      conditions.push("type = ?");
      params.push(opts.type);
    }

    if (opts.produced_by !== undefined) {
      conditions.push("produced_by = ?");
      params.push(opts.produced_by);
    }

    if (opts.correlation_id !== undefined) {
      conditions.push("correlation_id = ?");
      params.push(opts.correlation_id);
    }

    if (opts.tag !== undefined) {
      conditions.push(
        "EXISTS (SELECT 1 FROM json_each(artifacts.tags_json) WHERE json_each.value = ?)",
      );
      params.push(normalizeTag(opts.tag));
    }

    const whereClause =
      conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

    // LIMIT -1 is unbounded in SQLite
    const sql = `
      SELECT * FROM artifacts
      ${whereClause}
      ORDER BY seq ASC
      LIMIT ? OFFSET ?
    `;
    params.push(opts.limit ?? -1, offset);

    return this.db
      .prepare(sql)
      .all(...params)
      .map((row) => this.rowToArtifact(row));
  }

  async purgeExpired(now: number = this.now()): Promise<number> {
    return this.stmts.deleteExpired.run(now).changes;
  }
}
