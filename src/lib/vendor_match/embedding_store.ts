import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import { createLogger, describeError, type Logger } from "@/src/lib/logging/logger";
import type { EmbeddingRecord, NearestMatch, VectorStore } from "./types";

const VECTOR_PRECISION = 8;

type EmbeddingRow = {
  id: string;
  embedding: string;
};

export type EmbeddingStoreOptions = {
  db_path: string;
  /** When set, vectors of any other length are rejected. */
  dimensions?: number;
  logger?: Logger;
};

export function cosineSimilarity(a: number[], b: number[]) {
  if (a.length !== b.length) {
    throw new RangeError(`vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function cosineDistance(a: number[], b: number[]) {
  return 1 - cosineSimilarity(a, b);
}

function serializeVector(vector: number[]) {
  return JSON.stringify(vector.map((value) => Number(value.toFixed(VECTOR_PRECISION))));
}

function parseVector(text: string): number[] | null {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) return null;
  const values: number[] = [];
  for (const value of parsed) {
    if (typeof value !== "number" || !Number.isFinite(value)) return null;
    values.push(value);
  }
  return values;
}

/**
 * Persistent embedding cache keyed by candidate id. One row per id; writes are
 * upserts, so re-storing an id replaces its vector.
 */
export class EmbeddingStore implements VectorStore {
  private readonly db: Database.Database;
  private readonly dimensions: number | null;
  private readonly logger: Logger;

  constructor(options: EmbeddingStoreOptions) {
    this.dimensions = options.dimensions ?? null;
    this.logger = options.logger ?? createLogger("embedding_store");
    if (options.db_path !== ":memory:") {
      fs.mkdirSync(path.dirname(options.db_path), { recursive: true });
    }
    this.db = new Database(options.db_path);
    if (options.db_path !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS place_embeddings (
        id TEXT PRIMARY KEY,
        embedding TEXT NOT NULL,
        normalized INTEGER NOT NULL DEFAULT 1,
        updated_at TEXT NOT NULL
      );
    `);
  }

  validateVector(vector: unknown): string | null {
    if (!Array.isArray(vector) || vector.length === 0) return "empty_vector";
    if (vector.some((value) => typeof value !== "number" || !Number.isFinite(value))) return "non_finite_value";
    if (this.dimensions !== null && vector.length !== this.dimensions) {
      return `dimension_mismatch(${vector.length}!=${this.dimensions})`;
    }
    return null;
  }

  getMany(ids: Iterable<string>): Map<string, number[]> {
    const unique = Array.from(new Set(ids));
    const found = new Map<string, number[]>();
    if (unique.length === 0) return found;

    const stmt = this.db.prepare<[string], EmbeddingRow>("SELECT id, embedding FROM place_embeddings WHERE id = ?");
    for (const id of unique) {
      const row = stmt.get(id);
      if (!row) continue;
      const vector = this.readRow(row);
      if (vector) found.set(row.id, vector);
    }
    return found;
  }

  /** Stored vector for a row, or null when it is unreadable or no longer fits the configured dimensions. */
  private readRow(row: EmbeddingRow): number[] | null {
    const vector = parseVector(row.embedding);
    const problem = vector ? this.validateVector(vector) : "unreadable";
    if (problem) {
      this.logger.warn(`stored vector for ${row.id} is ${problem}; treating as missing`);
      return null;
    }
    return vector;
  }

  putMany(records: EmbeddingRecord[]): { success_count: number; failure_count: number } {
    let success_count = 0;
    let failure_count = 0;
    const stmt = this.db.prepare(
      `INSERT INTO place_embeddings (id, embedding, normalized, updated_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET
         embedding=excluded.embedding,
         normalized=excluded.normalized,
         updated_at=excluded.updated_at`
    );

    for (const record of records) {
      const problem = typeof record.id === "string" && record.id.trim() ? this.validateVector(record.vector) : "missing_id";
      if (problem) {
        failure_count += 1;
        this.logger.warn(`rejected embedding for ${record.id || "<blank>"}: ${problem}`);
        continue;
      }
      try {
        stmt.run(record.id, serializeVector(record.vector), record.normalized === false ? 0 : 1, new Date().toISOString());
        success_count += 1;
      } catch (error) {
        failure_count += 1;
        this.logger.error(`failed to store embedding for ${record.id}: ${describeError(error)}`);
      }
    }

    this.logger.info(`stored ${success_count} embedding(s), ${failure_count} failed`);
    return { success_count, failure_count };
  }

  /**
   * Nearest stored vectors by cosine distance, ascending. Ties keep insertion
   * order. With `allow_ids`, only those ids are considered; an empty allow-list
   * yields no matches.
   */
  queryNearest(params: { embedding: number[]; limit: number; allow_ids?: string[] }): NearestMatch[] {
    if (params.limit <= 0) return [];
    if (params.allow_ids && params.allow_ids.length === 0) return [];

    let rows: EmbeddingRow[];
    if (params.allow_ids) {
      const allowed = Array.from(new Set(params.allow_ids));
      const placeholders = allowed.map(() => "?").join(", ");
      rows = this.db
        .prepare<string[], EmbeddingRow>(
          `SELECT id, embedding FROM place_embeddings WHERE id IN (${placeholders}) ORDER BY rowid`
        )
        .all(...allowed);
    } else {
      rows = this.db.prepare<[], EmbeddingRow>("SELECT id, embedding FROM place_embeddings ORDER BY rowid").all();
    }

    const scored: NearestMatch[] = [];
    for (const row of rows) {
      const vector = this.readRow(row);
      if (!vector) continue;
      if (vector.length !== params.embedding.length) {
        this.logger.warn(`skipping ${row.id}: ${vector.length} dimensions, query has ${params.embedding.length}`);
        continue;
      }
      scored.push({ id: row.id, distance: cosineDistance(params.embedding, vector) });
    }

    return scored.sort((a, b) => a.distance - b.distance).slice(0, params.limit);
  }

  count(): number {
    const row = this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM place_embeddings").get();
    return row?.total ?? 0;
  }

  close() {
    this.db.close();
  }
}
