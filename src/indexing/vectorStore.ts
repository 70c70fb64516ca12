import * as lancedb from "@lancedb/lancedb";
import path from "node:path";
import fs from "node:fs";
import type { EmbeddingVector } from "../models/schemas";
import { isRecord } from "../utils/outcome";
import { logWarn } from "../utils/logger";

export type IssueEmbeddingRow = {
  issueId: string;
  embedding: EmbeddingVector;
};

/** Persistent side of the embedding cache, keyed by issue id. */
export interface EmbeddingStore {
  fetch(issueIds: readonly string[]): Promise<Map<string, EmbeddingVector>>;
  upsert(rows: readonly IssueEmbeddingRow[]): Promise<void>;
}

const TABLE_NAME = "issue_embeddings";

/**
 * LanceDB table `issue_embeddings` (issue_id, model, embedding, updated_at).
 * Read and write failures are logged and swallowed into "nothing cached".
 */
export function createLanceEmbeddingStore(dataDir: string, model: string): EmbeddingStore {
  const dbDir = path.join(dataDir, "lancedb");

  async function connect() {
    if (!fs.existsSync(dbDir)) fs.mkdirSync(dbDir, { recursive: true });
    const db = await lancedb.connect(dbDir);
    const tables = await db.tableNames();
    return { db, exists: tables.includes(TABLE_NAME) };
  }

  return {
    async fetch(issueIds) {
      const found = new Map<string, EmbeddingVector>();
      if (issueIds.length === 0) return found;

      try {
        const { db, exists } = await connect();
        if (!exists) return found;

        const table = await db.openTable(TABLE_NAME);
        const rows: unknown[] = await table
          .query()
          .where(`issue_id IN (${issueIds.map(sqlString).join(", ")}) AND model = ${sqlString(model)}`)
          .select(["issue_id", "embedding"])
          .toArray();

        for (const row of rows) {
          if (!isRecord(row) || typeof row.issue_id !== "string") continue;
          const vector = toNumberArray(row.embedding);
          if (vector.length > 0) found.set(row.issue_id, vector);
        }
      } catch (e) {
        logWarn("Embedding store fetch failed", {
          ids: issueIds.length,
          error: e instanceof Error ? e.message : String(e)
        });
      }
      return found;
    },

    async upsert(rows) {
      if (rows.length === 0) return;

      const records = rows.map(r => ({
        issue_id: r.issueId,
        model,
        embedding: r.embedding,
        updated_at: new Date().toISOString()
      }));

      try {
        const { db, exists } = await connect();
        if (!exists) {
          await db.createTable(TABLE_NAME, records);
          return;
        }

        const table = await db.openTable(TABLE_NAME);
        await table.delete(`issue_id IN (${rows.map(r => sqlString(r.issueId)).join(", ")})`);
        await table.add(records);
      } catch (e) {
        logWarn("Embedding store backfill failed", {
          rows: rows.length,
          error: e instanceof Error ? e.message : String(e)
        });
      }
    }
  };
}

function sqlString(value: string) {
  return `'${value.replace(/'/g, "''")}'`;
}

function toNumberArray(value: unknown): number[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is number => typeof v === "number");
  }
  if (value instanceof Float32Array || value instanceof Float64Array) {
    return Array.from(value);
  }
  // Arrow vectors come back as objects exposing toArray()
  if (isRecord(value) && typeof value.toArray === "function") {
    return toNumberArray(value.toArray());
  }
  return [];
}
