import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { StorageError, errorMessage } from "../errors.js";

export type MetadataValue = string | number | boolean;
export type ChunkMetadata = Record<string, MetadataValue>;

export type CollectionQueryResult = {
  documents: string[];
  metadatas: ChunkMetadata[];
};

export type StoredDocument = {
  documentId: string;
  chunkCount: number;
  indexedAt: string;
};

/**
 * A similarity-search collection. Ranking is the collection's business;
 * callers only rely on result order.
 */
export interface VectorCollection {
  /** Each metadata entry carries the owning document id under `source`. */
  addChunks(texts: string[], metadatas: ChunkMetadata[], ids: string[]): void;
  deleteByDocumentId(documentId: string): number;
  /**
   * Delete every chunk of `documentId` and add the given ones as one unit:
   * if the insert fails, the previous chunks stay. Returns how many were removed.
   */
  replaceDocument(documentId: string, texts: string[], metadatas: ChunkMetadata[], ids: string[]): number;
  /** Returns `min(topK, chunk count)` chunks, best matches first. */
  query(queryText: string, topK: number): CollectionQueryResult;
  countByDocumentId(documentId: string): number;
  listDocuments(): StoredDocument[];
  close(): void;
}

export function chunkId(documentId: string, ordinal: number): string {
  return `${documentId}_chunk_${ordinal}`;
}

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));
const MAX_QUERY_TERMS = 64;

type ChunkRow = { id: string; content: string; metadata: string };
type DocumentRow = { document_id: string; chunk_count: number; indexed_at: string };

/** Turn free text into an FTS5 expression that ORs every distinct word. */
export function toMatchExpression(queryText: string): string | null {
  const words = queryText.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  const unique = [...new Set(words)].slice(0, MAX_QUERY_TERMS);
  if (unique.length === 0) return null;
  return unique.map((w) => `"${w}"`).join(" OR ");
}

function parseMetadata(raw: string): ChunkMetadata {
  try {
    const result = MetadataSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : {};
  } catch {
    return {};
  }
}

/**
 * Collection stored in SQLite. Chunks live in a plain table; an FTS5 index
 * over their text ranks query hits by bm25.
 */
export class SqliteCollection implements VectorCollection {
  private db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    if (path !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        id          TEXT PRIMARY KEY,
        document_id TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        content     TEXT NOT NULL,
        metadata    TEXT NOT NULL DEFAULT '{}',
        created_at  TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id);
      CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
        chunk_id UNINDEXED,
        content,
        tokenize = 'porter unicode61'
      );
    `);
  }

  addChunks(texts: string[], metadatas: ChunkMetadata[], ids: string[]): void {
    if (texts.length !== metadatas.length || texts.length !== ids.length) {
      throw new Error("texts, metadatas and ids must have the same length");
    }
    const insertChunk = this.db.prepare<[string, string, number, string, string, string]>(`
      INSERT INTO chunks (id, document_id, chunk_index, content, metadata, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const insertFts = this.db.prepare<[string, string]>(
      "INSERT INTO chunks_fts (chunk_id, content) VALUES (?, ?)",
    );
    const now = new Date().toISOString();

    this.db.transaction(() => {
      texts.forEach((text, i) => {
        const meta = metadatas[i];
        const documentId = String(meta.source ?? "");
        const ordinal = typeof meta.chunkIndex === "number" ? meta.chunkIndex : i;
        insertChunk.run(ids[i], documentId, ordinal, text, JSON.stringify(meta), now);
        insertFts.run(ids[i], text);
      });
    })();
  }

  deleteByDocumentId(documentId: string): number {
    const deleteFts = this.db.prepare<[string]>(
      "DELETE FROM chunks_fts WHERE chunk_id IN (SELECT id FROM chunks WHERE document_id = ?)",
    );
    const deleteChunks = this.db.prepare<[string]>("DELETE FROM chunks WHERE document_id = ?");

    return this.db.transaction(() => {
      deleteFts.run(documentId);
      return deleteChunks.run(documentId).changes;
    })();
  }

  replaceDocument(documentId: string, texts: string[], metadatas: ChunkMetadata[], ids: string[]): number {
    return this.db.transaction(() => {
      const removed = this.deleteByDocumentId(documentId);
      this.addChunks(texts, metadatas, ids);
      return removed;
    })();
  }

  /**
   * bm25 hits come first. Remaining slots are filled with the other chunks
   * in document order, so only an empty collection returns nothing.
   */
  query(queryText: string, topK: number): CollectionQueryResult {
    if (topK <= 0) return { documents: [], metadatas: [] };

    const match = toMatchExpression(queryText);
    const rows: ChunkRow[] = match
      ? this.db
          .prepare<[string, number], ChunkRow>(`
            SELECT c.id AS id, c.content AS content, c.metadata AS metadata
            FROM (
              SELECT chunk_id, rank FROM chunks_fts
              WHERE chunks_fts MATCH ?
              ORDER BY rank
              LIMIT ?
            ) AS hits
            JOIN chunks c ON c.id = hits.chunk_id
            ORDER BY hits.rank
          `)
          .all(match, topK)
      : [];

    if (rows.length < topK) {
      const seen = new Set(rows.map((r) => r.id));
      const fill = this.db
        .prepare<[number], ChunkRow>(`
          SELECT id, content, metadata FROM chunks
          ORDER BY document_id, chunk_index
          LIMIT ?
        `)
        .all(topK + rows.length);
      for (const row of fill) {
        if (rows.length >= topK) break;
        if (!seen.has(row.id)) rows.push(row);
      }
    }

    return {
      documents: rows.map((r) => r.content),
      metadatas: rows.map((r) => parseMetadata(r.metadata)),
    };
  }

  countByDocumentId(documentId: string): number {
    const row = this.db
      .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM chunks WHERE document_id = ?")
      .get(documentId);
    return row?.n ?? 0;
  }

  listDocuments(): StoredDocument[] {
    const rows = this.db
      .prepare<[], DocumentRow>(`
        SELECT document_id, COUNT(*) AS chunk_count, MAX(created_at) AS indexed_at
        FROM chunks
        GROUP BY document_id
        ORDER BY indexed_at DESC, document_id ASC
      `)
      .all();
    return rows.map((r) => ({
      documentId: r.document_id,
      chunkCount: r.chunk_count,
      indexedAt: r.indexed_at,
    }));
  }

  close(): void {
    this.db.close();
  }
}

/** Create the collection at `path` (or in memory for ":memory:"), or open it if it exists. */
export function openCollection(path: string): VectorCollection {
  try {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    return new SqliteCollection(path);
  } catch (err) {
    throw new StorageError(`Failed to initialize vector store: ${errorMessage(err)}`, err);
  }
}
