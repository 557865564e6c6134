import { InputValidationError, StorageError, errorMessage } from "./errors.js";
import type { VectorCollection } from "./indexing/collection.js";
import { indexDocument, type ChunkingOptions } from "./indexing/vector-index.js";
import { suggestTemplate } from "./planner/templates.js";
import { log } from "./utils/logger.js";

export type IndexedDocument = {
  name: string;
  chunkCount: number;
  indexedAt: string;
};

/**
 * What the boundary layer knows about the documents indexed so far. Every
 * operation returns a new session instead of mutating the one passed in.
 */
export type Session = {
  readonly indexedDocuments: readonly IndexedDocument[];
  readonly totalChunks: number;
  readonly suggestedTemplate?: string;
};

export type SourceFile = {
  name: string;
  content: string;
};

export type FileIndexOutcome =
  | { name: string; status: "indexed"; chunkCount: number }
  | { name: string; status: "skipped" }
  | { name: string; status: "rejected" | "failed"; error: string };

export type IndexFilesOptions = {
  chunking: ChunkingOptions;
  /** Index files again even if a document with the same name is known. */
  reindex?: boolean;
};

function freezeSession(documents: IndexedDocument[], suggestedTemplate?: string): Session {
  return Object.freeze({
    indexedDocuments: Object.freeze(documents),
    totalChunks: documents.reduce((sum, d) => sum + d.chunkCount, 0),
    suggestedTemplate,
  });
}

export function createSession(): Session {
  return freezeSession([]);
}

/** Rebuild a session from what the collection already holds. */
export function sessionFromCollection(collection: VectorCollection): Session {
  const documents = collection.listDocuments().map((d) => ({
    name: d.documentId,
    chunkCount: d.chunkCount,
    indexedAt: d.indexedAt,
  }));
  return freezeSession(documents);
}

/**
 * Index each file on its own. A file that fails validation or storage is
 * reported and the rest still get indexed.
 */
export function indexFiles(
  session: Session,
  collection: VectorCollection,
  files: readonly SourceFile[],
  opts: IndexFilesOptions,
): { session: Session; outcomes: FileIndexOutcome[] } {
  const documents = new Map(session.indexedDocuments.map((d) => [d.name, d]));
  let suggestedTemplate = session.suggestedTemplate;
  const outcomes: FileIndexOutcome[] = [];

  for (const file of files) {
    if (documents.has(file.name) && !opts.reindex) {
      outcomes.push({ name: file.name, status: "skipped" });
      continue;
    }

    try {
      const result = indexDocument(collection, file.content, file.name, opts.chunking);
      documents.set(file.name, {
        name: file.name,
        chunkCount: result.chunkCount,
        indexedAt: result.timestamp,
      });
      if (!suggestedTemplate) suggestedTemplate = suggestTemplate(file.content);
      outcomes.push({ name: file.name, status: "indexed", chunkCount: result.chunkCount });
    } catch (err) {
      if (err instanceof InputValidationError) {
        outcomes.push({ name: file.name, status: "rejected", error: err.message });
      } else if (err instanceof StorageError) {
        outcomes.push({ name: file.name, status: "failed", error: err.message });
      } else {
        throw err;
      }
      log.warn(`Could not index "${file.name}"`, { error: errorMessage(err) });
    }
  }

  return { session: freezeSession([...documents.values()], suggestedTemplate), outcomes };
}
