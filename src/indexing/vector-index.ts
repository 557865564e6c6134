import { InputValidationError, PipelineError, StorageError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import { codePointLength } from "../utils/text.js";
import { chunkText } from "./chunker.js";
import { chunkId, type ChunkMetadata, type VectorCollection } from "./collection.js";

export const MIN_TEXT_LENGTH = 100;
export const MAX_TEXT_LENGTH = 100_000;
export const MAX_TOP_K = 10;
const RELEVANCE_STEP = 0.1;

export type ChunkingOptions = {
  size: number;
  overlap: number;
};

export type IndexResult = {
  documentId: string;
  chunkCount: number;
  timestamp: string;
};

/**
 * One query hit. `relevance` is derived from rank only (1.0, 0.9, ...);
 * it orders results and means nothing across queries.
 */
export type RetrievedContext = {
  text: string;
  relevance: number;
  metadata: ChunkMetadata;
};

/**
 * Returns the reason the text cannot be indexed, or `null` when it is acceptable.
 * Lengths count code points.
 */
export function validateTextInput(text: string): string | null {
  if (!text || text.trim().length === 0) {
    return "Text is empty or contains only whitespace";
  }
  const length = codePointLength(text);
  if (length < MIN_TEXT_LENGTH) {
    return `Text is too short (minimum ${MIN_TEXT_LENGTH} characters). Please provide more detail.`;
  }
  if (length > MAX_TEXT_LENGTH) {
    return `Text is too long (maximum ${MAX_TEXT_LENGTH.toLocaleString("en-US")} characters). Please split into smaller documents.`;
  }
  return null;
}

/**
 * Replace every chunk of `documentId` with chunks of `text`.
 * Re-indexing the same id never leaves chunks from an earlier version behind.
 */
export function indexDocument(
  collection: VectorCollection,
  text: string,
  documentId: string,
  chunking: ChunkingOptions,
): IndexResult {
  const problem = validateTextInput(text);
  if (problem) {
    throw new InputValidationError(`Invalid input: ${problem}`);
  }

  const chunks = [...chunkText(text, chunking.size, chunking.overlap)];
  const timestamp = new Date().toISOString();

  try {
    const removed = collection.replaceDocument(
      documentId,
      chunks.map((c) => c.text),
      chunks.map((c) => ({ source: documentId, chunkIndex: c.index, timestamp })),
      chunks.map((c) => chunkId(documentId, c.index)),
    );
    if (removed > 0) {
      log.debug("Removed previous chunks", { documentId, removed });
    }
  } catch (err) {
    if (err instanceof PipelineError) throw err;
    log.error("Indexing failed", { documentId, error: errorMessage(err) });
    throw new StorageError(`Indexing failed: ${errorMessage(err)}`, err);
  }

  log.info(`Indexed "${documentId}"`, { chunks: chunks.length });
  return { documentId, chunkCount: chunks.length, timestamp };
}

/** Similarity query, at most 10 hits. Only an empty collection yields `[]`. */
export function queryCollection(
  collection: VectorCollection,
  queryText: string,
  topK = 5,
): RetrievedContext[] {
  const limit = Math.min(Math.max(1, Math.floor(topK)), MAX_TOP_K);
  try {
    const { documents, metadatas } = collection.query(queryText, limit);
    return documents.slice(0, limit).map((text, i) => ({
      text,
      relevance: Number((1 - i * RELEVANCE_STEP).toFixed(2)),
      metadata: metadatas[i] ?? {},
    }));
  } catch (err) {
    log.error("Query failed", { error: errorMessage(err) });
    throw new StorageError(`Query failed: ${errorMessage(err)}`, err);
  }
}

export function joinContext(items: RetrievedContext[], separator = "\n\n"): string {
  return items.map((item) => item.text).join(separator);
}
