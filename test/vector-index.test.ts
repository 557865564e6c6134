import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteCollection, type VectorCollection } from "../src/indexing/collection.js";
import {
  indexDocument,
  joinContext,
  queryCollection,
  validateTextInput,
} from "../src/indexing/vector-index.js";
import { InputValidationError, StorageError } from "../src/errors.js";
import { setLogLevel } from "../src/utils/logger.js";

setLogLevel("silent");

const CHUNKING = { size: 200, overlap: 50 };

const projectText = (topic: string, n = 600) => {
  const sentence = `The ${topic} workstream covers scope, owners and milestones. `;
  return sentence.repeat(Math.ceil(n / sentence.length)).slice(0, n);
};

/** Collection whose every call fails, to exercise error wrapping. */
function brokenCollection(): VectorCollection {
  const boom = () => {
    throw new Error("disk is full");
  };
  return {
    addChunks: boom,
    deleteByDocumentId: boom,
    replaceDocument: boom,
    query: boom,
    countByDocumentId: boom,
    listDocuments: boom,
    close: () => {},
  };
}

describe("validateTextInput", () => {
  it("accepts text within bounds", () => {
    expect(validateTextInput("x".repeat(100))).toBeNull();
    expect(validateTextInput("x".repeat(100_000))).toBeNull();
  });

  it("counts characters outside the basic plane once", () => {
    expect(validateTextInput("😀".repeat(100))).toBeNull();
    expect(validateTextInput("😀".repeat(99))).toBe(
      "Text is too short (minimum 100 characters). Please provide more detail.",
    );
    expect(validateTextInput("😀".repeat(100_000))).toBeNull();
  });

  it("reports empty, short and long text", () => {
    expect(validateTextInput("   \n ")).toBe("Text is empty or contains only whitespace");
    expect(validateTextInput("x".repeat(99))).toBe(
      "Text is too short (minimum 100 characters). Please provide more detail.",
    );
    expect(validateTextInput("x".repeat(100_001))).toBe(
      "Text is too long (maximum 100,000 characters). Please split into smaller documents.",
    );
  });
});

describe("indexDocument", () => {
  let collection: SqliteCollection;

  beforeEach(() => {
    collection = new SqliteCollection(":memory:");
  });

  afterEach(() => {
    collection.close();
  });

  it("stores one entry per chunk with source metadata", () => {
    // 600 chars, step 150: windows at 0, 150, 300, 450
    const result = indexDocument(collection, projectText("catering"), "event.txt", CHUNKING);

    expect(result.documentId).toBe("event.txt");
    expect(result.chunkCount).toBe(4);
    expect(collection.countByDocumentId("event.txt")).toBe(4);

    const hit = queryCollection(collection, "catering", 1)[0];
    expect(hit.metadata.source).toBe("event.txt");
    expect(hit.metadata.timestamp).toBe(result.timestamp);
  });

  it("replaces the previous chunks when a document is indexed again", () => {
    indexDocument(collection, projectText("catering", 1200), "event.txt", CHUNKING);
    const second = indexDocument(collection, projectText("security", 300), "event.txt", CHUNKING);

    expect(collection.countByDocumentId("event.txt")).toBe(second.chunkCount);
    const texts = queryCollection(collection, "catering", 10).map((r) => r.text);
    expect(texts).toHaveLength(second.chunkCount);
    expect(texts.some((t) => t.includes("catering"))).toBe(false);
  });

  it("keeps the previous chunks when writing the new ones fails", () => {
    class FlakyCollection extends SqliteCollection {
      failInserts = false;

      override addChunks(...args: Parameters<SqliteCollection["addChunks"]>): void {
        if (this.failInserts) throw new Error("disk is full");
        super.addChunks(...args);
      }
    }
    const flaky = new FlakyCollection(":memory:");
    indexDocument(flaky, projectText("catering"), "a.txt", CHUNKING);
    flaky.failInserts = true;

    expect(() => indexDocument(flaky, projectText("lighting"), "a.txt", CHUNKING)).toThrow(
      new StorageError("Indexing failed: disk is full"),
    );
    expect(flaky.countByDocumentId("a.txt")).toBe(4);
    flaky.close();
  });

  it("leaves other documents alone", () => {
    indexDocument(collection, projectText("catering"), "a.txt", CHUNKING);
    indexDocument(collection, projectText("security"), "b.txt", CHUNKING);
    indexDocument(collection, projectText("lighting"), "a.txt", CHUNKING);

    expect(collection.countByDocumentId("b.txt")).toBe(4);
  });

  it("rejects invalid text without touching the collection", () => {
    indexDocument(collection, projectText("catering"), "a.txt", CHUNKING);

    expect(() => indexDocument(collection, "too short", "a.txt", CHUNKING)).toThrow(
      "Invalid input: Text is too short (minimum 100 characters). Please provide more detail.",
    );
    expect(() => indexDocument(collection, "too short", "a.txt", CHUNKING)).toThrow(InputValidationError);
    expect(collection.countByDocumentId("a.txt")).toBe(4);
  });

  it("wraps collection failures in StorageError", () => {
    expect(() => indexDocument(brokenCollection(), projectText("catering"), "a.txt", CHUNKING)).toThrow(
      new StorageError("Indexing failed: disk is full"),
    );
  });
});

describe("queryCollection", () => {
  let collection: SqliteCollection;

  beforeEach(() => {
    collection = new SqliteCollection(":memory:");
    const texts = Array.from({ length: 12 }, (_, i) => `milestone review number ${i}`);
    collection.addChunks(
      texts,
      texts.map((_, i) => ({ source: "m.txt", chunkIndex: i })),
      texts.map((_, i) => `m.txt_chunk_${i}`),
    );
  });

  afterEach(() => {
    collection.close();
  });

  it("assigns decreasing relevance by rank", () => {
    const results = queryCollection(collection, "milestone", 3);
    expect(results.map((r) => r.relevance)).toEqual([1, 0.9, 0.8]);
  });

  it("caps topK at 10 and floors it at 1", () => {
    expect(queryCollection(collection, "milestone", 50)).toHaveLength(10);
    expect(queryCollection(collection, "milestone", 0)).toHaveLength(1);
  });

  it("fills the result with other chunks when nothing matches", () => {
    const results = queryCollection(collection, "zebra", 5);
    expect(results.map((r) => r.metadata.chunkIndex)).toEqual([0, 1, 2, 3, 4]);
  });

  it("returns an empty list only for an empty collection", () => {
    const empty = new SqliteCollection(":memory:");
    expect(queryCollection(empty, "milestone", 5)).toEqual([]);
    empty.close();
  });

  it("wraps collection failures in StorageError", () => {
    expect(() => queryCollection(brokenCollection(), "milestone")).toThrow(
      new StorageError("Query failed: disk is full"),
    );
  });
});

describe("joinContext", () => {
  it("joins item texts with the separator", () => {
    const items = [
      { text: "one", relevance: 1, metadata: {} },
      { text: "two", relevance: 0.9, metadata: {} },
    ];
    expect(joinContext(items)).toBe("one\n\ntwo");
    expect(joinContext(items, "\n\n---\n\n")).toBe("one\n\n---\n\ntwo");
  });
});
