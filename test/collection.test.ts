import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteCollection, chunkId, openCollection, toMatchExpression } from "../src/indexing/collection.js";
import { StorageError } from "../src/errors.js";

describe("toMatchExpression", () => {
  it("quotes and ORs distinct lowercase words", () => {
    expect(toMatchExpression("Budget, budget AND timeline?")).toBe('"budget" OR "and" OR "timeline"');
  });

  it("returns null when there is nothing to match", () => {
    expect(toMatchExpression("  ?! -- ")).toBeNull();
  });
});

describe("chunkId", () => {
  it("joins document id and ordinal", () => {
    expect(chunkId("brief.txt", 3)).toBe("brief.txt_chunk_3");
  });
});

describe("SqliteCollection", () => {
  let collection: SqliteCollection;

  beforeEach(() => {
    collection = new SqliteCollection(":memory:");
  });

  afterEach(() => {
    collection.close();
  });

  const add = (documentId: string, texts: string[]) =>
    collection.addChunks(
      texts,
      texts.map((_, i) => ({ source: documentId, chunkIndex: i })),
      texts.map((_, i) => chunkId(documentId, i)),
    );

  it("returns nothing from an empty collection", () => {
    expect(collection.query("anything at all", 5)).toEqual({ documents: [], metadatas: [] });
  });

  it("finds chunks by word and returns their metadata", () => {
    add("plan.md", ["the venue holds two hundred guests", "catering is booked for friday"]);

    const result = collection.query("venue", 1);
    expect(result.documents).toEqual(["the venue holds two hundred guests"]);
    expect(result.metadatas).toEqual([{ source: "plan.md", chunkIndex: 0 }]);
  });

  it("ranks chunks with more matching terms first", () => {
    add("notes.md", ["alpha beta gamma delta epsilon", "alpha alpha alpha beta gamma"]);

    expect(collection.query("alpha", 5).documents).toEqual([
      "alpha alpha alpha beta gamma",
      "alpha beta gamma delta epsilon",
    ]);
  });

  it("limits results to topK", () => {
    add("many.md", ["report one", "report two", "report three"]);
    expect(collection.query("report", 2).documents).toHaveLength(2);
  });

  it("matches word stems", () => {
    add("db.md", ["the service stores records in several databases"]);
    expect(collection.query("database", 1).documents).toEqual([
      "the service stores records in several databases",
    ]);
  });

  it("treats query punctuation and keywords as plain words", () => {
    add("q.md", ["quoted text here"]);
    expect(collection.query('"quoted" OR NOT (text', 5).documents).toEqual(["quoted text here"]);
  });

  it("deletes every chunk of a document and reports how many", () => {
    add("a.md", ["first alpha chunk", "second alpha chunk"]);
    add("b.md", ["beta chunk"]);

    expect(collection.deleteByDocumentId("a.md")).toBe(2);
    expect(collection.countByDocumentId("a.md")).toBe(0);
    expect(collection.countByDocumentId("b.md")).toBe(1);
    expect(collection.query("alpha", 5).documents).toEqual(["beta chunk"]);
  });

  it("fills remaining slots with other chunks in document order", () => {
    add("b.md", ["budget is fixed", "travel is booked"]);
    add("a.md", ["agenda draft", "speakers confirmed"]);

    expect(collection.query("travel", 3).documents).toEqual([
      "travel is booked",
      "agenda draft",
      "speakers confirmed",
    ]);
  });

  it("returns min(topK, count) chunks when no word matches", () => {
    add("a.md", ["agenda draft", "speakers confirmed"]);

    expect(collection.query("project specification", 5).documents).toEqual([
      "agenda draft",
      "speakers confirmed",
    ]);
    expect(collection.query("?!", 1).documents).toEqual(["agenda draft"]);
    expect(collection.query("agenda", 0).documents).toEqual([]);
  });

  it("replaces a document's chunks in one step", () => {
    add("a.md", ["old one", "old two", "old three"]);

    const removed = collection.replaceDocument(
      "a.md",
      ["new one"],
      [{ source: "a.md", chunkIndex: 0 }],
      ["a.md_chunk_0"],
    );

    expect(removed).toBe(3);
    expect(collection.query("one", 5).documents).toEqual(["new one"]);
  });

  it("keeps the old chunks when the replacement cannot be written", () => {
    add("a.md", ["old one", "old two"]);

    expect(() =>
      collection.replaceDocument(
        "a.md",
        ["x", "y"],
        [
          { source: "a.md", chunkIndex: 0 },
          { source: "a.md", chunkIndex: 1 },
        ],
        ["dup", "dup"],
      ),
    ).toThrow(/UNIQUE constraint failed/);
    expect(collection.countByDocumentId("a.md")).toBe(2);
    expect(collection.query("old", 5).documents.sort()).toEqual(["old one", "old two"]);
  });

  it("returns 0 when deleting an unknown document", () => {
    expect(collection.deleteByDocumentId("missing.md")).toBe(0);
  });

  it("lists documents with chunk counts", () => {
    add("a.md", ["one", "two"]);
    add("b.md", ["three"]);

    const docs = collection.listDocuments();
    expect(docs.map((d) => [d.documentId, d.chunkCount]).sort()).toEqual([
      ["a.md", 2],
      ["b.md", 1],
    ]);
  });

  it("rejects mismatched batch lengths", () => {
    expect(() => collection.addChunks(["a", "b"], [{ source: "x" }], ["x_chunk_0"])).toThrow(
      "texts, metadatas and ids must have the same length",
    );
  });
});

describe("openCollection", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "taskweave-collection-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the store and its directory on disk", () => {
    const collection = openCollection(join(dir, "nested", "store.db"));
    collection.addChunks(["persisted chunk"], [{ source: "p.md" }], ["p.md_chunk_0"]);
    collection.close();

    const reopened = openCollection(join(dir, "nested", "store.db"));
    expect(reopened.countByDocumentId("p.md")).toBe(1);
    reopened.close();
  });

  it("wraps failures in StorageError", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "not a directory");

    expect(() => openCollection(join(blocker, "store.db"))).toThrow(StorageError);
    expect(() => openCollection(join(blocker, "store.db"))).toThrow(/^Failed to initialize vector store: /);
  });
});
