import { describe, expect, it } from "vitest";
import { MemoryInvertedIndex, type DocumentRecord, type Tokenizer } from "../../index.js";

function newIndex(): MemoryInvertedIndex {
  return new MemoryInvertedIndex({ now: () => 1_000 });
}

function expectOk<T>(outcome: { ok: true; value: T } | { ok: false }): T {
  if (!outcome.ok) throw new Error("expected ok outcome");
  return outcome.value;
}

/** term -> number of documents holding a posting, for every term in the index */
function postingCounts(index: MemoryInvertedIndex): Map<string, number> {
  return new Map(index.toState().postings.map(([term, postings]) => [term, postings.length]));
}

describe("MemoryInvertedIndex", () => {
  it("stores a record with token statistics", () => {
    const index = newIndex();
    const record = expectOk(index.addDocument({ id: "d1", content: "Python is a programming language" }));

    const expected: DocumentRecord = {
      id: "d1",
      content: "Python is a programming language",
      title: "Document d1",
      author: null,
      totalTerms: 4,
      uniqueTerms: 4,
      addedAt: 1_000,
    };
    expect(record).toEqual(expected);
    expect(index.getDocument("d1")).toEqual(expected);
  });

  it("keeps a caller-supplied title and author", () => {
    const index = newIndex();
    const record = expectOk(index.addDocument({ id: "d1", content: "hello world", title: "Greeting", author: "Ada" }));
    expect(record.title).toBe("Greeting");
    expect(record.author).toBe("Ada");
  });

  it("rejects blank content and content without indexable terms", () => {
    const index = newIndex();

    const blank = index.addDocument({ id: "d1", content: "   " });
    expect(blank.ok).toBe(false);
    if (!blank.ok) expect(blank.error.kind).toBe("rejected_input");

    const stopWords = index.addDocument({ id: "d2", content: "the and of, by!" });
    expect(stopWords.ok).toBe(false);
    if (!stopWords.ok) expect(stopWords.error).toEqual({ kind: "rejected_input", message: "content has no indexable terms" });

    expect(index.stats().totalDocuments).toBe(0);
    expect(index.hasDocument("d1")).toBe(false);
  });

  it("records raw occurrence counts per posting", () => {
    const index = newIndex();
    index.addDocument({ id: "d1", content: "apple banana apple" });

    expect(index.getPostings("apple")?.get("d1")).toBe(2);
    expect(index.getPostings("banana")?.get("d1")).toBe(1);
    expect(index.getDocument("d1")?.totalTerms).toBe(3);
    expect(index.getDocument("d1")?.uniqueTerms).toBe(2);
  });

  it("keeps document frequencies equal to posting counts through adds and removes", () => {
    const index = newIndex();
    index.addDocument({ id: "d1", content: "apple banana" });
    index.addDocument({ id: "d2", content: "apple cherry cherry" });
    index.addDocument({ id: "d3", content: "banana cherry" });

    const check = () => {
      for (const [term, docs] of postingCounts(index)) {
        expect(index.documentFrequency(term)).toBe(docs);
      }
      expect(index.toState().termStats.length).toBe(postingCounts(index).size);
    };

    check();
    expect(index.documentFrequency("apple")).toBe(2);
    expect(index.documentFrequency("cherry")).toBe(2);

    index.removeDocument("d1");
    check();
    expect(index.documentFrequency("apple")).toBe(1);
    expect(index.documentFrequency("banana")).toBe(1);

    index.removeDocument("d3");
    check();
    expect(index.getPostings("banana")).toBeUndefined();
    expect(index.documentFrequency("banana")).toBe(0);
    expect(index.stats().totalTerms).toBe(2);
  });

  it("reports not_found for an unknown id without changing state", () => {
    const index = newIndex();
    index.addDocument({ id: "d1", content: "apple" });
    const before = index.toState();

    const removed = index.removeDocument("missing");
    expect(removed.ok).toBe(false);
    if (!removed.ok) expect(removed.error.kind).toBe("not_found");
    expect(index.toState()).toEqual(before);
  });

  it("restores the previous state when a document is added then removed", () => {
    const index = newIndex();
    index.addDocument({ id: "d1", content: "alpha beta" });
    const before = index.toState();
    const statsBefore = index.stats();

    index.addDocument({ id: "d2", content: "gamma delta gamma" });
    index.removeDocument("d2");

    expect(index.stats()).toEqual(statsBefore);
    expect(index.toState()).toEqual(before);
    expect(index.getPostings("gamma")).toBeUndefined();
    expect(index.getPostings("delta")).toBeUndefined();
  });

  it("computes aggregate statistics", () => {
    const index = newIndex();
    index.addDocument({ id: "d1", content: "apple banana apple" });
    index.addDocument({ id: "d2", content: "apple cherry" });

    expect(index.stats()).toEqual({
      totalDocuments: 2,
      totalTerms: 3,
      totalDocumentOccurrences: 4,
      averageTermsPerDocument: 1.5,
      mostCommonTerms: [
        { term: "apple", documentFrequency: 2 },
        { term: "banana", documentFrequency: 1 },
        { term: "cherry", documentFrequency: 1 },
      ],
    });
  });

  it("lists at most ten most common terms", () => {
    const index = newIndex();
    index.addDocument({ id: "d1", content: "t1 t2 t3 t4 t5 t6 t7 t8 t9 t10 t11 t12" });
    index.addDocument({ id: "d2", content: "t12" });

    const common = index.stats().mostCommonTerms;
    expect(common).toHaveLength(10);
    expect(common[0]).toEqual({ term: "t12", documentFrequency: 2 });
    expect(common[1]).toEqual({ term: "t1", documentFrequency: 1 });
  });

  it("samples terms in insertion order", () => {
    const index = newIndex();
    index.addDocument({ id: "d1", content: "apple banana apple" });
    index.addDocument({ id: "d2", content: "apple 2024" });

    expect(index.sampleTerms(2)).toEqual([
      { term: "apple", postings: { d1: 2, d2: 1 } },
      { term: "banana", postings: { d1: 1 } },
    ]);
    expect(index.sampleTerms(10).map((s) => s.term)).toEqual(["apple", "banana", "2024"]);
    expect(index.sampleTerms(0)).toEqual([]);
    expect(index.sampleTerms(Number.NaN)).toEqual([]);
    expect(index.sampleTerms(1.5)).toEqual([]);
  });

  it("clears everything and stays empty when cleared again", () => {
    const index = newIndex();
    index.addDocument({ id: "d1", content: "apple banana" });

    index.clear();
    index.clear();

    expect(index.stats()).toEqual({
      totalDocuments: 0,
      totalTerms: 0,
      totalDocumentOccurrences: 0,
      averageTermsPerDocument: 0,
      mostCommonTerms: [],
    });
    expect(index.getDocument("d1")).toBeUndefined();
    expect(index.sampleTerms(5)).toEqual([]);
  });

  it("leaves no partial postings when tokenizing a document throws", () => {
    const failing: Tokenizer = {
      tokenize: () => {
        throw new Error("tokenizer exploded");
      },
    };
    const index = new MemoryInvertedIndex({ tokenizer: failing });

    expect(() => index.addDocument({ id: "d1", content: "apple" })).toThrow("tokenizer exploded");
    expect(index.toState()).toEqual({ postings: [], documents: [], termStats: [], totalDocuments: 0, totalTerms: 0 });
  });

  it("rebuilds an equivalent index from its state", () => {
    const index = newIndex();
    index.addDocument({ id: "d1", content: "zeta 2024 zeta", title: "Z" });
    index.addDocument({ id: "d2", content: "alpha zeta" });

    const copy = MemoryInvertedIndex.fromState(index.toState());
    expect(copy.toState()).toEqual(index.toState());
    expect(copy.stats()).toEqual(index.stats());

    // the reverse term map is rebuilt too, so removal still prunes correctly
    copy.removeDocument("d1");
    expect(copy.getPostings("2024")).toBeUndefined();
    expect(copy.documentFrequency("zeta")).toBe(1);
  });
});
