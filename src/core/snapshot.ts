import { z } from "zod";
import type { IndexState } from "./invertedIndex.js";

export const SNAPSHOT_VERSION = "1.0";

const count = z.number().int().nonnegative();

export const DocumentRecordSchema = z.object({
  id: z.string(),
  content: z.string(),
  title: z.string(),
  author: z.string().nullable(),
  totalTerms: count,
  uniqueTerms: count,
  addedAt: z.number(),
});

/**
 * On-disk snapshot. Maps are stored as entry lists so that key order, which
 * JSON objects do not keep for integer-like keys, survives a round trip.
 */
export const IndexSnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    saved_at: z.string().datetime(),
    index: z.array(z.tuple([z.string(), z.array(z.tuple([z.string(), count.min(1)])).min(1)])),
    documents: z.array(z.tuple([z.string(), DocumentRecordSchema])),
    term_stats: z.array(z.tuple([z.string(), count.min(1)])),
    total_documents: count,
    total_terms: count,
  })
  .superRefine((snap, ctx) => {
    const report = (path: string, message: string) => ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message });

    const docIds = new Set<string>();
    for (const [key, record] of snap.documents) {
      if (docIds.has(key)) report("documents", `duplicate document ${key}`);
      else if (key !== record.id) report("documents", `key ${key} does not match record id ${record.id}`);
      docIds.add(key);
    }

    const terms = new Set<string>();
    for (const [term, postings] of snap.index) {
      if (terms.has(term)) report("index", `duplicate term "${term}"`);
      terms.add(term);

      const posted = new Set<string>();
      for (const [docId] of postings) {
        if (posted.has(docId)) report("index", `duplicate posting of "${term}" for document ${docId}`);
        else if (!docIds.has(docId)) report("index", `posting for unknown document ${docId}`);
        posted.add(docId);
      }
    }

    const df = new Map<string, number>();
    for (const [term, frequency] of snap.term_stats) {
      if (df.has(term)) report("term_stats", `duplicate term "${term}"`);
      else if (!terms.has(term)) report("term_stats", `term "${term}" has no postings`);
      df.set(term, frequency);
    }

    if (snap.total_documents !== snap.documents.length) report("total_documents", "does not match documents");
    if (snap.total_terms !== snap.index.length) report("total_terms", "does not match index");

    if (df.size !== terms.size) {
      report("term_stats", "term set differs from index");
      return;
    }
    for (const [term, postings] of snap.index) {
      if (df.get(term) !== postings.length) report("term_stats", `document frequency of "${term}" is inconsistent`);
    }
  });

export type IndexSnapshot = z.infer<typeof IndexSnapshotSchema>;

export function toSnapshot(state: IndexState, savedAt: string): IndexSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    saved_at: savedAt,
    index: state.postings,
    documents: state.documents,
    term_stats: state.termStats,
    total_documents: state.totalDocuments,
    total_terms: state.totalTerms,
  };
}

export function fromSnapshot(snapshot: IndexSnapshot): IndexState {
  return {
    postings: snapshot.index,
    documents: snapshot.documents,
    termStats: snapshot.term_stats,
    totalDocuments: snapshot.total_documents,
    totalTerms: snapshot.total_terms,
  };
}

export function emptyState(): IndexState {
  return { postings: [], documents: [], termStats: [], totalDocuments: 0, totalTerms: 0 };
}

export type ParsedSnapshot = { ok: true; snapshot: IndexSnapshot } | { ok: false; reason: string };

/** Parses and validates raw snapshot text. Never throws. */
export function parseSnapshot(raw: string): ParsedSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const result = IndexSnapshotSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length ? issue.path.join(".") : "$";
    return { ok: false, reason: `${where}: ${issue?.message ?? "invalid snapshot"}` };
  }
  return { ok: true, snapshot: result.data };
}
