import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, problemFromError, type FieldError, type Problem } from "./problem.js";
import { asString, isRecord, optionalString, parseIntParam, pushErr } from "./validation.js";
import type { MemorySearchEngine } from "../core/impl/memorySearchEngine.js";
import type { DocumentRecord } from "../core/types.js";
import type { AppConfig } from "../config.js";
import { createLogger, type Logger } from "../logger.js";

const SERVICE = "termindex";
const VERSION = "0.1.0";

const MAX_ID_LENGTH = 256;
const MAX_CONTENT_LENGTH = 200_000;
const MAX_QUERY_LENGTH = 200;
const SNIPPET_LENGTH = 200;
const DEFAULT_SAMPLE = 20;
const MAX_SAMPLE = 1000;

export interface ServerOptions {
  engine: MemorySearchEngine;
  config: Pick<AppConfig, "autosave" | "search">;
  logger?: Logger;
}

type Handler = (ctx: RequestContext) => Promise<void>;

interface RequestContext {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  url: URL;
  requestId: string;
  params: string[];
}

interface Route {
  pattern: RegExp;
  methods: Partial<Record<string, Handler>>;
}

export function snippet(content: string): string {
  return content.length > SNIPPET_LENGTH ? `${content.slice(0, SNIPPET_LENGTH)}...` : content;
}

export function roundScore(score: number): number {
  return Math.round(score * 10_000) / 10_000;
}

function documentBody(doc: DocumentRecord) {
  return {
    id: doc.id,
    title: doc.title,
    author: doc.author,
    content: doc.content,
    totalTerms: doc.totalTerms,
    uniqueTerms: doc.uniqueTerms,
    addedAt: new Date(doc.addedAt).toISOString(),
  };
}

export function createServer(opts: ServerOptions): http.Server {
  const start = Date.now();
  const { engine, config } = opts;
  const log = opts.logger ?? createLogger("http");

  /** Persists after a mutation when autosave is on; a failed save is reported, not fatal. */
  async function autosave(): Promise<boolean | null> {
    if (!config.autosave) return null;
    const saved = await engine.save();
    if (!saved.ok) {
      log.warn(`Autosave failed: ${saved.error.message}`);
      return false;
    }
    return true;
  }

  const routes: Route[] = [
    {
      pattern: /^\/$/,
      methods: {
        GET: async ({ res }) =>
          sendJson(res, 200, {
            message: "Document search service",
            version: VERSION,
            endpoints: {
              upload: "POST /documents",
              document: "GET|DELETE /documents/{id}",
              search: "GET /search?query=&limit=",
              index: "GET|DELETE /index",
              save: "POST /index/save",
              health: "GET /health",
            },
          }),
      },
    },
    {
      pattern: /^\/health$/,
      methods: {
        GET: async ({ res }) =>
          sendJson(res, 200, { status: "ok", service: SERVICE, version: VERSION, uptimeMs: Date.now() - start }),
      },
    },
    {
      pattern: /^\/documents$/,
      methods: {
        POST: async ({ req, res, url, requestId }) => {
          if (!isJson(req)) {
            return sendProblem(res, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
          }
          const body = await readJson(req);
          if (!isRecord(body)) {
            return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be a JSON object", instance: url.pathname, requestId }));
          }

          const errors: FieldError[] = [];
          const id = asString(body.id);
          if (!id || !id.trim()) pushErr(errors, "$.id", "must be a non-empty string");
          else if (id.length > MAX_ID_LENGTH) pushErr(errors, "$.id", `must be at most ${MAX_ID_LENGTH} characters`);
          const content = asString(body.content);
          if (content === undefined || !content.length) pushErr(errors, "$.content", "must be a non-empty string");
          else if (content.length > MAX_CONTENT_LENGTH) pushErr(errors, "$.content", "too long");
          const title = optionalString(errors, body, "title", 500);
          const author = optionalString(errors, body, "author", 200);

          if (errors.length || id === undefined || content === undefined) {
            return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
          }

          const added = await engine.addDocument({ id, content, title, author });
          if (!added.ok) {
            return sendProblem(res, problemFromError(added.error, url.pathname, requestId));
          }

          const persisted = await autosave();
          const stats = await engine.stats();
          return sendJson(res, 201, {
            message: "Document uploaded successfully",
            id,
            indexedTerms: added.value.uniqueTerms,
            totalDocuments: stats.totalDocuments,
            persisted,
          });
        },
      },
    },
    {
      pattern: /^\/documents\/([^/]+)$/,
      methods: {
        GET: async ({ res, url, requestId, params }) => {
          const id = params[0] ?? "";
          const doc = await engine.getDocument(id);
          if (!doc) {
            return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: `document ${id} not found`, instance: url.pathname, requestId }));
          }
          return sendJson(res, 200, documentBody(doc));
        },
        DELETE: async ({ res, url, requestId, params }) => {
          const id = params[0] ?? "";
          const removed = await engine.removeDocument(id);
          if (!removed.ok) {
            return sendProblem(res, problemFromError(removed.error, url.pathname, requestId));
          }

          const persisted = await autosave();
          const stats = await engine.stats();
          return sendJson(res, 200, { message: "Document deleted successfully", id, totalDocuments: stats.totalDocuments, persisted });
        },
      },
    },
    {
      pattern: /^\/search$/,
      methods: {
        GET: async ({ res, url, requestId }) => {
          const started = performance.now();
          const errors: FieldError[] = [];

          const query = url.searchParams.get("query") ?? "";
          if (!query.trim()) pushErr(errors, "query", "must be non-empty");
          else if (query.length > MAX_QUERY_LENGTH) pushErr(errors, "query", `must be at most ${MAX_QUERY_LENGTH} characters`);

          const rawLimit = url.searchParams.get("limit");
          const limit = rawLimit === null ? config.search.defaultLimit : parseIntParam(rawLimit);
          if (limit === undefined || limit < 1 || limit > config.search.maxLimit) {
            pushErr(errors, "limit", `must be an integer between 1 and ${config.search.maxLimit}`);
          }

          if (errors.length || limit === undefined) {
            return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
          }

          const found = await engine.search(query, limit);
          if (!found.ok) {
            return sendProblem(res, problemFromError(found.error, url.pathname, requestId));
          }

          const results = found.value.map((hit) => ({
            id: hit.docId,
            score: roundScore(hit.score),
            title: hit.document.title,
            author: hit.document.author,
            snippet: snippet(hit.document.content),
          }));
          return sendJson(res, 200, {
            query,
            results,
            totalResults: results.length,
            tookMs: Math.round((performance.now() - started) * 100) / 100,
          });
        },
      },
    },
    {
      pattern: /^\/index$/,
      methods: {
        GET: async ({ res, url, requestId }) => {
          const rawSample = url.searchParams.get("sample");
          const sample = rawSample === null ? DEFAULT_SAMPLE : parseIntParam(rawSample);
          if (sample === undefined || sample < 0 || sample > MAX_SAMPLE) {
            return sendProblem(res, problem({
              status: 400,
              code: "INVALID_ARGUMENT",
              detail: "invalid request",
              instance: url.pathname,
              requestId,
              errors: [{ path: "sample", message: `must be an integer between 0 and ${MAX_SAMPLE}` }],
            }));
          }

          const [stats, storage, terms] = await Promise.all([engine.stats(), engine.info(), engine.sampleTerms(sample)]);
          return sendJson(res, 200, {
            stats,
            storage,
            sampleTerms: terms.map((t) => ({ term: t.term, documents: t.postings })),
          });
        },
        DELETE: async ({ res, url, requestId }) => {
          await engine.clear();
          const deleted = await engine.deleteAll();
          if (!deleted.ok) {
            return sendProblem(res, problemFromError(deleted.error, url.pathname, requestId));
          }
          return sendJson(res, 200, { message: "Index cleared", removedFiles: deleted.value.removed });
        },
      },
    },
    {
      pattern: /^\/index\/save$/,
      methods: {
        POST: async ({ res, url, requestId }) => {
          const saved = await engine.save();
          if (!saved.ok) {
            return sendProblem(res, problemFromError(saved.error, url.pathname, requestId));
          }
          return sendJson(res, 200, { message: "Index saved", savedAt: saved.value.savedAt });
        },
      },
    },
  ];

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const started = Date.now();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    res.on("finish", () => {
      log.debug(`${req.method} ${url.pathname} ${res.statusCode} ${Date.now() - started}ms`);
    });

    try {
      for (const route of routes) {
        const match = route.pattern.exec(url.pathname);
        if (!match) continue;

        const handler = route.methods[req.method ?? "GET"];
        if (!handler) {
          res.setHeader("allow", Object.keys(route.methods).join(", "));
          return sendProblem(res, problem({ status: 405, code: "METHOD_NOT_ALLOWED", detail: `${req.method} not allowed`, instance: url.pathname, requestId }));
        }
        return await handler({ req, res, url, requestId, params: match.slice(1).map(decodeURIComponent) });
      }

      return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      if (e instanceof SyntaxError || e instanceof URIError) {
        return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: e.message, instance: url.pathname, requestId }));
      }
      log.error(`Unhandled error on ${req.method} ${url.pathname} [${requestId}]:`, e);
      return sendProblem(res, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions & { port?: number; host?: string }): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, opts.host, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  return raw.length ? JSON.parse(raw) : null;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
