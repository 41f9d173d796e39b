/**
 * Single-shot companions of the streamed agent: plain SQL execution,
 * semantic search and natural-language query answering.
 *
 * None of these stream or keep state between calls. Pipelines usually bring
 * their own implementations; the HTTP classes below are thin defaults that
 * POST JSON with bearer auth.
 */

import { z } from "zod";
import type { Credentials } from "./transport.js";
import { DecodeError } from "./types/index.js";
import { httpPost, mapHttpError, type HttpResponse } from "./utils/index.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export type SqlResult =
  | { kind: "rows"; columns: string[]; rows: unknown[][] }
  // large results are staged and returned by reference
  | { kind: "file"; fileRef: string };

export interface SqlExecutor {
  execute(statement: string): Promise<SqlResult>;
}

export interface SearchQuery {
  query: string;
  limit?: number;
  filter?: Record<string, unknown>;
}

export interface SearchHit {
  document: Record<string, unknown>;
  score?: number;
}

export interface SemanticSearch {
  /** Hits are ranked, best first. */
  search(query: SearchQuery): Promise<{ hits: SearchHit[] }>;
}

export interface SemanticAnswer {
  answer: string;
  /** The structured query the service generated and ran, if it reports one. */
  generatedQuery?: string;
}

export interface SemanticQueryExecutor {
  ask(question: string): Promise<SemanticAnswer>;
}

export interface HttpCollaboratorConfig {
  endpoint: string;
  credentials: Credentials;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
}

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const sqlResponseSchema = z.union([
  z.object({ columns: z.array(z.string()), rows: z.array(z.array(z.unknown())) }),
  z.object({ file_ref: z.string().min(1) }),
]);

const searchResponseSchema = z.object({
  results: z.array(
    z.object({
      document: z.record(z.unknown()),
      score: z.number().optional(),
    }),
  ),
});

const answerResponseSchema = z.object({
  answer: z.string(),
  generated_query: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Shared plumbing
// ---------------------------------------------------------------------------

abstract class HttpCollaborator {
  protected readonly config: HttpCollaboratorConfig;

  constructor(config: HttpCollaboratorConfig) {
    this.config = config;
  }

  /** POST and validate; non-2xx becomes a ConnectionError subclass. */
  protected async call<T>(
    body: unknown,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const { token, scheme = "Bearer" } = this.config.credentials;
    const res: HttpResponse = await httpPost(
      this.config.endpoint,
      body,
      { Accept: "application/json", Authorization: `${scheme} ${token}` },
      { timeout: this.config.timeout },
    );

    if (res.status < 200 || res.status >= 300) {
      throw mapHttpError(res.status, res.body, res.text, res.headers);
    }

    const parsed = schema.safeParse(res.body);
    if (!parsed.success) {
      throw new DecodeError(
        `Unexpected response from ${this.config.endpoint}`,
        { data: res.text },
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }
}

// ---------------------------------------------------------------------------
// HTTP defaults
// ---------------------------------------------------------------------------

export class HttpSqlExecutor extends HttpCollaborator implements SqlExecutor {
  async execute(statement: string): Promise<SqlResult> {
    const data = await this.call({ statement }, sqlResponseSchema);
    if ("file_ref" in data) return { kind: "file", fileRef: data.file_ref };
    return { kind: "rows", columns: data.columns, rows: data.rows };
  }
}

export class HttpSemanticSearch extends HttpCollaborator implements SemanticSearch {
  async search(query: SearchQuery): Promise<{ hits: SearchHit[] }> {
    const data = await this.call(
      { query: query.query, limit: query.limit ?? 10, filter: query.filter },
      searchResponseSchema,
    );
    return { hits: data.results };
  }
}

export class HttpSemanticQueryExecutor
  extends HttpCollaborator
  implements SemanticQueryExecutor
{
  async ask(question: string): Promise<SemanticAnswer> {
    const data = await this.call({ question }, answerResponseSchema);
    return data.generated_query !== undefined
      ? { answer: data.answer, generatedQuery: data.generated_query }
      : { answer: data.answer };
  }
}
