import fetch, { Response } from "node-fetch";
import { setTimeout as sleep } from "node:timers/promises";
import { Logger } from "../../config/logger";
import { UnavailableError, errorMessage } from "../../shared/errors";
import { Collection } from "../../shared/types/document.types";
import { isRecord } from "../../shared/utils/type-guards";
import { SearchHit, SearchIndex, SearchIndexHealth, SearchQuery, StoredDocument } from "./search-index";

interface ElasticsearchGetResponse {
  _id?: string;
  found?: boolean;
  _source?: unknown;
}

interface ElasticsearchMgetResponse {
  docs?: ElasticsearchGetResponse[];
}

interface ElasticsearchSearchResponse {
  hits?: {
    hits?: Array<{
      _id?: string;
      _score?: number | null;
    }>;
  };
}

export interface ElasticsearchClientConfig {
  baseUrl: string;
  apiKey?: string;
  indices: Record<Collection, string>;
}

export class ElasticsearchClient implements SearchIndex {
  private readonly baseUrl: string;

  constructor(
    private readonly config: ElasticsearchClientConfig,
    private readonly logger: Logger,
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
  }

  async getDocument(collection: Collection, id: string): Promise<Record<string, unknown> | null> {
    const index = this.indexFor(collection);
    const response = await this.request<ElasticsearchGetResponse>(
      "GET",
      `/${encodeURIComponent(index)}/_doc/${encodeURIComponent(id)}`,
    );
    if (!response.ok) {
      if (response.status === 404) {
        this.logger.debug("Document not found", { index, id });
        return null;
      }
      throw new Error(`Elasticsearch request failed: HTTP ${response.status} - ${response.body}`);
    }
    return isRecord(response.data._source) ? response.data._source : null;
  }

  async getDocuments(collection: Collection, ids: ReadonlyArray<string>): Promise<StoredDocument[]> {
    if (ids.length === 0) {
      return [];
    }
    const index = this.indexFor(collection);
    const response = await this.request<ElasticsearchMgetResponse>(
      "POST",
      `/${encodeURIComponent(index)}/_mget`,
      { ids: [...ids] },
    );
    if (!response.ok) {
      throw new Error(`Elasticsearch request failed: HTTP ${response.status} - ${response.body}`);
    }

    const documents: StoredDocument[] = [];
    for (const doc of response.data.docs ?? []) {
      if (!doc.found || typeof doc._id !== "string" || !isRecord(doc._source)) {
        continue;
      }
      documents.push({ id: doc._id, source: doc._source });
    }
    return documents;
  }

  async search(collection: Collection, query: SearchQuery, maxResults: number): Promise<SearchHit[]> {
    const index = this.indexFor(collection);
    const response = await this.request<ElasticsearchSearchResponse>(
      "POST",
      `/${encodeURIComponent(index)}/_search`,
      {
        query,
        size: Math.max(1, Math.floor(maxResults)),
        _source: false,
      },
    );
    if (!response.ok) {
      throw new Error(`Elasticsearch search failed: HTTP ${response.status} - ${response.body}`);
    }

    const hits = response.data.hits?.hits;
    if (!Array.isArray(hits)) {
      return [];
    }
    return hits
      .filter((hit) => typeof hit._id === "string")
      .map((hit) => ({
        id: String(hit._id),
        score: typeof hit._score === "number" ? hit._score : 0,
      }));
  }

  async getHealth(): Promise<SearchIndexHealth> {
    const response = await this.request<Record<string, unknown>>("GET", "/_cluster/health");
    if (!response.ok) {
      return { status: "error", message: `HTTP ${response.status}` };
    }
    const status = typeof response.data.status === "string" ? response.data.status : "unknown";
    return { ...response.data, status };
  }

  async ping(): Promise<boolean> {
    try {
      const response = await this.send("HEAD", "/");
      return response.ok;
    } catch (error) {
      this.logger.debug("Elasticsearch ping failed", { error: errorMessage(error) });
      return false;
    }
  }

  /** Startup readiness probe with exponential backoff between attempts. */
  async waitUntilAvailable(attempts: number, delayMs: number): Promise<void> {
    for (let attempt = 0; attempt < attempts; attempt += 1) {
      if (await this.ping()) {
        this.logger.info("Connected to Elasticsearch", { baseUrl: this.baseUrl, attempt: attempt + 1 });
        return;
      }
      if (attempt < attempts - 1) {
        const waitMs = delayMs * 2 ** attempt;
        this.logger.warn("Elasticsearch not reachable yet, retrying", {
          attempt: attempt + 1,
          attempts,
          waitMs,
        });
        await sleep(waitMs);
      }
    }
    throw new UnavailableError(`Elasticsearch is not reachable at ${this.baseUrl}`);
  }

  private indexFor(collection: Collection): string {
    return this.config.indices[collection];
  }

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    body?: Record<string, unknown>,
  ): Promise<{ ok: true; data: T } | { ok: false; status: number; body: string }> {
    const response = await this.send(method, path, body);
    if (!response.ok) {
      return {
        ok: false,
        status: response.status,
        body: await response.text(),
      };
    }
    return {
      ok: true,
      data: (await response.json()) as T,
    };
  }

  private async send(
    method: "GET" | "POST" | "HEAD",
    path: string,
    body?: Record<string, unknown>,
  ): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: this.headers(),
        body: body ? JSON.stringify(body) : undefined,
      });
    } catch (error) {
      throw new UnavailableError(`Elasticsearch is unavailable: ${errorMessage(error)}`);
    }
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
      accept: "application/json",
    };
    if (this.config.apiKey) {
      headers.authorization = `ApiKey ${this.config.apiKey}`;
    }
    return headers;
  }
}
