import { Agent, request, type Dispatcher } from "undici";
import { interruptibleSleep, type CancellationToken, type Sleep } from "./cancellation.js";
import type { ClientConfig } from "./config.js";
import { EntityApiError, type ApiErrorReason } from "./errors.js";
import { nullObserver, type TopologyObserver } from "./observer.js";
import { isRecord, toEntityPage, type EntityPage, type RawEntity } from "./types.js";

export const SERVICE_ENTITY_TYPE = "SERVICE";

const PROPERTY_FIELDS = [
  "+properties.serviceType",
  "+properties.webApplicationId",
  "+properties.webServerName",
  "+properties.remoteEndpoint",
  "+fromRelationships.runsOn",
];

/** Fields for by-id batches: properties plus outgoing calls. */
export const BATCH_FIELDS = [...PROPERTY_FIELDS, "+fromRelationships.calls"].join(",");

/** Fields for the full scan: both directions of the call relationship. */
export const SCAN_FIELDS = [...PROPERTY_FIELDS, "+fromRelationships.calls", "+toRelationships.called_by"].join(",");

const ERROR_DETAIL_LIMIT = 500;

const TLS_ERROR_CODES = new Set([
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "CERT_UNTRUSTED",
  "CERT_REVOKED",
]);

const TIMEOUT_ERROR_CODES = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "ETIMEDOUT",
]);

/** Remote access to service entities; every call honours the cancellation token. */
export interface EntityGateway {
  /** First page when `cursor` is undefined, otherwise the continuation page. */
  fetchPage(cursor: string | undefined, token: CancellationToken): Promise<EntityPage>;
  fetchByIds(ids: readonly string[], token: CancellationToken): Promise<unknown[]>;
  /** Resolves `null` when the entity does not exist. */
  fetchById(id: string, token: CancellationToken): Promise<RawEntity | null>;
  testConnection(token: CancellationToken): Promise<EntityPage>;
  /** Releases the connection pool; safe to call more than once. */
  close(): Promise<void>;
}

export interface GatewayOptions {
  /** Connection pool to use instead of a privately owned one. The caller keeps ownership. */
  dispatcher?: Dispatcher;
  observer?: TopologyObserver;
  sleep?: Sleep;
}

type TransientReason = Extract<ApiErrorReason, "rate-limit" | "server-error" | "connection" | "timeout">;

type Attempt =
  | { ok: true; body: unknown }
  | { ok: false; reason: TransientReason; statusCode: number; detail: string };

function errorCode(err: unknown): string | undefined {
  if (!isRecord(err)) return undefined;
  if (typeof err.code === "string") return err.code;
  return isRecord(err.cause) && typeof err.cause.code === "string" ? err.cause.code : undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isTlsFailure(code: string | undefined): boolean {
  if (!code) return false;
  return TLS_ERROR_CODES.has(code) || code.startsWith("ERR_TLS_") || code.startsWith("ERR_SSL_");
}

/** Entity-selector string literal; `~` is the selector escape character. */
function selectorLiteral(value: string): string {
  return `"${value.replace(/~/g, "~~").replace(/"/g, '~"')}"`;
}

export function serviceSelector(ids?: readonly string[]): string {
  const typeClause = `type(${selectorLiteral(SERVICE_ENTITY_TYPE)})`;
  if (!ids || ids.length === 0) return typeClause;
  return `${typeClause},entityId(${ids.map(selectorLiteral).join(",")})`;
}

function retryLabel(failure: Extract<Attempt, { ok: false }>): string {
  switch (failure.reason) {
    case "rate-limit":
      return "Rate limited (429)";
    case "server-error":
      return `Server error (${failure.statusCode})`;
    case "timeout":
      return "Request timeout";
    case "connection":
      return "Connection error";
  }
}

function exhaustedMessage(failure: Extract<Attempt, { ok: false }>, retries: number): string {
  switch (failure.reason) {
    case "rate-limit":
      return `Rate limit exceeded after ${retries} retries`;
    case "server-error":
      return `Server error after ${retries} retries: ${failure.detail}`;
    case "timeout":
      return `Request timeout after ${retries} retries`;
    case "connection":
      return `Connection failed after ${retries} retries: ${failure.detail}`;
  }
}

export class HttpEntityGateway implements EntityGateway {
  private readonly dispatcher: Dispatcher;
  private readonly ownedAgent?: Agent;
  private readonly observer: TopologyObserver;
  private readonly sleep: Sleep;
  private closed = false;

  constructor(private readonly config: ClientConfig, options: GatewayOptions = {}) {
    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
    } else {
      this.ownedAgent = new Agent({
        connect: { rejectUnauthorized: config.verifySsl },
        headersTimeout: config.requestTimeoutMs,
        bodyTimeout: config.requestTimeoutMs,
      });
      this.dispatcher = this.ownedAgent;
    }
    this.observer = options.observer ?? nullObserver;
    this.sleep = options.sleep ?? interruptibleSleep;
  }

  async fetchPage(cursor: string | undefined, token: CancellationToken): Promise<EntityPage> {
    // The API rejects filter parameters next to a cursor
    if (cursor) {
      return toEntityPage(await this.getJson(this.entitiesUrl({ nextPageKey: cursor }), token));
    }

    return toEntityPage(
      await this.getJson(
        this.entitiesUrl({
          entitySelector: serviceSelector(),
          fields: SCAN_FIELDS,
          pageSize: String(this.config.pageSize),
          ...this.timeframe(),
        }),
        token,
      ),
    );
  }

  async fetchByIds(ids: readonly string[], token: CancellationToken): Promise<unknown[]> {
    if (ids.length === 0) return [];
    if (ids.length > this.config.batchSize) {
      throw new RangeError(`Batch of ${ids.length} ids exceeds the batch size of ${this.config.batchSize}`);
    }

    let page = toEntityPage(
      await this.getJson(
        this.entitiesUrl({
          entitySelector: serviceSelector(ids),
          fields: BATCH_FIELDS,
          pageSize: String(ids.length),
          ...this.timeframe(),
        }),
        token,
      ),
    );
    const entities = [...page.entities];

    while (page.nextPageKey) {
      const cursor = page.nextPageKey;
      page = toEntityPage(await this.getJson(this.entitiesUrl({ nextPageKey: cursor }), token));
      entities.push(...page.entities);
      if (page.nextPageKey === cursor) {
        this.observer.onLog(`⚠ Server repeated page cursor ${cursor}; stopping pagination`, "warn");
        break;
      }
    }

    return entities;
  }

  async fetchById(id: string, token: CancellationToken): Promise<RawEntity | null> {
    let body: unknown;
    try {
      body = await this.getJson(`${this.config.baseUrl}/entities/${encodeURIComponent(id)}`, token);
    } catch (err) {
      if (err instanceof EntityApiError && err.kind === "not-found") return null;
      throw err;
    }

    if (!isRecord(body)) {
      throw new EntityApiError(`Unexpected response body for entity ${id}`, "non-retryable", "invalid-response", 200);
    }
    return body;
  }

  async testConnection(token: CancellationToken): Promise<EntityPage> {
    return toEntityPage(
      await this.getJson(this.entitiesUrl({ entitySelector: serviceSelector(), pageSize: "1" }), token),
    );
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.ownedAgent) await this.ownedAgent.close();
  }

  private timeframe(): Record<string, string> {
    const params: Record<string, string> = {};
    if (this.config.fromTime) params.from = this.config.fromTime;
    if (this.config.toTime) params.to = this.config.toTime;
    return params;
  }

  private entitiesUrl(params: Record<string, string>): string {
    return `${this.config.baseUrl}/entities?${new URLSearchParams(params).toString()}`;
  }

  /**
   * Attempting → Success | RetryWait | Failed. Transient failures sleep
   * min(initial * 2^k, max) before attempt k + 2; the retry budget is
   * `maxRetries`, so a call makes at most `maxRetries + 1` attempts.
   */
  private async getJson(url: string, token: CancellationToken): Promise<unknown> {
    let retries = 0;
    let backoffMs = this.config.initialBackoffMs;

    for (;;) {
      token.throwIfCancelled();
      if (this.closed) {
        throw new EntityApiError("Gateway is closed", "non-retryable", "connection");
      }

      const attempt = await this.attempt(url);
      if (attempt.ok) return attempt.body;

      retries += 1;
      if (retries > this.config.maxRetries) {
        throw new EntityApiError(
          exhaustedMessage(attempt, this.config.maxRetries),
          "exhausted",
          attempt.reason,
          attempt.statusCode,
        );
      }

      token.throwIfCancelled();
      const waitMs = Math.min(backoffMs, this.config.maxBackoffMs);
      this.observer.onLog(
        `⚠ ${retryLabel(attempt)}. Retry ${retries}/${this.config.maxRetries} after ${(waitMs / 1000).toFixed(1)}s`,
        "warn",
      );
      await this.sleep(waitMs, token);
      backoffMs = Math.min(backoffMs * 2, this.config.maxBackoffMs);
    }
  }

  private async attempt(url: string): Promise<Attempt> {
    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, {
        method: "GET",
        headers: {
          authorization: `Api-Token ${this.config.apiToken}`,
          accept: "application/json",
        },
        dispatcher: this.dispatcher,
        headersTimeout: this.config.requestTimeoutMs,
        bodyTimeout: this.config.requestTimeoutMs,
      });
    } catch (err) {
      return this.transportFailure(err);
    }

    const { statusCode, body } = response;
    if (statusCode === 200) {
      try {
        return { ok: true, body: await body.json() };
      } catch (err) {
        if (TIMEOUT_ERROR_CODES.has(errorCode(err) ?? "")) return this.transportFailure(err);
        throw new EntityApiError(`Invalid JSON response: ${errorMessage(err)}`, "non-retryable", "invalid-response", 200);
      }
    }

    const text = await body.text().catch(() => "");
    const detail = text.slice(0, ERROR_DETAIL_LIMIT) || "No error details";

    if (statusCode === 429) return { ok: false, reason: "rate-limit", statusCode, detail };
    if (statusCode >= 500) return { ok: false, reason: "server-error", statusCode, detail };
    if (statusCode === 404) throw new EntityApiError(detail, "not-found", "not-found", 404);
    if (statusCode >= 400) throw new EntityApiError(detail, "non-retryable", "client-error", statusCode);
    throw new EntityApiError(`Unexpected status ${statusCode}: ${detail}`, "non-retryable", "invalid-response", statusCode);
  }

  private transportFailure(err: unknown): Attempt {
    const code = errorCode(err);
    if (isTlsFailure(code)) {
      throw new EntityApiError(
        `SSL error: ${errorMessage(err)}. Try disabling SSL verification if the server uses a self-signed certificate.`,
        "non-retryable",
        "tls",
      );
    }
    const reason: TransientReason = code && TIMEOUT_ERROR_CODES.has(code) ? "timeout" : "connection";
    return { ok: false, reason, statusCode: 0, detail: errorMessage(err) };
  }
}
