export const TOKEN_ENV_VAR = "DYNATRACE_API_TOKEN";
export const BASE_URL_ENV_VAR = "DYNATRACE_API_URL";

export const DEFAULT_BATCH_SIZE = 50;
export const MIN_BATCH_SIZE = 10;
export const MAX_BATCH_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 500;
export const MAX_PAGE_SIZE = 500;
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_INITIAL_BACKOFF_MS = 1_000;
export const DEFAULT_MAX_BACKOFF_MS = 60_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

/**
 * `managed` is the on-prem deployment, usually fronted by a self-signed
 * certificate, so SSL verification defaults off there.
 */
export type DeploymentProfile = "saas" | "managed";

export interface ClientConfig {
  baseUrl: string;
  apiToken: string;
  verifySsl: boolean;
  batchSize: number;
  pageSize: number;
  fromTime?: string;
  toTime?: string;
  maxRetries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  requestTimeoutMs: number;
}

/** Raw option values as commander hands them over. */
export interface ConnectionOptions {
  baseUrl?: string;
  token?: string;
  profile?: string;
  verifySsl?: boolean;
  batchSize?: string;
  pageSize?: string;
  from?: string;
  to?: string;
  maxRetries?: string;
  initialBackoff?: string;
  maxBackoff?: string;
  timeout?: string;
}

export type ConfigResult =
  | { ok: true; config: ClientConfig; warnings: string[] }
  | { ok: false; errors: string[] };

type Env = Record<string, string | undefined>;

function parseInteger(
  raw: string | undefined,
  flag: string,
  fallback: number,
  min: number,
  max: number,
  errors: string[],
): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = Number.isFinite(max) ? `between ${min} and ${max}` : `an integer >= ${min}`;
    errors.push(`Invalid ${flag}: ${raw}. Must be ${range}.`);
    return fallback;
  }
  return value;
}

function parseSeconds(raw: string | undefined, flag: string, fallbackMs: number, errors: string[]): number {
  if (raw === undefined || raw.trim() === "") return fallbackMs;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    errors.push(`Invalid ${flag}: ${raw}. Must be a positive number of seconds.`);
    return fallbackMs;
  }
  return Math.round(value * 1000);
}

function isDeploymentProfile(value: string): value is DeploymentProfile {
  return value === "saas" || value === "managed";
}

/** Blank values count as absent; anything else passes through untouched. */
function timeBound(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function resolveClientConfig(options: ConnectionOptions, env: Env = process.env): ConfigResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const baseUrl = (nonEmpty(options.baseUrl) ?? nonEmpty(env[BASE_URL_ENV_VAR]) ?? "").replace(/\/+$/, "");
  if (!baseUrl) {
    errors.push(`Base URL is required (--base-url or ${BASE_URL_ENV_VAR}).`);
  } else if (!/^https?:\/\//.test(baseUrl)) {
    errors.push(`Invalid base URL: ${baseUrl}. Must start with http:// or https://`);
  }

  const apiToken = nonEmpty(options.token) ?? nonEmpty(env[TOKEN_ENV_VAR]) ?? "";
  if (!apiToken) {
    errors.push(`API token not found. Set the ${TOKEN_ENV_VAR} environment variable.`);
  }

  const rawProfile = options.profile ?? "saas";
  const profile = isDeploymentProfile(rawProfile) ? rawProfile : undefined;
  if (!profile) {
    errors.push(`Invalid --profile: ${rawProfile}. Must be "saas" or "managed".`);
  }
  const verifySsl = options.verifySsl ?? profile !== "managed";
  if (!verifySsl) {
    warnings.push("SSL certificate verification is DISABLED");
  }

  const batchSize = parseInteger(options.batchSize, "--batch-size", DEFAULT_BATCH_SIZE, MIN_BATCH_SIZE, MAX_BATCH_SIZE, errors);
  const pageSize = parseInteger(options.pageSize, "--page-size", DEFAULT_PAGE_SIZE, 1, MAX_PAGE_SIZE, errors);
  const maxRetries = parseInteger(options.maxRetries, "--max-retries", DEFAULT_MAX_RETRIES, 0, Infinity, errors);
  const initialBackoffMs = parseSeconds(options.initialBackoff, "--initial-backoff", DEFAULT_INITIAL_BACKOFF_MS, errors);
  const maxBackoffMs = parseSeconds(options.maxBackoff, "--max-backoff", DEFAULT_MAX_BACKOFF_MS, errors);
  const requestTimeoutMs = parseSeconds(options.timeout, "--timeout", DEFAULT_REQUEST_TIMEOUT_MS, errors);

  if (maxBackoffMs < initialBackoffMs) {
    errors.push("--max-backoff must not be smaller than --initial-backoff.");
  }

  if (errors.length > 0) return { ok: false, errors };

  const config: ClientConfig = {
    baseUrl,
    apiToken,
    verifySsl,
    batchSize,
    pageSize,
    maxRetries,
    initialBackoffMs,
    maxBackoffMs,
    requestTimeoutMs,
  };
  // Time bounds are opaque to us ("now-7d", ISO timestamps, epoch millis)
  const fromTime = timeBound(options.from);
  const toTime = timeBound(options.to);
  if (fromTime) config.fromTime = fromTime;
  if (toTime) config.toTime = toTime;

  return { ok: true, config, warnings };
}
