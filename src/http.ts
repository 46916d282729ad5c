import { setTimeout as delay } from "node:timers/promises";
import pLimit from "p-limit";
import type { Logger } from "./log.js";
import { readField, toCrawlEntity, toNullableId } from "./records.js";
import type {
  ApiError,
  ApiParams,
  ApiResponse,
  CrawlEntity,
  HttpMethod,
  UpdateStatus
} from "./types.js";

export interface ApiClientOptions {
  apiUrl: string;
  accessToken: string;
  timeoutMs: number;
  maxConcurrentRequests: number;
  log?: Logger;
  fetch?: typeof fetch;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

/**
 * The calls the crawler makes against the remote API. `ApiClient` is the
 * network implementation; tests substitute an in-memory one.
 */
export interface RemoteApi {
  call(method: HttpMethod, path: string, params: ApiParams, signal?: AbortSignal): Promise<ApiResponse>;
  getItem(path: string, params: ApiParams, signal?: AbortSignal): Promise<CrawlEntity | null>;
  requestUpdate(path: string, params: ApiParams, signal?: AbortSignal): Promise<string>;
  getUpdateStatus(path: string, params: ApiParams, signal?: AbortSignal): Promise<UpdateStatus>;
}

export interface ApiRequestErrorDetails {
  status: string;
  path: string;
  code?: string | null;
}

/**
 * Represent a non-success answer from the API that retrying will not fix.
 */
export class ApiRequestError extends Error {
  readonly status: string;
  readonly path: string;
  readonly code: string | null;

  constructor(message: string, details: ApiRequestErrorDetails) {
    super(message);
    this.name = "ApiRequestError";
    this.status = details.status;
    this.path = details.path;
    this.code = details.code ?? null;
  }
}

const NOT_FOUND_CODE = "NotFoundError";
const MAX_BACKOFF_STEPS = 5;

const UPDATE_STATUSES = new Set<string>(["created", "pending", "finished", "failed", "fail", "unknown"]);

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT"
]);

/**
 * Jittered linear backoff: `min(attempt, 5) * uniform(0.75, 1.25)` seconds.
 */
export function backoffDelayMs(attempt: number, random: () => number = Math.random): number {
  const jitter = 0.75 + random() * 0.5;
  return Math.min(Math.max(0, attempt), MAX_BACKOFF_STEPS) * jitter * 1000;
}

/**
 * Check whether a fetch failure is a connection-level hiccup worth retrying.
 */
export function isTransientNetworkError(error: unknown): boolean {
  let current: unknown = error;
  let depth = 0;
  while (current && typeof current === "object" && depth < 3) {
    const code = readField(current, "code");
    if (typeof code === "string" && TRANSIENT_CODES.has(code.toUpperCase())) {
      return true;
    }
    if (current instanceof TypeError && current.message === "fetch failed") {
      return true;
    }
    current = readField(current, "cause");
    depth += 1;
  }
  return false;
}

/**
 * Sleep that rejects with the signal's own reason when cancelled.
 */
export function sleepFor(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal }).catch((error: unknown) => {
    throw signal?.aborted ? signal.reason : error;
  });
}

export function cleanParams(params: ApiParams): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    if (typeof value === "boolean") {
      cleaned[key] = value ? "1" : "0";
    } else {
      cleaned[key] = String(value);
    }
  }
  return cleaned;
}

export class ApiClient implements RemoteApi {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly options: ApiClientOptions) {
    this.limit = pLimit(Math.max(1, options.maxConcurrentRequests));
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? sleepFor;
    this.random = options.random ?? Math.random;
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  /**
   * Issue one logical request. Timeouts, dropped connections and 429 answers
   * are retried without a cap; every other answer is returned as parsed.
   */
  call(method: HttpMethod, path: string, params: ApiParams, signal?: AbortSignal): Promise<ApiResponse> {
    return this.limit(() => this.callWithRetry(method, path, params, signal));
  }

  async getItem(path: string, params: ApiParams, signal?: AbortSignal): Promise<CrawlEntity | null> {
    const resp = await this.call("get", path, params, signal);
    if (resp.status === "fail" && resp.error?.code === NOT_FOUND_CODE) {
      return null;
    }
    if (resp.status !== "ok") {
      throw failure("Failed to get item", resp, path);
    }
    const item = toCrawlEntity(resp.data);
    if (!item) {
      throw new ApiRequestError(`Failed to get item: response has no id, url=${path}`, {
        status: resp.status,
        path
      });
    }
    return item;
  }

  async requestUpdate(path: string, params: ApiParams, signal?: AbortSignal): Promise<string> {
    const updatePath = `${path}/update`;
    const resp = await this.call("post", updatePath, params, signal);
    if (resp.status !== "accepted") {
      throw failure("Failed to request update", resp, updatePath);
    }
    const taskId = toNullableId(readField(resp.data, "task_id"));
    if (!taskId) {
      throw new ApiRequestError(`Failed to request update: response has no task_id, url=${updatePath}`, {
        status: resp.status,
        path: updatePath
      });
    }
    return taskId;
  }

  async getUpdateStatus(path: string, params: ApiParams, signal?: AbortSignal): Promise<UpdateStatus> {
    const updatePath = `${path}/update`;
    const resp = await this.call("get", updatePath, params, signal);
    if (resp.status !== "ok") {
      throw failure("Failed to get update status", resp, updatePath);
    }
    const status = readField(resp.data, "status");
    return isUpdateStatus(status) ? status : "unknown";
  }

  private buildUrl(path: string, query: Record<string, string>): string {
    const base = this.options.apiUrl.replace(/\/+$/, "");
    const search = new URLSearchParams({ ...query, access_token: this.options.accessToken });
    return `${base}/${path.replace(/^\/+/, "")}?${search.toString()}`;
  }

  private async callWithRetry(
    method: HttpMethod,
    path: string,
    params: ApiParams,
    signal?: AbortSignal
  ): Promise<ApiResponse> {
    const query = cleanParams(params);
    const url = this.buildUrl(path, query);
    const paramsText = JSON.stringify(query);

    for (let attempt = 0; ; attempt += 1) {
      signal?.throwIfAborted();
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
      const forwardAbort = () => controller.abort(signal?.reason);
      signal?.addEventListener("abort", forwardAbort, { once: true });

      let statusCode: number;
      let body: string;
      try {
        const response = await this.fetchImpl(url, {
          method: method.toUpperCase(),
          signal: controller.signal,
          headers: {
            accept: "application/json"
          }
        });
        statusCode = response.status;
        body = await response.text();
      } catch (error) {
        if (signal?.aborted) {
          throw signal.reason ?? error;
        }
        if (!controller.signal.aborted && !isTransientNetworkError(error)) {
          throw error;
        }
        this.options.log?.debug(
          `[http] ${method} TO attempt=${attempt} ${path} ${paramsText} reason=${describeError(error)}`
        );
        await this.sleep(backoffDelayMs(attempt, this.random), signal);
        continue;
      } finally {
        clearTimeout(timeout);
        signal?.removeEventListener("abort", forwardAbort);
      }

      if (statusCode === 429) {
        this.options.log?.debug(`[http] ${method} 429 attempt=${attempt} ${path} ${paramsText}`);
        await this.sleep(backoffDelayMs(attempt, this.random), signal);
        continue;
      }

      const resp = parseApiResponse(body, path);
      this.options.log?.debug(`[http] ${method} ${statusCode} ${resp.status} ${path} ${paramsText}`);
      return resp;
    }
  }
}

function parseApiResponse(body: string, path: string): ApiResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    throw new ApiRequestError(`Malformed API response: body is not JSON, url=${path}`, {
      status: "malformed",
      path
    });
  }
  const status = readField(payload, "status");
  if (typeof status !== "string") {
    throw new ApiRequestError(`Malformed API response: missing status, url=${path}`, {
      status: "malformed",
      path
    });
  }
  return {
    status,
    data: readField(payload, "data") ?? null,
    error: toApiError(readField(payload, "error"))
  };
}

function toApiError(value: unknown): ApiError | null {
  if (!value || typeof value !== "object") return null;
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  return {
    ...fields,
    code: typeof fields.code === "string" ? fields.code : undefined,
    message: typeof fields.message === "string" ? fields.message : undefined
  };
}

function failure(prefix: string, resp: ApiResponse, path: string): ApiRequestError {
  return new ApiRequestError(
    `${prefix}: status=${resp.status}, url=${path}, error=${JSON.stringify(resp.error)}`,
    { status: resp.status, path, code: resp.error?.code ?? null }
  );
}

function isUpdateStatus(value: unknown): value is UpdateStatus {
  return typeof value === "string" && UPDATE_STATUSES.has(value);
}

function describeError(error: unknown): string {
  const code = readField(readField(error, "cause"), "code") ?? readField(error, "code");
  if (typeof code === "string") return code;
  if (error instanceof Error) return error.name;
  return String(error);
}
