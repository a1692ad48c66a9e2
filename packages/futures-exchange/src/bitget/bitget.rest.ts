import { stableStringify } from "@sigtrader/futures-core";
import {
  BITGET_DEFAULT_REST_BASE_URL,
  BITGET_DEFAULT_RETRY_ATTEMPTS,
  BITGET_DEFAULT_RETRY_BASE_DELAY_MS,
  BITGET_DEFAULT_TIMEOUT_MS,
  BITGET_SUCCESS_CODE
} from "./bitget.constants.js";
import {
  BitgetApiError,
  BitgetAuthError,
  BitgetTransportError,
  isTransientBitgetError,
  toBitgetError
} from "./bitget.errors.js";
import { buildQueryString, buildRestHeaders } from "./bitget.signing.js";
import type {
  BitgetAdapterConfig,
  BitgetApiResponse,
  BitgetLogEntry,
  FetchLike,
  HttpMethod
} from "./bitget.types.js";

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function nowIso() {
  return new Date().toISOString();
}

function isApiResponse(value: unknown): value is BitgetApiResponse<unknown> {
  return typeof value === "object" && value !== null && "data" in value;
}

export type BitgetRestClientOptions = Pick<
  BitgetAdapterConfig,
  | "apiKey"
  | "apiSecret"
  | "apiPassphrase"
  | "restBaseUrl"
  | "timeoutMs"
  | "retryAttempts"
  | "retryBaseDelayMs"
  | "log"
  | "fetch"
>;

type RequestParams = {
  method: HttpMethod;
  endpoint: string;
  query?: Record<string, unknown>;
  body?: unknown;
  privateAuth: boolean;
};

export class BitgetRestClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly retryAttempts: number;
  readonly retryBaseDelayMs: number;

  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: BitgetRestClientOptions = {}) {
    this.baseUrl = (options.restBaseUrl ?? BITGET_DEFAULT_REST_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? BITGET_DEFAULT_TIMEOUT_MS;
    this.retryAttempts = Math.max(1, options.retryAttempts ?? BITGET_DEFAULT_RETRY_ATTEMPTS);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? BITGET_DEFAULT_RETRY_BASE_DELAY_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  private log(entry: Omit<BitgetLogEntry, "at">): void {
    if (!this.options.log) return;
    this.options.log({
      at: nowIso(),
      ...entry
    });
  }

  private buildHeaders(params: RequestParams): Record<string, string> {
    if (!params.privateAuth) {
      return { "Content-Type": "application/json", locale: "en-US" };
    }

    const { apiKey, apiSecret, apiPassphrase } = this.options;
    if (!apiKey || !apiSecret || !apiPassphrase) {
      throw new BitgetAuthError("Missing Bitget credentials", {
        endpoint: params.endpoint,
        method: params.method
      });
    }

    return buildRestHeaders({
      apiKey,
      apiSecret,
      apiPassphrase,
      timestamp: String(Date.now()),
      method: params.method,
      path: params.endpoint,
      query: params.query,
      body: params.body
    });
  }

  private async send(params: RequestParams): Promise<{ status: number; ok: boolean; payload: unknown }> {
    const queryString = buildQueryString(params.query);
    const url = `${this.baseUrl}${params.endpoint}${queryString ? `?${queryString}` : ""}`;
    const headers = this.buildHeaders(params);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(url, {
        method: params.method,
        headers,
        body: params.method === "POST" ? stableStringify(params.body) : undefined,
        signal: controller.signal
      });
      const text = await res.text();
      return { status: res.status, ok: res.ok, payload: text ? JSON.parse(text) : {} };
    } catch (error) {
      const aborted = controller.signal.aborted;
      throw new BitgetTransportError(
        aborted ? `Bitget request timed out after ${this.timeoutMs}ms` : `Bitget request failed: ${String(error)}`,
        { endpoint: params.endpoint, method: params.method }
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  private async doRequest<T>(params: RequestParams, attempt: number): Promise<T> {
    const startedAt = Date.now();
    const requestId = `${Date.now()}-${Math.random().toString(16).slice(2, 8)}`;

    try {
      const { status, ok, payload } = await this.send(params);
      const code = isApiResponse(payload) ? String(payload.code ?? "") : "";

      if (!ok || code !== BITGET_SUCCESS_CODE || !isApiResponse(payload)) {
        throw toBitgetError({
          endpoint: params.endpoint,
          method: params.method,
          status,
          code: code || String(status),
          message: (isApiResponse(payload) ? payload.msg : undefined) || `HTTP ${status}`,
          responseBody: payload
        });
      }

      this.log({
        endpoint: params.endpoint,
        method: params.method,
        durationMs: Date.now() - startedAt,
        attempt,
        status,
        code,
        ok: true,
        requestId
      });

      return payload.data as T;
    } catch (error) {
      const apiError = error instanceof BitgetApiError ? error : null;
      this.log({
        endpoint: params.endpoint,
        method: params.method,
        durationMs: Date.now() - startedAt,
        attempt,
        status: apiError?.options.status,
        code: apiError?.options.code,
        ok: false,
        message: String(error),
        requestId
      });
      throw error;
    }
  }

  private async withRetry<T>(fn: (attempt: number) => Promise<T>, maxAttempts = this.retryAttempts): Promise<T> {
    let attempt = 0;
    let lastError: unknown;

    while (attempt < maxAttempts) {
      attempt += 1;
      try {
        return await fn(attempt);
      } catch (error) {
        lastError = error;
        if (!isTransientBitgetError(error) || attempt >= maxAttempts) break;
        const delay = this.retryBaseDelayMs * 2 ** (attempt - 1);
        await sleep(delay);
      }
    }

    throw lastError;
  }

  async requestPublic<T>(
    method: HttpMethod,
    endpoint: string,
    query?: Record<string, unknown>
  ): Promise<T> {
    return this.withRetry((attempt) =>
      this.doRequest<T>(
        {
          method,
          endpoint,
          query,
          privateAuth: false
        },
        attempt
      )
    );
  }

  /**
   * `retry: false` sends the request once. Use it for calls that are not
   * idempotent: a timed-out order may still have been accepted.
   */
  async requestPrivate<T>(params: {
    method: HttpMethod;
    endpoint: string;
    query?: Record<string, unknown>;
    body?: unknown;
    retry?: boolean;
  }): Promise<T> {
    return this.withRetry((attempt) =>
      this.doRequest<T>(
        {
          method: params.method,
          endpoint: params.endpoint,
          query: params.query,
          body: params.body,
          privateAuth: true
        },
        attempt
      ),
      params.retry === false ? 1 : this.retryAttempts
    );
  }
}
