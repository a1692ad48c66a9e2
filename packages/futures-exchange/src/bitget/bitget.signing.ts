import crypto from "node:crypto";
import { stableStringify } from "@sigtrader/futures-core";
import type { HttpMethod } from "./bitget.types.js";

export function buildQueryString(query: Record<string, unknown> | undefined): string {
  if (!query) return "";
  return Object.entries(query)
    .filter(([, value]) => value !== undefined && value !== null)
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([key, value]) => `${key}=${encodeURIComponent(String(value))}`)
    .join("&");
}

export function buildPrehash(params: {
  timestamp: string;
  method: HttpMethod;
  path: string;
  queryString?: string;
  bodyString?: string;
}): string {
  const queryPart = params.queryString ? `?${params.queryString}` : "";
  const bodyPart = params.bodyString ?? "";
  return `${params.timestamp}${params.method.toUpperCase()}${params.path}${queryPart}${bodyPart}`;
}

export function signRequest(params: {
  timestamp: string;
  method: HttpMethod;
  path: string;
  query?: Record<string, unknown>;
  body?: unknown;
  secretKey: string;
}): string {
  const prehash = buildPrehash({
    timestamp: params.timestamp,
    method: params.method,
    path: params.path,
    queryString: buildQueryString(params.query),
    bodyString: params.method === "POST" ? stableStringify(params.body) : ""
  });

  return crypto.createHmac("sha256", params.secretKey).update(prehash).digest("base64");
}

export type BitgetCredentials = {
  apiKey: string;
  apiSecret: string;
  apiPassphrase: string;
};

export function buildRestHeaders(params: BitgetCredentials & {
  timestamp: string;
  method: HttpMethod;
  path: string;
  query?: Record<string, unknown>;
  body?: unknown;
}): Record<string, string> {
  const signature = signRequest({
    timestamp: params.timestamp,
    method: params.method,
    path: params.path,
    query: params.query,
    body: params.body,
    secretKey: params.apiSecret
  });

  return {
    "ACCESS-KEY": params.apiKey,
    "ACCESS-SIGN": signature,
    "ACCESS-TIMESTAMP": params.timestamp,
    "ACCESS-PASSPHRASE": params.apiPassphrase,
    "Content-Type": "application/json",
    locale: "en-US"
  };
}
