import crypto from "node:crypto";
import { ConfigError } from "./errors";

export type AuthMethod = "url" | "hmac";

export type Credentials =
  | { method: "url"; apiKey: string }
  | { method: "hmac"; clientId: string; secretKeyHex: string };

export type QueryParams = Record<string, string | number>;

export interface ApiRequest {
  relativeUrl: string; // e.g. "/lasereggs/<id>", always starts with "/"
  params?: QueryParams;
  body?: string;
}

export interface AuthorizedRequest {
  url: string;
  headers: Record<string, string>;
}

export const CLIENT_HEADER = "X-Kaiterra-Client";
export const TIME_HEADER = "X-Kaiterra-Time";
export const HMAC_HEADER = "X-Kaiterra-HMAC";

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

export function joinUrl(baseUrl: string, relativeUrlWithParams: string): string {
  return baseUrl.replace(/^\/+|\/+$/g, "") + relativeUrlWithParams;
}

// Form encoding, spaces become "+"
export function encodeParams(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [name, value] of Object.entries(params)) {
    search.append(name, String(value));
  }
  return search.toString();
}

function withParams(relativeUrl: string, params: QueryParams | undefined) {
  if (!params || Object.keys(params).length === 0) {
    return relativeUrl;
  }
  return `${relativeUrl}?${encodeParams(params)}`;
}

export function authorizeWithUrlKey(
  baseUrl: string,
  request: ApiRequest,
  apiKey: string
): AuthorizedRequest {
  const params: QueryParams = { ...request.params, key: apiKey };
  return {
    url: joinUrl(baseUrl, withParams(request.relativeUrl, params)),
    headers: {},
  };
}

export function buildSigningPayload(
  clientId: string,
  timeHex: string,
  relativeUrlWithParams: string,
  body = ""
): Buffer {
  return Buffer.concat([
    Buffer.from(`${CLIENT_HEADER}=${clientId}&${TIME_HEADER}=${timeHex}`, "utf8"),
    Buffer.from(relativeUrlWithParams, "utf8"),
    Buffer.from(body, "utf8"),
  ]);
}

export function signPayload(secretKeyHex: string, payload: Buffer): string {
  if (!HEX_PATTERN.test(secretKeyHex)) {
    throw new ConfigError("HMAC secret key must be an even-length hex string", [
      "KAITERRA_HMAC_SECRET_KEY",
    ]);
  }
  const key = Buffer.from(secretKeyHex, "hex");
  return crypto.createHmac("sha256", key).update(payload).digest("base64");
}

// Unix seconds as lower-case hex, the format the API expects in X-Kaiterra-Time
export function toTimeHex(now: Date): string {
  return Math.floor(now.getTime() / 1000).toString(16);
}

export function authorizeWithHmac(
  baseUrl: string,
  request: ApiRequest,
  clientId: string,
  secretKeyHex: string,
  now: Date
): AuthorizedRequest {
  const timeHex = toTimeHex(now);
  const relativeUrlWithParams = withParams(request.relativeUrl, request.params);
  const payload = buildSigningPayload(
    clientId,
    timeHex,
    relativeUrlWithParams,
    request.body
  );

  return {
    url: joinUrl(baseUrl, relativeUrlWithParams),
    headers: {
      [CLIENT_HEADER]: clientId,
      [TIME_HEADER]: timeHex,
      [HMAC_HEADER]: signPayload(secretKeyHex, payload),
    },
  };
}

export function authorizeRequest(
  baseUrl: string,
  request: ApiRequest,
  credentials: Credentials,
  now: Date = new Date()
): AuthorizedRequest {
  switch (credentials.method) {
    case "url":
      return authorizeWithUrlKey(baseUrl, request, credentials.apiKey);
    case "hmac":
      return authorizeWithHmac(
        baseUrl,
        request,
        credentials.clientId,
        credentials.secretKeyHex,
        now
      );
  }
}
