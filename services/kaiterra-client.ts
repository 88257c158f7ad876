import axios, { type AxiosInstance } from "axios";
import type { AppConfig } from "../config/env";
import { maskSecret } from "../config/env";
import { KaiterraApiError } from "./errors";
import {
  authorizeRequest,
  HMAC_HEADER,
  type Credentials,
  type QueryParams,
} from "./kaiterra-auth";

export type HttpVerb = "get" | "post" | "put";

export interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
}

export interface KaiterraClientOptions {
  baseUrl: string;
  credentials: Credentials;
  timeoutMs?: number;
  http?: AxiosInstance;
  now?: () => Date;
}

// Hides the developer key in URLs before they are logged or returned
export function maskUrl(url: string): string {
  return url.replace(/([?&]key=)[^&]*/, "$1***");
}

function maskHeaders(headers: Record<string, string>) {
  const masked = { ...headers };
  if (masked[HMAC_HEADER]) {
    masked[HMAC_HEADER] = maskSecret(masked[HMAC_HEADER]);
  }
  return masked;
}

function responseText(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === null || data === undefined) return "";
  return JSON.stringify(data);
}

export class KaiterraClient {
  private readonly http: AxiosInstance;
  private readonly now: () => Date;
  readonly baseUrl: string;
  readonly credentials: Credentials;
  readonly timeoutMs: number;

  constructor(options: KaiterraClientOptions) {
    this.baseUrl = options.baseUrl;
    this.credentials = options.credentials;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.http = options.http ?? axios.create();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Sends an authorized request and returns the decoded JSON body, or null
   * when the API answers with an empty body. Any status outside 2xx throws
   * a KaiterraApiError; redirects are not followed.
   */
  async request(
    verb: HttpVerb,
    relativeUrl: string,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const body =
      options.body === undefined
        ? ""
        : typeof options.body === "string"
        ? options.body
        : JSON.stringify(options.body);

    const authorized = authorizeRequest(
      this.baseUrl,
      { relativeUrl, params: options.params, body },
      this.credentials,
      this.now()
    );
    const headers: Record<string, string> = { ...authorized.headers };
    if (body.length > 0) {
      headers["Content-Type"] = "application/json";
    }

    const loggedUrl = maskUrl(authorized.url);
    console.log(`http: Fetching:   ${verb.toUpperCase()} ${loggedUrl}`);
    console.log("http: Parameters:", options.params ?? {});
    console.log("http: Headers:   ", maskHeaders(headers));

    const response = await this.http.request({
      method: verb,
      url: authorized.url,
      data: body.length > 0 ? body : undefined,
      headers,
      timeout: this.timeoutMs,
      maxRedirects: 0,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });

    const text = responseText(response.data);
    console.log(
      `http: Status (${response.status}), ${Buffer.byteLength(
        text,
        "utf8"
      )} bytes returned`
    );
    if (text.length > 0) {
      console.log(text);
    }

    if (response.status < 200 || response.status >= 300) {
      console.error(`http: Request to ${loggedUrl} failed`);
      throw new KaiterraApiError(response.status, loggedUrl, text);
    }

    if (text.length === 0) {
      return null;
    }
    const parsed: unknown = JSON.parse(text);
    return parsed;
  }

  getLaserEgg(id: string): Promise<unknown> {
    return this.request("get", `/lasereggs/${encodeURIComponent(id)}`);
  }

  getSensedge(id: string): Promise<unknown> {
    return this.request("get", `/sensedges/${encodeURIComponent(id)}`);
  }
}

export function createClientFromConfig(
  config: AppConfig,
  http?: AxiosInstance
): KaiterraClient {
  console.log(
    `Kaiterra client using ${config.credentials.method} auth against ${config.apiBaseUrl}`
  );
  return new KaiterraClient({
    baseUrl: config.apiBaseUrl,
    credentials: config.credentials,
    timeoutMs: config.timeoutMs,
    http,
  });
}
