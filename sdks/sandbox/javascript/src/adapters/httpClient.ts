// Copyright 2026 Alibaba Group Holding Ltd.
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

export type QueryValue = string | number | boolean | undefined | null;

export interface ApiRequestOptions {
  /**
   * Values substituted into `{name}` placeholders of the path (URL-encoded).
   */
  pathParams?: Record<string, string | number>;
  query?: Record<string, QueryValue>;
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Result of one API call. `error` holds the decoded body of a non-2xx response.
 */
export interface ApiResult {
  data?: unknown;
  error?: unknown;
  response: Response;
}

export function joinUrl(baseUrl: string, pathname: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  const path = pathname.startsWith("/") ? pathname : `/${pathname}`;
  return `${base}${path}`;
}

function expandPath(path: string, params: Record<string, string | number> = {}): string {
  return path.replace(/\{(\w+)\}/g, (_, name: string) => {
    const v = params[name];
    if (v === undefined) throw new Error(`Missing path parameter: ${name}`);
    return encodeURIComponent(String(v));
  });
}

function buildQuery(query: Record<string, QueryValue> = {}): string {
  const qs = new URLSearchParams();
  for (const [k, v] of Object.entries(query)) {
    if (v === undefined || v === null) continue;
    qs.append(k, String(v));
  }
  const s = qs.toString();
  return s ? `?${s}` : "";
}

/**
 * Decode a response body: JSON when it parses, the raw text otherwise, `undefined` when empty.
 */
export async function readBody(res: Response): Promise<unknown> {
  if (res.status === 204) return undefined;
  const text = await res.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Minimal JSON-over-HTTP client bound to one base URL.
 *
 * Never throws on HTTP status; callers inspect {@link ApiResult} and map errors themselves.
 */
export class HttpClient {
  private readonly fetch: typeof fetch;

  constructor(
    readonly baseUrl: string,
    private readonly opts: { fetch?: typeof fetch; headers?: Record<string, string> } = {},
  ) {
    this.fetch = opts.fetch ?? fetch;
  }

  url(path: string, opts: Pick<ApiRequestOptions, "pathParams" | "query"> = {}): string {
    return `${joinUrl(this.baseUrl, expandPath(path, opts.pathParams))}${buildQuery(opts.query)}`;
  }

  GET(path: string, opts?: ApiRequestOptions): Promise<ApiResult> {
    return this.request("GET", path, opts);
  }

  POST(path: string, opts?: ApiRequestOptions): Promise<ApiResult> {
    return this.request("POST", path, opts);
  }

  DELETE(path: string, opts?: ApiRequestOptions): Promise<ApiResult> {
    return this.request("DELETE", path, opts);
  }

  private async request(method: string, path: string, opts: ApiRequestOptions = {}): Promise<ApiResult> {
    const headers: Record<string, string> = {
      "accept": "application/json",
      ...(this.opts.headers ?? {}),
      ...(opts.headers ?? {}),
    };
    let body: string | undefined;
    if (opts.body !== undefined) {
      headers["content-type"] = "application/json";
      body = JSON.stringify(opts.body);
    }

    const response = await this.fetch(this.url(path, opts), {
      method,
      headers,
      body,
      signal: opts.signal,
    });
    const decoded = await readBody(response);
    if (!response.ok) {
      return { error: decoded ?? {}, response };
    }
    return { data: decoded, response };
  }
}
