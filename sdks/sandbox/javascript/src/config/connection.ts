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

import { Agent, type Dispatcher } from "undici";
import { z } from "zod";

import {
  API_KEY_HEADER,
  DEFAULT_GATEWAY_PREFIX,
  DEFAULT_REQUEST_TIMEOUT_SECONDS,
  DEFAULT_USER_AGENT,
} from "../core/constants.js";
import {
  createEndpointResolver,
  type ConnectionProtocol,
  type DeploymentMode,
  type EndpointResolver,
} from "../core/endpoints.js";
import { SandboxConfigurationException } from "../core/exceptions.js";
import { createConsoleLogger, type Logger } from "../core/logger.js";

/**
 * Options for {@link ConnectionConfig}.
 *
 * Most users only need `domain` and `apiKey`; everything else has a default or an environment variable.
 */
export interface ConnectionConfigOptions {
  /**
   * Gateway domain (host[:port]) without scheme, e.g. "sandbox.example.com".
   */
  domain?: string;
  mode?: DeploymentMode;
  /**
   * Routing segment of a self-hosted gateway. Ignored in public mode.
   */
  gatewayPrefix?: string;
  /**
   * Use https and verify certificates. When false, requests go over http and
   * certificate verification is skipped.
   */
  secure?: boolean;
  apiKey?: string;
  headers?: Record<string, string>;

  /**
   * Request timeout applied to all non-streaming SDK HTTP calls. Defaults to 30 seconds.
   */
  requestTimeoutSeconds?: number;
  /**
   * Log every HTTP request and response status.
   */
  debug?: boolean;
  logger?: Logger;
  /**
   * Supply a resolver directly instead of deriving one from `mode`/`domain`/`gatewayPrefix`/`secure`.
   */
  endpointResolver?: EndpointResolver;
}

const booleanEnv = z
  .string()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  AGENT_SANDBOX_DOMAIN: z.string().min(1).optional(),
  AGENT_SANDBOX_API_KEY: z.string().min(1).optional(),
  AGENT_SANDBOX_MODE: z.enum(["self-hosted", "public"]).optional(),
  AGENT_SANDBOX_GATEWAY_PREFIX: z.string().min(1).optional(),
  AGENT_SANDBOX_SECURE: booleanEnv.optional(),
  AGENT_SANDBOX_DEBUG: booleanEnv.optional(),
});

export type SandboxEnv = z.infer<typeof envSchema>;

/**
 * Read and validate the SDK's environment variables. Empty values count as unset.
 */
export function readSandboxEnv(env: NodeJS.ProcessEnv = process.env): SandboxEnv {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const v = env[key];
    if (typeof v === "string" && v.trim().length) picked[key] = v.trim();
  }
  const parsed = envSchema.safeParse(picked);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new SandboxConfigurationException({ message: `Invalid environment configuration: ${issues}`, cause: parsed.error });
  }
  return parsed.data;
}

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = { ...headers };
  for (const k of Object.keys(out)) {
    const lower = k.toLowerCase();
    if (lower === API_KEY_HEADER.toLowerCase() || lower === "x-access-token") out[k] = "***";
  }
  return out;
}

function headersToRecord(headers: HeadersInit | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

type DispatcherInit = RequestInit & { dispatcher?: Dispatcher };

function createTimedFetch(opts: {
  baseFetch: typeof fetch;
  timeoutSeconds: number;
  debug: boolean;
  logger: Logger;
  dispatcher?: Dispatcher;
  defaultHeaders?: Record<string, string>;
  label: string;
}): typeof fetch {
  const { baseFetch, timeoutSeconds, debug, logger, dispatcher, label } = opts;
  const defaultHeaders = opts.defaultHeaders ?? {};

  return async (input: RequestInfo | URL, init?: RequestInit) => {
    const method = init?.method ?? "GET";
    const url = input instanceof Request ? input.url : input.toString();

    const ac = new AbortController();
    const timeoutMs = Math.floor(timeoutSeconds * 1000);
    const t = Number.isFinite(timeoutMs) && timeoutMs > 0
      ? setTimeout(() => ac.abort(new DOMException(`[${label}] Request timed out (timeoutSeconds=${timeoutSeconds})`, "TimeoutError")), timeoutMs)
      : undefined;

    const callerSignal = init?.signal ?? undefined;
    const onAbort = () => ac.abort(callerSignal?.reason ?? new DOMException("Aborted", "AbortError"));
    if (callerSignal) {
      if (callerSignal.aborted) onAbort();
      else callerSignal.addEventListener("abort", onAbort, { once: true });
    }

    const mergedInit: DispatcherInit = {
      ...init,
      signal: ac.signal,
    };
    if (dispatcher) mergedInit.dispatcher = dispatcher;

    if (debug) {
      const mergedHeaders = { ...defaultHeaders, ...headersToRecord(init?.headers) };
      logger.debug(`[${label}] -> ${method} ${url}`, redactHeaders(mergedHeaders));
    }

    try {
      const res = await baseFetch(input, mergedInit);
      if (debug) {
        logger.debug(`[${label}] <- ${method} ${url} ${res.status}`);
      }
      return res;
    } finally {
      if (t) clearTimeout(t);
      callerSignal?.removeEventListener("abort", onAbort);
    }
  };
}

export class ConnectionConfig {
  readonly endpoints: EndpointResolver;
  readonly apiKey?: string;
  readonly headers: Record<string, string>;
  readonly fetch: typeof fetch;
  /**
   * Fetch function intended for long-lived streaming requests (SSE / NDJSON).
   *
   * Kept separate from {@link fetch} so streaming calls are not cut off by `requestTimeoutSeconds`.
   */
  readonly sseFetch: typeof fetch;
  readonly requestTimeoutSeconds: number;
  readonly debug: boolean;
  readonly logger: Logger;
  readonly userAgent: string = DEFAULT_USER_AGENT;

  /**
   * Create a connection configuration.
   *
   * Environment variables (optional):
   * - `AGENT_SANDBOX_DOMAIN`
   * - `AGENT_SANDBOX_API_KEY`
   * - `AGENT_SANDBOX_MODE` (`self-hosted` | `public`, default `self-hosted`)
   * - `AGENT_SANDBOX_GATEWAY_PREFIX` (default `gateway`)
   * - `AGENT_SANDBOX_SECURE` (default `true`)
   * - `AGENT_SANDBOX_DEBUG`
   *
   * A missing domain is reported here, before any request is made.
   */
  constructor(opts: ConnectionConfigOptions = {}) {
    const env = readSandboxEnv();

    this.endpoints = opts.endpointResolver ?? createEndpointResolver({
      mode: opts.mode ?? env.AGENT_SANDBOX_MODE,
      domain: opts.domain ?? env.AGENT_SANDBOX_DOMAIN,
      gatewayPrefix: opts.gatewayPrefix ?? env.AGENT_SANDBOX_GATEWAY_PREFIX ?? DEFAULT_GATEWAY_PREFIX,
      secure: opts.secure ?? env.AGENT_SANDBOX_SECURE ?? true,
    });
    this.apiKey = opts.apiKey ?? env.AGENT_SANDBOX_API_KEY;
    this.requestTimeoutSeconds = typeof opts.requestTimeoutSeconds === "number"
      ? opts.requestTimeoutSeconds
      : DEFAULT_REQUEST_TIMEOUT_SECONDS;
    this.debug = opts.debug ?? env.AGENT_SANDBOX_DEBUG ?? false;
    this.logger = opts.logger ?? createConsoleLogger({ debug: this.debug });

    const headers: Record<string, string> = { ...(opts.headers ?? {}) };
    // Attach API key via header unless the user already provided one.
    const hasApiKeyHeader = Object.keys(headers).some((k) => k.toLowerCase() === API_KEY_HEADER.toLowerCase());
    if (this.apiKey && !hasApiKeyHeader) {
      headers[API_KEY_HEADER] = this.apiKey;
    }
    if (!headers["user-agent"] && !headers["User-Agent"]) {
      headers["user-agent"] = this.userAgent;
    }
    this.headers = headers;

    // Insecure mode talks to gateways that do not present a trusted certificate.
    const dispatcher = this.endpoints.verifyTls
      ? undefined
      : new Agent({ connect: { rejectUnauthorized: false } });

    // Resolve the global fetch now so a stubbed fetch installed before construction is honored.
    const baseFetch = fetch;

    this.fetch = createTimedFetch({
      baseFetch,
      timeoutSeconds: this.requestTimeoutSeconds,
      debug: this.debug,
      logger: this.logger,
      dispatcher,
      defaultHeaders: this.headers,
      label: "http",
    });

    // Streaming calls: no SDK-side timeout; the caller's signal still applies.
    this.sseFetch = createTimedFetch({
      baseFetch,
      timeoutSeconds: 0,
      debug: this.debug,
      logger: this.logger,
      dispatcher,
      defaultHeaders: this.headers,
      label: "sse",
    });
  }

  get protocol(): ConnectionProtocol {
    return this.endpoints.protocol;
  }

  getBaseUrl(): string {
    return this.endpoints.getApiUrl();
  }
}
