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

import { z } from "zod";

import {
  EXECUTION_RETRY_POLICY,
  InvalidArgumentException,
  serverStreamEventSchema,
  silentLogger,
  type Execution,
  type Logger,
  type RetryPolicy,
  type ServerStreamEvent,
} from "@agent-sandbox/sandbox";
import {
  consumeExecutionStream,
  parseJsonEventStream,
  parseResponse,
  throwOnApiError,
  type HttpClient,
} from "@agent-sandbox/sandbox/internal";

import type { CodeContext, RunCodeRequest, SupportedLanguage } from "../models.js";
import { DEFAULT_LANGUAGE } from "../models.js";
import type { Codes, RunCodeOptions } from "../services/codes.js";

const codeContextSchema = z
  .object({
    id: z.string().nullish().transform((v) => v || undefined),
    language: z.string().min(1),
  })
  .passthrough()
  .transform((c): CodeContext => ({ id: c.id, language: c.language }));

const codeContextListSchema = z.array(codeContextSchema);

function requireContextId(contextId: string): string {
  if (!contextId?.trim()) {
    throw new InvalidArgumentException({ message: "contextId cannot be empty" });
  }
  return contextId;
}

export interface CodesAdapterOptions {
  sseFetch?: typeof fetch;
  headers?: Record<string, string>;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
}

/**
 * Codes adapter for the code interpreter service.
 *
 * - JSON calls go through the shared {@link HttpClient}
 * - `POST /code` is streamed and aggregated into an {@link Execution}
 */
export class CodesAdapter implements Codes {
  private readonly sseFetch: typeof fetch;
  private readonly logger: Logger;

  constructor(
    private readonly client: HttpClient,
    private readonly opts: CodesAdapterOptions = {},
  ) {
    this.sseFetch = opts.sseFetch ?? fetch;
    this.logger = opts.logger ?? silentLogger;
  }

  async createContext(language: SupportedLanguage): Promise<CodeContext> {
    const { data, error, response } = await this.client.POST("/code/context", {
      body: { language },
    });
    throwOnApiError({ error, response }, "Create code context failed");
    return parseResponse(codeContextSchema, data, response, "Create code context");
  }

  async getContext(contextId: string): Promise<CodeContext> {
    const { data, error, response } = await this.client.GET("/code/contexts/{contextId}", {
      pathParams: { contextId: requireContextId(contextId) },
    });
    throwOnApiError({ error, response }, "Get code context failed");
    return parseResponse(codeContextSchema, data, response, "Get code context");
  }

  async listContexts(language?: SupportedLanguage): Promise<CodeContext[]> {
    const { data, error, response } = await this.client.GET("/code/contexts", {
      query: { language },
    });
    throwOnApiError({ error, response }, "List code contexts failed");
    return parseResponse(codeContextListSchema, data ?? [], response, "List code contexts");
  }

  async deleteContext(contextId: string): Promise<void> {
    const { error, response } = await this.client.DELETE("/code/contexts/{contextId}", {
      pathParams: { contextId: requireContextId(contextId) },
    });
    throwOnApiError({ error, response }, "Delete code context failed");
  }

  async deleteContexts(language: SupportedLanguage): Promise<void> {
    const { error, response } = await this.client.DELETE("/code/contexts", {
      query: { language },
    });
    throwOnApiError({ error, response }, "Delete code contexts failed");
  }

  async interrupt(contextId: string): Promise<void> {
    const { error, response } = await this.client.DELETE("/code", {
      query: { id: requireContextId(contextId) },
    });
    throwOnApiError({ error, response }, "Interrupt code failed");
  }

  async *runStream(req: RunCodeRequest, signal?: AbortSignal): AsyncIterable<ServerStreamEvent> {
    const res = await this.sseFetch(this.client.url("/code"), {
      method: "POST",
      headers: {
        "accept": "text/event-stream",
        "content-type": "application/json",
        ...(this.opts.headers ?? {}),
      },
      body: JSON.stringify(req),
      signal,
    });

    yield* parseJsonEventStream(res, serverStreamEventSchema, { fallbackErrorMessage: "Run code failed" });
  }

  async run(code: string, opts: RunCodeOptions = {}): Promise<Execution> {
    if (!code.trim()) {
      throw new InvalidArgumentException({ message: "Code cannot be empty" });
    }
    if (opts.context && opts.language) {
      throw new InvalidArgumentException({ message: "Provide either opts.context or opts.language, not both" });
    }

    const context: CodeContext = opts.context ?? { language: opts.language ?? DEFAULT_LANGUAGE };
    const req: RunCodeRequest = {
      code,
      context: { id: context.id, language: context.language },
    };

    return consumeExecutionStream({
      open: (signal) => this.runStream(req, signal),
      policy: opts.retryPolicy ?? this.opts.retryPolicy ?? EXECUTION_RETRY_POLICY,
      label: "run code",
      logger: this.logger,
      handlers: opts.handlers,
      signal: opts.signal,
    });
  }
}
