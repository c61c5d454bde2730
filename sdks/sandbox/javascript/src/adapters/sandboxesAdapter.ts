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

import { NEXT_TOKEN_HEADER } from "../core/constants.js";
import type {
  ConnectSandboxRequest,
  CreateSandboxRequest,
  ListSandboxesParams,
  ListSandboxesResponse,
  SandboxId,
  SandboxInfo,
} from "../models/sandboxes.js";
import type { Sandboxes } from "../services/sandboxes.js";
import { throwOnApiError } from "./apiError.js";
import type { HttpClient, QueryValue } from "./httpClient.js";
import {
  apiSandboxListSchema,
  apiSandboxSchema,
  parseResponse,
  toSandboxInfo,
} from "./schemas.js";

function encodeMetadataFilter(metadata: Record<string, string>): string {
  // The API expects a single `metadata` query parameter whose value is `k=v&k2=v2`.
  // The query serializer will URL-encode the value (e.g. `=` -> %3D and `&` -> %26).
  const parts: string[] = [];
  for (const [k, v] of Object.entries(metadata)) {
    parts.push(`${k}=${v}`);
  }
  return parts.join("&");
}

export class SandboxesAdapter implements Sandboxes {
  constructor(private readonly client: HttpClient) {}

  async createSandbox(req: CreateSandboxRequest): Promise<SandboxInfo> {
    const { data, error, response } = await this.client.POST("/sandboxes", {
      body: {
        templateID: req.templateId,
        timeout: req.timeout,
        autoPause: req.autoPause,
        secure: req.secure,
        metadata: req.metadata,
        envVars: req.envVars,
      },
    });
    throwOnApiError({ error, response }, "Create sandbox failed");
    return toSandboxInfo(parseResponse(apiSandboxSchema, data, response, "Create sandbox"));
  }

  async getSandbox(sandboxId: SandboxId): Promise<SandboxInfo> {
    const { data, error, response } = await this.client.GET("/sandboxes/{sandboxId}", {
      pathParams: { sandboxId },
    });
    throwOnApiError({ error, response }, "Get sandbox failed");
    return toSandboxInfo(parseResponse(apiSandboxSchema, data, response, "Get sandbox"));
  }

  async listSandboxes(params: ListSandboxesParams = {}): Promise<ListSandboxesResponse> {
    const query: Record<string, QueryValue> = {};
    if (params.states?.length) query.state = params.states.join(",");
    if (params.metadata && Object.keys(params.metadata).length) {
      query.metadata = encodeMetadataFilter(params.metadata);
    }
    if (params.limit != null) query.limit = params.limit;
    if (params.nextToken) query.nextToken = params.nextToken;

    const { data, error, response } = await this.client.GET("/v2/sandboxes", { query });
    throwOnApiError({ error, response }, "List sandboxes failed");
    const items = parseResponse(apiSandboxListSchema, data ?? [], response, "List sandboxes");
    const nextToken = response.headers.get(NEXT_TOKEN_HEADER) || undefined;
    return {
      items: items.map(toSandboxInfo),
      nextToken,
    };
  }

  async deleteSandbox(sandboxId: SandboxId): Promise<void> {
    const { error, response } = await this.client.DELETE("/sandboxes/{sandboxId}", {
      pathParams: { sandboxId },
    });
    throwOnApiError({ error, response }, "Delete sandbox failed");
  }

  async pauseSandbox(sandboxId: SandboxId): Promise<void> {
    const { error, response } = await this.client.POST("/sandboxes/{sandboxId}/pause", {
      pathParams: { sandboxId },
    });
    throwOnApiError({ error, response }, "Pause sandbox failed");
  }

  async connectSandbox(sandboxId: SandboxId, req: ConnectSandboxRequest): Promise<SandboxInfo> {
    const { data, error, response } = await this.client.POST("/sandboxes/{sandboxId}/connect", {
      pathParams: { sandboxId },
      body: { timeout: req.timeout },
    });
    throwOnApiError({ error, response }, "Connect sandbox failed");
    return toSandboxInfo(parseResponse(apiSandboxSchema, data, response, "Connect sandbox"));
  }

  async setSandboxTimeout(sandboxId: SandboxId, timeoutSeconds: number): Promise<void> {
    const { error, response } = await this.client.POST("/sandboxes/{sandboxId}/timeout", {
      pathParams: { sandboxId },
      body: { timeout: timeoutSeconds },
    });
    throwOnApiError({ error, response }, "Set sandbox timeout failed");
  }
}
