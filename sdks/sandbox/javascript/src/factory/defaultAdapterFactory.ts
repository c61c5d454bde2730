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

import { CommandsAdapter } from "../adapters/commandsAdapter.js";
import { FilesystemAdapter } from "../adapters/filesystemAdapter.js";
import { HttpClient } from "../adapters/httpClient.js";
import { SandboxesAdapter } from "../adapters/sandboxesAdapter.js";
import type { ConnectionConfig } from "../config/connection.js";
import { ACCESS_TOKEN_HEADER } from "../core/constants.js";
import type {
  AdapterFactory,
  CreateExecdStackOptions,
  CreateLifecycleStackOptions,
  ExecdStack,
  LifecycleStack,
} from "./adapterFactory.js";

/**
 * Headers for requests that reach into a sandbox.
 */
export function dataPlaneHeaders(connectionConfig: ConnectionConfig, accessToken?: string): Record<string, string> {
  const headers = { ...connectionConfig.headers };
  if (accessToken) headers[ACCESS_TOKEN_HEADER] = accessToken;
  return headers;
}

export class DefaultAdapterFactory implements AdapterFactory {
  createLifecycleStack(opts: CreateLifecycleStackOptions): LifecycleStack {
    const client = new HttpClient(opts.lifecycleBaseUrl, {
      fetch: opts.connectionConfig.fetch,
      headers: opts.connectionConfig.headers,
    });
    return { sandboxes: new SandboxesAdapter(client) };
  }

  createExecdStack(opts: CreateExecdStackOptions): ExecdStack {
    const headers = dataPlaneHeaders(opts.connectionConfig, opts.accessToken);
    const client = new HttpClient(opts.execdBaseUrl, {
      fetch: opts.connectionConfig.fetch,
      headers,
    });
    const commands = new CommandsAdapter(client, {
      sseFetch: opts.connectionConfig.sseFetch,
      headers,
      retryPolicy: opts.retryPolicy,
      logger: opts.connectionConfig.logger,
      pollIntervalMillis: opts.pollIntervalMillis,
    });
    const files = new FilesystemAdapter(client, {
      fetch: opts.connectionConfig.fetch,
      headers,
      logger: opts.connectionConfig.logger,
    });
    return { commands, files };
  }
}

export function createDefaultAdapterFactory(): AdapterFactory {
  return new DefaultAdapterFactory();
}
