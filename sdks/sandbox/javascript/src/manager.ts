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

import type { ConnectionConfig, ConnectionConfigOptions } from "./config/connection.js";
import { DEFAULT_LIST_LIMIT, DEFAULT_TIMEOUT_SECONDS } from "./core/constants.js";
import type { Logger } from "./core/logger.js";
import type { RetryPolicy } from "./core/retry.js";
import { createDefaultAdapterFactory } from "./factory/defaultAdapterFactory.js";
import type { AdapterFactory } from "./factory/adapterFactory.js";
import {
  connectWithRetry,
  killSandbox,
  requirePositiveSeconds,
  requireSandboxId,
  resolveConnectionConfig,
} from "./lifecycle.js";
import type {
  ListSandboxesParams,
  ListSandboxesResponse,
  SandboxId,
  SandboxInfo,
  SandboxQuery,
} from "./models/sandboxes.js";
import { SandboxPaginator } from "./paginator.js";
import type { Sandboxes } from "./services/sandboxes.js";

export interface SandboxManagerOptions {
  connectionConfig?: ConnectionConfig | ConnectionConfigOptions;
  adapterFactory?: AdapterFactory;
  /**
   * Overrides the policy that absorbs the pause transition in {@link SandboxManager.connectSandbox}.
   */
  connectRetryPolicy?: RetryPolicy;
}

export type SandboxFilter = ListSandboxesParams;

export interface SandboxListQuery extends SandboxQuery {
  /**
   * Page size requested from the server. Defaults to 100.
   */
  limit?: number;
}

/**
 * Administrative interface for managing sandboxes by id (list/get/pause/connect/kill/set timeout).
 *
 * For interacting *inside* a sandbox, use {@link Sandbox}.
 */
export class SandboxManager {
  private readonly sandboxes: Sandboxes;
  private readonly logger: Logger;
  private readonly connectRetryPolicy?: RetryPolicy;

  private constructor(opts: { sandboxes: Sandboxes; logger: Logger; connectRetryPolicy?: RetryPolicy }) {
    this.sandboxes = opts.sandboxes;
    this.logger = opts.logger;
    this.connectRetryPolicy = opts.connectRetryPolicy;
  }

  static create(opts: SandboxManagerOptions = {}): SandboxManager {
    const connectionConfig = resolveConnectionConfig(opts.connectionConfig);
    const lifecycleBaseUrl = connectionConfig.getBaseUrl();
    const adapterFactory = opts.adapterFactory ?? createDefaultAdapterFactory();
    const { sandboxes } = adapterFactory.createLifecycleStack({ connectionConfig, lifecycleBaseUrl });
    return new SandboxManager({
      sandboxes,
      logger: connectionConfig.logger,
      connectRetryPolicy: opts.connectRetryPolicy,
    });
  }

  /**
   * Fetch a single page of sandboxes.
   */
  listSandboxInfos(filter: SandboxFilter = {}): Promise<ListSandboxesResponse> {
    return this.sandboxes.listSandboxes({
      states: filter.states,
      metadata: filter.metadata,
      limit: filter.limit,
      nextToken: filter.nextToken,
    });
  }

  /**
   * Lazily page through every sandbox matching `query`.
   */
  list(query: SandboxListQuery = {}): SandboxPaginator {
    const limit = query.limit ?? DEFAULT_LIST_LIMIT;
    return new SandboxPaginator((nextToken) =>
      this.listSandboxInfos({ states: query.states, metadata: query.metadata, limit, nextToken }),
    );
  }

  async getSandboxInfo(sandboxId: SandboxId): Promise<SandboxInfo> {
    return this.sandboxes.getSandbox(requireSandboxId(sandboxId));
  }

  async killSandbox(sandboxId: SandboxId): Promise<void> {
    return killSandbox(this.sandboxes, requireSandboxId(sandboxId), this.logger);
  }

  async pauseSandbox(sandboxId: SandboxId): Promise<void> {
    return this.sandboxes.pauseSandbox(requireSandboxId(sandboxId));
  }

  /**
   * Resume a paused sandbox (or refresh a running one), waiting out a pause in progress.
   */
  async connectSandbox(sandboxId: SandboxId, timeoutSeconds: number = DEFAULT_TIMEOUT_SECONDS): Promise<SandboxInfo> {
    return connectWithRetry(this.sandboxes, requireSandboxId(sandboxId), timeoutSeconds, {
      policy: this.connectRetryPolicy,
      logger: this.logger,
    });
  }

  async setSandboxTimeout(sandboxId: SandboxId, timeoutSeconds: number): Promise<void> {
    requirePositiveSeconds("timeoutSeconds", timeoutSeconds);
    await this.sandboxes.setSandboxTimeout(requireSandboxId(sandboxId), timeoutSeconds);
  }
}
