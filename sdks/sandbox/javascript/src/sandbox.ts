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
import { DEFAULT_EXECD_PORT, DEFAULT_TEMPLATE, DEFAULT_TIMEOUT_SECONDS } from "./core/constants.js";
import { SandboxConfigurationException, SandboxNotFoundException } from "./core/exceptions.js";
import type { RetryPolicy } from "./core/retry.js";
import { createDefaultAdapterFactory, dataPlaneHeaders } from "./factory/defaultAdapterFactory.js";
import type { AdapterFactory } from "./factory/adapterFactory.js";
import {
  connectWithRetry,
  killSandbox,
  requirePositiveSeconds,
  requireSandboxId,
  resolveConnectionConfig,
} from "./lifecycle.js";
import { SandboxManager, type SandboxListQuery } from "./manager.js";
import type { SandboxId, SandboxInfo } from "./models/sandboxes.js";
import type { SandboxPaginator } from "./paginator.js";
import type { ExecdCommands } from "./services/execdCommands.js";
import type { SandboxFiles } from "./services/filesystem.js";
import type { Sandboxes } from "./services/sandboxes.js";

export interface SandboxBaseOptions {
  connectionConfig?: ConnectionConfig | ConnectionConfigOptions;
  adapterFactory?: AdapterFactory;
  /**
   * Overrides the execution retry policy of `commands.run`.
   */
  executionRetryPolicy?: RetryPolicy;
  /**
   * Overrides the policy that absorbs the pause transition on connect.
   */
  connectRetryPolicy?: RetryPolicy;
  /**
   * Poll interval of background command handles. Defaults to 500ms.
   */
  commandPollIntervalMillis?: number;
}

export interface SandboxCreateOptions extends SandboxBaseOptions {
  /**
   * Template (execution image) name. Defaults to "code-interpreter".
   */
  template?: string;
  /**
   * Idle seconds before the server tears the sandbox down (or pauses it, with `autoPause`).
   */
  timeoutSeconds?: number;
  metadata?: Record<string, string>;
  envs?: Record<string, string>;
  autoPause?: boolean;
  /**
   * Ask the server to protect the data plane with an access token.
   */
  secure?: boolean;
}

export interface SandboxConnectOptions extends SandboxBaseOptions {
  sandboxId: SandboxId;
  timeoutSeconds?: number;
  signal?: AbortSignal;
}

export interface SandboxListOptions {
  connectionConfig?: ConnectionConfig | ConnectionConfigOptions;
  adapterFactory?: AdapterFactory;
}

interface SandboxInit {
  info: SandboxInfo;
  connectionConfig: ConnectionConfig;
  adapterFactory: AdapterFactory;
  sandboxes: Sandboxes;
  executionRetryPolicy?: RetryPolicy;
  connectRetryPolicy?: RetryPolicy;
  commandPollIntervalMillis?: number;
}

/**
 * Handle to one remote sandbox.
 *
 * Obtain one with {@link Sandbox.create} or {@link Sandbox.connect}. The id never changes across
 * pause and resume; state is always read from the server.
 */
export class Sandbox {
  readonly id: SandboxId;
  readonly connectionConfig: ConnectionConfig;
  /**
   * Shell command execution inside the sandbox.
   */
  readonly commands: ExecdCommands;
  /**
   * Read and write files inside the sandbox.
   */
  readonly files: SandboxFiles;

  private readonly adapterFactory: AdapterFactory;
  private readonly sandboxes: Sandboxes;
  private readonly accessToken?: string;
  private readonly executionRetryPolicy?: RetryPolicy;
  private readonly connectRetryPolicy?: RetryPolicy;
  private readonly commandPollIntervalMillis?: number;

  private constructor(init: SandboxInit) {
    this.id = init.info.sandboxId;
    this.connectionConfig = init.connectionConfig;
    this.adapterFactory = init.adapterFactory;
    this.sandboxes = init.sandboxes;
    this.accessToken = init.info.envdAccessToken;
    this.executionRetryPolicy = init.executionRetryPolicy;
    this.connectRetryPolicy = init.connectRetryPolicy;
    this.commandPollIntervalMillis = init.commandPollIntervalMillis;

    const { commands, files } = this.adapterFactory.createExecdStack({
      connectionConfig: this.connectionConfig,
      execdBaseUrl: this.getEndpointUrl(DEFAULT_EXECD_PORT),
      accessToken: this.accessToken,
      retryPolicy: this.executionRetryPolicy,
      pollIntervalMillis: this.commandPollIntervalMillis,
    });
    this.commands = commands;
    this.files = files;
  }

  private static lifecycle(opts: SandboxBaseOptions): {
    connectionConfig: ConnectionConfig;
    adapterFactory: AdapterFactory;
    sandboxes: Sandboxes;
  } {
    const connectionConfig = resolveConnectionConfig(opts.connectionConfig);
    const adapterFactory = opts.adapterFactory ?? createDefaultAdapterFactory();
    const { sandboxes } = adapterFactory.createLifecycleStack({
      connectionConfig,
      lifecycleBaseUrl: connectionConfig.getBaseUrl(),
    });
    return { connectionConfig, adapterFactory, sandboxes };
  }

  /**
   * Create a new sandbox. Configuration is validated before any request is sent.
   */
  static async create(opts: SandboxCreateOptions = {}): Promise<Sandbox> {
    const template = (opts.template ?? DEFAULT_TEMPLATE).trim();
    if (!template) {
      throw new SandboxConfigurationException({ message: "Missing required configuration: template" });
    }
    const timeoutSeconds = requirePositiveSeconds("timeoutSeconds", opts.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS);
    const stack = Sandbox.lifecycle(opts);

    const info = await stack.sandboxes.createSandbox({
      templateId: template,
      timeout: timeoutSeconds,
      metadata: opts.metadata,
      envVars: opts.envs,
      autoPause: opts.autoPause,
      secure: opts.secure,
    });
    stack.connectionConfig.logger.debug(`created sandbox ${info.sandboxId} from template ${template}`);
    return new Sandbox({
      ...stack,
      info,
      executionRetryPolicy: opts.executionRetryPolicy,
      connectRetryPolicy: opts.connectRetryPolicy,
      commandPollIntervalMillis: opts.commandPollIntervalMillis,
    });
  }

  /**
   * Connect to an existing sandbox, resuming it if paused.
   *
   * A sandbox that is still pausing is retried until the transition completes. An unknown id
   * fails immediately with `SandboxNotFoundException`.
   */
  static async connect(opts: SandboxConnectOptions): Promise<Sandbox> {
    const sandboxId = requireSandboxId(opts.sandboxId);
    const stack = Sandbox.lifecycle(opts);
    const info = await connectWithRetry(stack.sandboxes, sandboxId, opts.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS, {
      policy: opts.connectRetryPolicy,
      logger: stack.connectionConfig.logger,
      signal: opts.signal,
    });
    return new Sandbox({
      ...stack,
      info,
      executionRetryPolicy: opts.executionRetryPolicy,
      connectRetryPolicy: opts.connectRetryPolicy,
      commandPollIntervalMillis: opts.commandPollIntervalMillis,
    });
  }

  /**
   * Lazily page through sandboxes matching `query`.
   */
  static list(query: SandboxListQuery = {}, opts: SandboxListOptions = {}): SandboxPaginator {
    return SandboxManager.create(opts).list(query);
  }

  /**
   * Reconnect this sandbox, resuming it if paused. The returned handle has the same id.
   */
  async connect(timeoutSeconds: number = DEFAULT_TIMEOUT_SECONDS, signal?: AbortSignal): Promise<Sandbox> {
    const info = await connectWithRetry(this.sandboxes, this.id, timeoutSeconds, {
      policy: this.connectRetryPolicy,
      logger: this.connectionConfig.logger,
      signal,
    });
    return new Sandbox({
      info,
      connectionConfig: this.connectionConfig,
      adapterFactory: this.adapterFactory,
      sandboxes: this.sandboxes,
      executionRetryPolicy: this.executionRetryPolicy,
      connectRetryPolicy: this.connectRetryPolicy,
      commandPollIntervalMillis: this.commandPollIntervalMillis,
    });
  }

  /**
   * Request a pause. Returns once the server accepted it; the transition completes asynchronously.
   */
  pause(): Promise<void> {
    return this.sandboxes.pauseSandbox(this.id);
  }

  /**
   * Terminate the sandbox. Killing a sandbox that is already gone succeeds.
   */
  kill(): Promise<void> {
    return killSandbox(this.sandboxes, this.id, this.connectionConfig.logger);
  }

  getInfo(): Promise<SandboxInfo> {
    return this.sandboxes.getSandbox(this.id);
  }

  /**
   * A sandbox the server no longer knows (killed or reaped) is not running.
   */
  async isRunning(): Promise<boolean> {
    try {
      const info = await this.getInfo();
      return info.state === "running";
    } catch (err) {
      if (err instanceof SandboxNotFoundException) return false;
      throw err;
    }
  }

  /**
   * Reset the idle timeout, counted from now.
   */
  async setTimeout(timeoutSeconds: number): Promise<void> {
    requirePositiveSeconds("timeoutSeconds", timeoutSeconds);
    await this.sandboxes.setSandboxTimeout(this.id, timeoutSeconds);
  }

  /**
   * Host (without scheme) routing to `port` inside this sandbox.
   */
  getHost(port: number): string {
    return this.connectionConfig.endpoints.getHost(this.id, port);
  }

  getEndpointUrl(port: number): string {
    return this.connectionConfig.endpoints.getSandboxUrl(this.id, port);
  }

  /**
   * Headers a data-plane client needs for this sandbox (API key, access token).
   */
  getDataPlaneHeaders(): Record<string, string> {
    return dataPlaneHeaders(this.connectionConfig, this.accessToken);
  }

  /**
   * Retry policy that `commands.run` uses, when overridden at creation.
   */
  get executionRetryPolicyOverride(): RetryPolicy | undefined {
    return this.executionRetryPolicy;
  }
}
