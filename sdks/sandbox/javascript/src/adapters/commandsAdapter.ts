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

import { CommandHandle } from "../commandHandle.js";
import {
  CommandExitException,
  InvalidArgumentException,
  SandboxApiException,
  SandboxError,
} from "../core/exceptions.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { EXECUTION_RETRY_POLICY, executeWithRetry, type RetryPolicy } from "../core/retry.js";
import {
  backgroundOutputSchema,
  serverStreamEventSchema,
  type BackgroundOutput,
  type CommandExecution,
  type RunCommandOpts,
  type RunCommandRequest,
  type ServerStreamEvent,
} from "../models/execd.js";
import type { ExecutionHandlers } from "../models/execution.js";
import type { ExecdCommands } from "../services/execdCommands.js";
import { throwOnApiError } from "./apiError.js";
import { consumeExecutionStream } from "./executionStream.js";
import type { HttpClient } from "./httpClient.js";
import { parseResponse } from "./schemas.js";
import { parseJsonEventStream } from "./sse.js";

function toRunCommandRequest(command: string, opts: RunCommandOpts | undefined, background: boolean): RunCommandRequest {
  if (!command.trim()) {
    throw new InvalidArgumentException({ message: "Command cannot be empty" });
  }
  return {
    command,
    cwd: opts?.workingDirectory,
    envs: opts?.envs,
    background,
    timeout: opts?.timeoutSeconds,
  };
}

export interface CommandsAdapterOptions {
  /**
   * Fetch used for the streaming `POST /command` call. Should not carry a request timeout.
   */
  sseFetch?: typeof fetch;
  /**
   * Headers for every data-plane request (API key, access token, ...).
   */
  headers?: Record<string, string>;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  pollIntervalMillis?: number;
}

export class CommandsAdapter implements ExecdCommands {
  private readonly sseFetch: typeof fetch;
  private readonly logger: Logger;

  constructor(
    private readonly client: HttpClient,
    private readonly opts: CommandsAdapterOptions = {},
  ) {
    this.sseFetch = opts.sseFetch ?? fetch;
    this.logger = opts.logger ?? silentLogger;
  }

  async interrupt(commandId: string): Promise<void> {
    const { error, response } = await this.client.DELETE("/command", {
      query: { id: commandId },
    });
    throwOnApiError({ error, response }, "Interrupt command failed");
  }

  runStream(
    command: string,
    opts?: RunCommandOpts,
    signal?: AbortSignal,
  ): AsyncIterable<ServerStreamEvent> {
    return this.openStream(toRunCommandRequest(command, opts, false), signal);
  }

  async run(
    command: string,
    opts?: RunCommandOpts,
    handlers?: ExecutionHandlers,
    signal?: AbortSignal,
  ): Promise<CommandExecution> {
    const req = toRunCommandRequest(command, opts, false);
    const execution = await consumeExecutionStream({
      open: (s) => this.openStream(req, s),
      policy: this.policy(opts),
      label: "run command",
      logger: this.logger,
      handlers,
      signal,
    });

    if (execution.exitCode !== undefined && execution.exitCode !== 0) {
      throw new CommandExitException({ exitCode: execution.exitCode, execution });
    }
    return execution;
  }

  async start(command: string, opts?: RunCommandOpts, signal?: AbortSignal): Promise<CommandHandle> {
    const req = toRunCommandRequest(command, opts, true);
    // The server answers a background request with a short stream that carries the init event.
    const commandId = await executeWithRetry(
      async () => {
        for await (const ev of this.openStream(req, signal)) {
          if (ev.type === "init" && ev.text) return ev.text;
        }
        const message = "Start command failed: no command id in response";
        throw new SandboxApiException({
          message,
          error: new SandboxError(SandboxError.UNEXPECTED_RESPONSE, message),
        });
      },
      this.policy(opts),
      { label: "start command", logger: this.logger, signal },
    );
    this.logger.debug(`started background command ${commandId}`);
    return new CommandHandle(commandId, this, {
      pollIntervalMillis: this.opts.pollIntervalMillis,
      logger: this.logger,
    });
  }

  async getOutput(commandId: string, cursor: number, signal?: AbortSignal): Promise<BackgroundOutput> {
    const { data, error, response } = await this.client.GET("/command/{commandId}/output", {
      pathParams: { commandId },
      query: { cursor },
      signal,
    });
    throwOnApiError({ error, response }, "Get command output failed");
    return parseResponse(backgroundOutputSchema, data, response, "Get command output");
  }

  private policy(opts?: RunCommandOpts): RetryPolicy {
    return opts?.retryPolicy ?? this.opts.retryPolicy ?? EXECUTION_RETRY_POLICY;
  }

  private async *openStream(req: RunCommandRequest, signal?: AbortSignal): AsyncIterable<ServerStreamEvent> {
    const res = await this.sseFetch(this.client.url("/command"), {
      method: "POST",
      headers: {
        "accept": "text/event-stream",
        "content-type": "application/json",
        ...(this.opts.headers ?? {}),
      },
      body: JSON.stringify(req),
      signal,
    });

    yield* parseJsonEventStream(res, serverStreamEventSchema, { fallbackErrorMessage: "Run command failed" });
  }
}
