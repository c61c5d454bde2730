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

import { DEFAULT_BACKGROUND_POLL_INTERVAL_MILLIS } from "./core/constants.js";
import { CommandExitException, SandboxNotFoundException } from "./core/exceptions.js";
import { silentLogger, type Logger } from "./core/logger.js";
import { sleep } from "./core/retry.js";
import type { CommandExecution, ServerStreamEvent } from "./models/execd.js";
import { createEmptyExecution, type ExecutionHandlers } from "./models/execution.js";
import { ExecutionEventDispatcher } from "./models/executionEventDispatcher.js";
import type { ExecdCommands } from "./services/execdCommands.js";

export interface CommandHandleOptions {
  pollIntervalMillis?: number;
  logger?: Logger;
}

/**
 * A command running in the background.
 *
 * The handle owns its polling loop. Output is read through a server-side cursor, so events
 * already yielded by {@link output} are not yielded again by a later call.
 */
export class CommandHandle {
  private cursor = 0;
  private finished = false;
  private lastExitCode?: number;
  private readonly pollIntervalMillis: number;
  private readonly logger: Logger;

  constructor(
    readonly id: string,
    private readonly commands: Pick<ExecdCommands, "getOutput" | "interrupt">,
    opts: CommandHandleOptions = {},
  ) {
    this.pollIntervalMillis = opts.pollIntervalMillis ?? DEFAULT_BACKGROUND_POLL_INTERVAL_MILLIS;
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * True once a poll has reported that the command is no longer running.
   */
  get exited(): boolean {
    return this.finished;
  }

  /**
   * Exit status reported by the server, once the command has exited.
   */
  get exitCode(): number | undefined {
    return this.lastExitCode;
  }

  /**
   * Poll the command's output, yielding events in order until it exits.
   */
  async *output(signal?: AbortSignal): AsyncIterable<ServerStreamEvent> {
    while (!this.finished) {
      const page = await this.commands.getOutput(this.id, this.cursor, signal);
      this.cursor = page.cursor;
      for (const ev of page.events) yield ev;
      if (!page.running) {
        this.finished = true;
        this.lastExitCode = page.exitCode ?? undefined;
        return;
      }
      await sleep(this.pollIntervalMillis, signal);
    }
  }

  /**
   * Wait for the command to exit and aggregate the output that has not been consumed yet.
   *
   * @throws CommandExitException when the command exits with a non-zero status.
   */
  async wait(handlers?: ExecutionHandlers, signal?: AbortSignal): Promise<CommandExecution> {
    const execution = createEmptyExecution();
    execution.id = this.id;
    const dispatcher = new ExecutionEventDispatcher(execution, handlers);
    for await (const ev of this.output(signal)) {
      await dispatcher.dispatch(ev);
    }
    if (execution.exitCode === undefined) execution.exitCode = this.lastExitCode;
    if (execution.exitCode !== undefined && execution.exitCode !== 0) {
      throw new CommandExitException({ exitCode: execution.exitCode, execution });
    }
    return execution;
  }

  /**
   * Stop the command. A command that already exited, or that the server no longer knows, counts as killed.
   */
  async kill(): Promise<void> {
    try {
      await this.commands.interrupt(this.id);
    } catch (err) {
      if (!(err instanceof SandboxNotFoundException)) throw err;
      this.logger.debug(`command ${this.id} already gone`);
    }
  }
}
