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

import type { ExecutionHandlers } from "../models/execution.js";
import type {
  BackgroundOutput,
  CommandExecution,
  RunCommandOpts,
  ServerStreamEvent,
} from "../models/execd.js";
import type { CommandHandle } from "../commandHandle.js";

export interface ExecdCommands {
  /**
   * Run a command and stream server events. One attempt, no retry. This is the lowest-level API.
   */
  runStream(command: string, opts?: RunCommandOpts, signal?: AbortSignal): AsyncIterable<ServerStreamEvent>;

  /**
   * Run a command in the foreground, consume the stream, and build a structured execution result.
   *
   * Retried under the execution policy. A non-zero exit raises `CommandExitException`.
   */
  run(command: string, opts?: RunCommandOpts, handlers?: ExecutionHandlers, signal?: AbortSignal): Promise<CommandExecution>;

  /**
   * Start a command in the background. Resolves once the server has assigned the command id.
   *
   * Retried under the execution policy until the id arrives.
   */
  start(command: string, opts?: RunCommandOpts, signal?: AbortSignal): Promise<CommandHandle>;

  /**
   * Read the output a background command produced after `cursor`.
   */
  getOutput(commandId: string, cursor: number, signal?: AbortSignal): Promise<BackgroundOutput>;

  /**
   * Interrupt a running command.
   *
   * Note: uses `DELETE /command?id=<commandId>`.
   */
  interrupt(commandId: string): Promise<void>;
}
