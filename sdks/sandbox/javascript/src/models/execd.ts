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

import type { RetryPolicy } from "../core/retry.js";
import type { Execution } from "./execution.js";

/**
 * Domain models for data-plane (in-sandbox daemon) interactions.
 *
 * The stream schema is deliberately loose: unknown event types and extra fields pass through,
 * and the dispatcher ignores what it does not understand.
 */
export const serverStreamEventSchema = z
  .object({
    type: z.string(),
    timestamp: z.number().optional(),
    text: z.string().optional(),
    results: z.record(z.unknown()).optional(),
    error: z
      .object({
        ename: z.string().optional(),
        evalue: z.union([z.string(), z.number()]).optional(),
        traceback: z.array(z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
    execution_count: z.number().optional(),
    execution_time: z.number().optional(),
    exit_code: z.number().nullable().optional(),
  })
  .passthrough();

export type ServerStreamEvent = z.infer<typeof serverStreamEventSchema>;

/**
 * Name the daemon gives to the error event of a command that exited non-zero.
 */
export const COMMAND_EXEC_ERROR_NAME = "CommandExecError";

export interface RunCommandRequest {
  command: string;
  cwd?: string;
  envs?: Record<string, string>;
  background: boolean;
  timeout?: number;
}

export interface RunCommandOpts {
  /**
   * Working directory for command execution (maps to API `cwd`).
   */
  workingDirectory?: string;
  envs?: Record<string, string>;
  /**
   * Server-side limit for the command, in seconds.
   */
  timeoutSeconds?: number;
  /**
   * Overrides the execution retry policy for this call.
   */
  retryPolicy?: RetryPolicy;
}

export type CommandExecution = Execution;

export const backgroundOutputSchema = z.object({
  events: z.array(serverStreamEventSchema),
  cursor: z.number(),
  running: z.boolean(),
  exitCode: z.number().nullable().optional(),
});

/**
 * One poll of a background command's output.
 */
export type BackgroundOutput = z.infer<typeof backgroundOutputSchema>;
