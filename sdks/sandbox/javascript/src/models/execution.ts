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

import type { ServerStreamEvent } from "./execd.js";

export interface OutputMessage {
  text: string;
  timestamp: number;
  isError: boolean;
}

/**
 * One rich artifact produced by an execution (the value of an expression, a chart, ...).
 */
export interface ExecutionResult {
  /**
   * `text/plain` representation, when present.
   */
  text?: string;
  html?: string;
  markdown?: string;
  /**
   * Base64-encoded image payloads.
   */
  png?: string;
  jpeg?: string;
  svg?: string;
  json?: unknown;
  timestamp: number;
  /**
   * Raw mime map as sent by the server (e.g. "text/plain", "image/png", ...).
   */
  raw: Record<string, unknown>;
}

export interface ExecutionError {
  name: string;
  value: string;
  timestamp: number;
  traceback: string[];
}

export interface ExecutionComplete {
  timestamp: number;
  executionTimeMs: number;
}

export interface ExecutionInit {
  id: string;
  timestamp: number;
}

/**
 * Aggregated outcome of one code or command invocation.
 *
 * Either `error` is set, or the invocation succeeded; `logs` and `result` keep arrival order.
 */
export interface Execution {
  id?: string;
  executionCount?: number;
  /**
   * Exit status of a shell command. Unset for code executions.
   */
  exitCode?: number;
  logs: {
    stdout: OutputMessage[];
    stderr: OutputMessage[];
  };
  result: ExecutionResult[];
  error?: ExecutionError;
  complete?: ExecutionComplete;
}

export interface ExecutionHandlers {
  /**
   * Low-level hook for every stream event, called before the typed handlers.
   */
  onEvent?: (ev: ServerStreamEvent) => void | Promise<void>;
  onStdout?: (msg: OutputMessage) => void | Promise<void>;
  onStderr?: (msg: OutputMessage) => void | Promise<void>;
  onResult?: (res: ExecutionResult) => void | Promise<void>;
  onExecutionComplete?: (c: ExecutionComplete) => void | Promise<void>;
  onError?: (err: ExecutionError) => void | Promise<void>;
  onInit?: (init: ExecutionInit) => void | Promise<void>;
}

export function createEmptyExecution(): Execution {
  return {
    logs: { stdout: [], stderr: [] },
    result: [],
  };
}
