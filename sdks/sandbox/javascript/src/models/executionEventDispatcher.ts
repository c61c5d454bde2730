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

import type {
  Execution,
  ExecutionComplete,
  ExecutionError,
  ExecutionHandlers,
  ExecutionInit,
  ExecutionResult,
  OutputMessage,
} from "./execution.js";
import { COMMAND_EXEC_ERROR_NAME, type ServerStreamEvent } from "./execd.js";

function optionalString(v: unknown): string | undefined {
  return v == null ? undefined : String(v);
}

function toExecutionResult(results: Record<string, unknown>, timestamp: number): ExecutionResult {
  return {
    text: optionalString(results["text/plain"] ?? results.text),
    html: optionalString(results["text/html"]),
    markdown: optionalString(results["text/markdown"]),
    png: optionalString(results["image/png"]),
    jpeg: optionalString(results["image/jpeg"]),
    svg: optionalString(results["image/svg+xml"]),
    json: results["application/json"],
    timestamp,
    raw: results,
  };
}

function parseExitCode(v: string | number | undefined): number | undefined {
  if (v == null) return undefined;
  const n = typeof v === "number" ? v : Number.parseInt(v, 10);
  return Number.isInteger(n) ? n : undefined;
}

/**
 * Dispatches streamed execution events to handlers.
 *
 * This mutates the provided `execution` object (appending logs/results and setting fields like
 * `id`, `executionCount`, `exitCode` and `complete`) and then awaits the matching callback in
 * {@link ExecutionHandlers}, so handlers observe fragments in the order they are aggregated.
 */
export class ExecutionEventDispatcher {
  private delivered = 0;

  constructor(
    private readonly execution: Execution,
    private readonly handlers?: ExecutionHandlers,
  ) {}

  /**
   * Number of fragments handed to the aggregate so far: the init acknowledgement plus output,
   * result and error events.
   */
  get deliveredFragments(): number {
    return this.delivered;
  }

  async dispatch(ev: ServerStreamEvent): Promise<void> {
    await this.handlers?.onEvent?.(ev);

    const ts = ev.timestamp ?? Date.now();
    switch (ev.type) {
      case "init": {
        const id = ev.text ?? "";
        if (id) this.execution.id = id;
        const init: ExecutionInit = { id: this.execution.id ?? id, timestamp: ts };
        this.delivered++;
        await this.handlers?.onInit?.(init);
        return;
      }
      case "stdout": {
        const msg: OutputMessage = { text: ev.text ?? "", timestamp: ts, isError: false };
        this.execution.logs.stdout.push(msg);
        this.delivered++;
        await this.handlers?.onStdout?.(msg);
        return;
      }
      case "stderr": {
        const msg: OutputMessage = { text: ev.text ?? "", timestamp: ts, isError: true };
        this.execution.logs.stderr.push(msg);
        this.delivered++;
        await this.handlers?.onStderr?.(msg);
        return;
      }
      case "result": {
        if (!ev.results) return;
        const r = toExecutionResult(ev.results, ts);
        this.execution.result.push(r);
        this.delivered++;
        await this.handlers?.onResult?.(r);
        return;
      }
      case "execution_count": {
        if (typeof ev.execution_count === "number") this.execution.executionCount = ev.execution_count;
        return;
      }
      case "execution_complete": {
        const complete: ExecutionComplete = {
          timestamp: ts,
          executionTimeMs: typeof ev.execution_time === "number" ? ev.execution_time : 0,
        };
        if (typeof ev.exit_code === "number") this.execution.exitCode = ev.exit_code;
        this.execution.complete = complete;
        await this.handlers?.onExecutionComplete?.(complete);
        return;
      }
      case "error": {
        const e = ev.error;
        if (!e) return;
        const err: ExecutionError = {
          name: String(e.ename ?? ""),
          value: String(e.evalue ?? ""),
          timestamp: ts,
          traceback: Array.isArray(e.traceback) ? e.traceback.map(String) : [],
        };
        if (err.name === COMMAND_EXEC_ERROR_NAME) {
          const code = parseExitCode(e.evalue);
          if (code !== undefined) this.execution.exitCode = code;
        }
        this.execution.error = err;
        this.delivered++;
        await this.handlers?.onError?.(err);
        return;
      }
      default:
        return;
    }
  }
}
