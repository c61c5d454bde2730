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

import { ExecutionInterruptedException } from "../core/exceptions.js";
import type { Logger } from "../core/logger.js";
import { executeWithRetry, type RetryPolicy } from "../core/retry.js";
import type { ServerStreamEvent } from "../models/execd.js";
import { createEmptyExecution, type Execution, type ExecutionHandlers } from "../models/execution.js";
import { ExecutionEventDispatcher } from "../models/executionEventDispatcher.js";

export interface ConsumeExecutionStreamOptions {
  /**
   * Opens a fresh event stream. Called once per attempt.
   */
  open: (signal?: AbortSignal) => AsyncIterable<ServerStreamEvent>;
  policy: RetryPolicy;
  label: string;
  logger?: Logger;
  handlers?: ExecutionHandlers;
  signal?: AbortSignal;
}

/**
 * Drain an execution stream into an {@link Execution}, retrying per `policy`.
 *
 * Each attempt aggregates into a new execution. Once the server has acknowledged the execution
 * (`init`) or a fragment has reached the handlers, a broken stream raises
 * {@link ExecutionInterruptedException} instead of being retried.
 */
export function consumeExecutionStream(opts: ConsumeExecutionStreamOptions): Promise<Execution> {
  const { open, handlers, signal } = opts;

  return executeWithRetry(
    async () => {
      const execution = createEmptyExecution();
      const dispatcher = new ExecutionEventDispatcher(execution, handlers);
      try {
        for await (const ev of open(signal)) {
          await dispatcher.dispatch(ev);
        }
      } catch (err) {
        if (signal?.aborted || dispatcher.deliveredFragments === 0) throw err;
        const reason = err instanceof Error ? err.message : String(err);
        throw new ExecutionInterruptedException({
          message: `${opts.label} interrupted after ${dispatcher.deliveredFragments} delivered fragments: ${reason}`,
          cause: err,
          execution,
        });
      }
      return execution;
    },
    opts.policy,
    { label: opts.label, logger: opts.logger, signal },
  );
}
