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

import { SANDBOX_PAUSING_MESSAGE } from "./constants.js";
import {
  CommandExitException,
  ExecutionInterruptedException,
  InvalidArgumentException,
  RetryExhaustedException,
  SandboxConfigurationException,
  SandboxException,
  SandboxNotFoundException,
  SandboxPausingException,
} from "./exceptions.js";
import { silentLogger, type Logger } from "./logger.js";

export interface RetryPolicy {
  /**
   * Upper bound on invocations of the operation, first attempt included.
   */
  maxAttempts: number;
  /**
   * Fixed wait between two attempts.
   */
  delayMillis: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryOptions {
  /**
   * Operation name used in log lines and in the exhaustion message.
   */
  label?: string;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(t);
      reject(signal?.reason);
    };
    const t = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * True when the error says the target sandbox is still transitioning to paused.
 */
export function isSandboxPausingError(error: unknown): boolean {
  if (error instanceof SandboxPausingException) return true;
  return errorMessage(error).includes(SANDBOX_PAUSING_MESSAGE);
}

/**
 * Run invocations are retried on any failure except the ones that cannot change on a second try:
 * exhausted retries, semantic command failures, unknown sandboxes, bad configuration or arguments,
 * streams interrupted mid-delivery, and caller aborts.
 */
export function isExecutionRetryable(error: unknown): boolean {
  if (
    error instanceof RetryExhaustedException ||
    error instanceof CommandExitException ||
    error instanceof SandboxNotFoundException ||
    error instanceof SandboxConfigurationException ||
    error instanceof InvalidArgumentException ||
    error instanceof ExecutionInterruptedException
  ) {
    return false;
  }
  return !isAbortError(error);
}

/**
 * Connect: tolerate up to ~60s of pause-transition latency.
 */
export const PAUSING_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 30,
  delayMillis: 2000,
  isRetryable: isSandboxPausingError,
});

/**
 * Code/command runs: tolerate up to ~25s of execution-plane hiccups.
 */
export const EXECUTION_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 5,
  delayMillis: 5000,
  isRetryable: isExecutionRetryable,
});

export function retryPolicy(base: RetryPolicy, overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy: RetryPolicy = { ...base, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new InvalidArgumentException({ message: `maxAttempts must be a positive integer, got ${policy.maxAttempts}` });
  }
  if (!Number.isFinite(policy.delayMillis) || policy.delayMillis < 0) {
    throw new InvalidArgumentException({ message: `delayMillis must be >= 0, got ${policy.delayMillis}` });
  }
  return policy;
}

/**
 * Invoke `operation` until it succeeds, fails with a non-retryable error, or `policy.maxAttempts`
 * is reached. Exhaustion raises {@link RetryExhaustedException} carrying the last error.
 *
 * Each call owns its loop; there is no shared state between concurrent calls.
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions = {},
): Promise<T> {
  const label = opts.label ?? "operation";
  const logger = opts.logger ?? silentLogger;
  const wait = opts.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (opts.signal?.aborted || !policy.isRetryable(error)) {
        if (attempt > 1 && error instanceof SandboxException) error.attempts = attempt;
        throw error;
      }
      if (attempt >= policy.maxAttempts) {
        logger.error(`[${label}] giving up after ${attempt} attempts: ${errorMessage(error)}`);
        throw new RetryExhaustedException({
          message: `${label} failed after ${attempt} attempts: ${errorMessage(error)}`,
          attempts: attempt,
          lastError: error,
        });
      }
      logger.warn(
        `[${label}] attempt ${attempt}/${policy.maxAttempts} failed: ${errorMessage(error)}, retrying in ${policy.delayMillis}ms`,
      );
      await wait(policy.delayMillis, opts.signal);
    }
  }
}
