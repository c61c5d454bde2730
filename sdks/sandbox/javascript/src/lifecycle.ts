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

import { ConnectionConfig, type ConnectionConfigOptions } from "./config/connection.js";
import { InvalidArgumentException, SandboxNotFoundException } from "./core/exceptions.js";
import type { Logger } from "./core/logger.js";
import { executeWithRetry, PAUSING_RETRY_POLICY, type RetryPolicy } from "./core/retry.js";
import type { SandboxId, SandboxInfo } from "./models/sandboxes.js";
import type { Sandboxes } from "./services/sandboxes.js";

// Lifecycle steps shared by `Sandbox` and `SandboxManager`.

export function resolveConnectionConfig(config?: ConnectionConfig | ConnectionConfigOptions): ConnectionConfig {
  return config instanceof ConnectionConfig ? config : new ConnectionConfig(config);
}

export function requirePositiveSeconds(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidArgumentException({ message: `${name} must be a positive number of seconds, got ${value}` });
  }
  return value;
}

export function requireSandboxId(sandboxId: string): SandboxId {
  if (!sandboxId?.trim()) {
    throw new InvalidArgumentException({ message: "sandboxId cannot be empty" });
  }
  return sandboxId;
}

/**
 * Connect (and implicitly resume), absorbing the pause transition under `policy`.
 */
export function connectWithRetry(
  sandboxes: Sandboxes,
  sandboxId: SandboxId,
  timeoutSeconds: number,
  opts: { policy?: RetryPolicy; logger: Logger; signal?: AbortSignal },
): Promise<SandboxInfo> {
  requirePositiveSeconds("timeoutSeconds", timeoutSeconds);
  return executeWithRetry(
    () => sandboxes.connectSandbox(sandboxId, { timeout: timeoutSeconds }),
    opts.policy ?? PAUSING_RETRY_POLICY,
    { label: "connect", logger: opts.logger, signal: opts.signal },
  );
}

/**
 * Delete a sandbox. A sandbox the server no longer knows is already in the requested end state.
 */
export async function killSandbox(sandboxes: Sandboxes, sandboxId: SandboxId, logger: Logger): Promise<void> {
  try {
    await sandboxes.deleteSandbox(sandboxId);
  } catch (err) {
    if (!(err instanceof SandboxNotFoundException)) throw err;
    logger.debug(`sandbox ${sandboxId} already terminated`);
  }
}
