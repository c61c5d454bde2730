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

import { vi } from "vitest";

import {
  ConnectionConfig,
  EXECUTION_RETRY_POLICY,
  PAUSING_RETRY_POLICY,
  retryPolicy,
  silentLogger,
} from "@agent-sandbox/sandbox";

import { FAKE_DOMAIN, FakeSandboxService } from "./fakeSandboxService.js";

export const TEST_API_KEY = "test-api-key";

export const fastConnectPolicy = retryPolicy(PAUSING_RETRY_POLICY, { delayMillis: 0 });
export const fastExecutionPolicy = retryPolicy(EXECUTION_RETRY_POLICY, { delayMillis: 0 });

/**
 * Install a fresh fake service as the global fetch and return a config pointing at it.
 *
 * The config must be built after the stub: it binds the global fetch on construction.
 */
export function useFakeService(): { service: FakeSandboxService; connectionConfig: ConnectionConfig } {
  const service = new FakeSandboxService();
  vi.stubGlobal("fetch", service.fetch);
  const connectionConfig = new ConnectionConfig({
    domain: FAKE_DOMAIN,
    apiKey: TEST_API_KEY,
    logger: silentLogger,
  });
  return { service, connectionConfig };
}
