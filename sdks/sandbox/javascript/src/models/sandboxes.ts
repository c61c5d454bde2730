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

/**
 * Domain models for sandbox lifecycle.
 *
 * These are the stable, JS-friendly shapes. The wire schemas live in `adapters/schemas.ts`
 * and adapters map responses into these models.
 */

export type SandboxId = string;

export type SandboxState =
  | "running"
  | "pausing"
  | "paused"
  | "terminated"
  // Allow server-defined states as well.
  | (string & {});

export interface SandboxInfo {
  sandboxId: SandboxId;
  templateId: string;
  /**
   * Caller-defined key/value pairs; never interpreted by the SDK.
   */
  metadata: Record<string, string>;
  state: SandboxState;
  startedAt?: Date;
  /**
   * Time at which the server tears the sandbox down unless its timeout is extended.
   */
  endAt?: Date;
  /**
   * Sandbox domain as reported by the server, if any.
   */
  domain?: string;
  alias?: string;
  clientId?: string;
  cpuCount?: number;
  memoryMB?: number;
  envdVersion?: string;
  /**
   * Token the data plane expects in `X-Access-Token` (secure sandboxes only).
   */
  envdAccessToken?: string;
}

export interface CreateSandboxRequest {
  templateId: string;
  /**
   * Idle timeout in seconds, enforced by the server.
   */
  timeout: number;
  metadata?: Record<string, string>;
  envVars?: Record<string, string>;
  /**
   * Pause instead of delete when the timeout expires.
   */
  autoPause?: boolean;
  /**
   * Require an access token on data-plane requests.
   */
  secure?: boolean;
}

export interface ConnectSandboxRequest {
  /**
   * New idle timeout, in seconds, counted from the connect.
   */
  timeout: number;
}

export interface SandboxQuery {
  /**
   * Metadata equality filter; every pair must match.
   */
  metadata?: Record<string, string>;
  /**
   * State membership filter, e.g. `["running", "paused"]`.
   */
  states?: SandboxState[];
}

export interface ListSandboxesParams extends SandboxQuery {
  /**
   * Page size requested from the server.
   */
  limit?: number;
  /**
   * Cursor returned by the previous page.
   */
  nextToken?: string;
}

export interface ListSandboxesResponse {
  items: SandboxInfo[];
  /**
   * Cursor of the next page; absent on the last page.
   */
  nextToken?: string;
}
