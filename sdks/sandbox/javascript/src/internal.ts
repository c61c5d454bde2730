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
 * INTERNAL / ADVANCED ENTRYPOINT
 *
 * Low-level HTTP plumbing and adapters for advanced integrations and sibling SDKs.
 * Not exported from the root entrypoint; these shapes may change between releases.
 *
 * Import path:
 * - `@agent-sandbox/sandbox/internal`
 */

export { HttpClient, joinUrl, readBody } from "./adapters/httpClient.js";
export type { ApiRequestOptions, ApiResult, QueryValue } from "./adapters/httpClient.js";
export { throwOnApiError, toApiException } from "./adapters/apiError.js";
export { parseJsonEventStream } from "./adapters/sse.js";
export { parseResponse } from "./adapters/schemas.js";
export { consumeExecutionStream } from "./adapters/executionStream.js";
export type { ConsumeExecutionStreamOptions } from "./adapters/executionStream.js";

export { SandboxesAdapter } from "./adapters/sandboxesAdapter.js";
export { CommandsAdapter } from "./adapters/commandsAdapter.js";
export type { CommandsAdapterOptions } from "./adapters/commandsAdapter.js";
export { FilesystemAdapter } from "./adapters/filesystemAdapter.js";
export type { FilesystemAdapterOptions } from "./adapters/filesystemAdapter.js";
export { dataPlaneHeaders } from "./factory/defaultAdapterFactory.js";
