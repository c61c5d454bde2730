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
 * Port of the in-sandbox daemon serving commands.
 */
export const DEFAULT_EXECD_PORT = 49983;

export const DEFAULT_TEMPLATE = "code-interpreter";
export const DEFAULT_GATEWAY_PREFIX = "gateway";

export const DEFAULT_TIMEOUT_SECONDS = 300;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 30;
export const DEFAULT_BACKGROUND_POLL_INTERVAL_MILLIS = 500;
export const DEFAULT_LIST_LIMIT = 100;

export const DEFAULT_USER_AGENT = "AgentSandbox-JS-SDK/0.1.0";

export const API_KEY_HEADER = "X-API-KEY";
export const ACCESS_TOKEN_HEADER = "X-Access-Token";
export const NEXT_TOKEN_HEADER = "x-next-token";
export const REQUEST_ID_HEADER = "x-request-id";

/**
 * Substring of the server message returned while a sandbox is still being paused.
 */
export const SANDBOX_PAUSING_MESSAGE = "sandbox is pausing";
