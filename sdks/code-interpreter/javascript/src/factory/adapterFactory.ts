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

import type { RetryPolicy, Sandbox } from "@agent-sandbox/sandbox";

import type { Codes } from "../services/codes.js";

export interface CreateCodesStackOptions {
  sandbox: Sandbox;
  interpreterBaseUrl: string;
  retryPolicy?: RetryPolicy;
}

/**
 * Factory abstraction to keep {@link CodeInterpreter} decoupled from the concrete codes adapter.
 */
export interface AdapterFactory {
  createCodes(opts: CreateCodesStackOptions): Codes;
}
