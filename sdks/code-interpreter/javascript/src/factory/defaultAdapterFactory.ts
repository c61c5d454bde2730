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

import { HttpClient } from "@agent-sandbox/sandbox/internal";

import { CodesAdapter } from "../adapters/codesAdapter.js";
import type { Codes } from "../services/codes.js";
import type { AdapterFactory, CreateCodesStackOptions } from "./adapterFactory.js";

export class DefaultAdapterFactory implements AdapterFactory {
  createCodes(opts: CreateCodesStackOptions): Codes {
    const { connectionConfig } = opts.sandbox;
    const headers = opts.sandbox.getDataPlaneHeaders();
    const client = new HttpClient(opts.interpreterBaseUrl, {
      fetch: connectionConfig.fetch,
      headers,
    });
    return new CodesAdapter(client, {
      sseFetch: connectionConfig.sseFetch,
      headers,
      retryPolicy: opts.retryPolicy,
      logger: connectionConfig.logger,
    });
  }
}

export function createDefaultAdapterFactory(): AdapterFactory {
  return new DefaultAdapterFactory();
}
