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

import { createDefaultAdapterFactory } from "./factory/defaultAdapterFactory.js";
import type { AdapterFactory } from "./factory/adapterFactory.js";
import { JUPYTER_PORT } from "./models.js";
import type { Codes } from "./services/codes.js";

export interface CodeInterpreterCreateOptions {
  adapterFactory?: AdapterFactory;
  /**
   * Overrides the execution retry policy of `codes.run`. Defaults to the sandbox's override, if any.
   */
  retryPolicy?: RetryPolicy;
}

/**
 * Code interpreter facade (JS/TS).
 *
 * This class wraps an existing {@link Sandbox} and provides a high-level API for code execution.
 *
 * - Use {@link codes} to create contexts and run code.
 * - {@link commands} is exposed for convenience and is the same instance as on the underlying {@link Sandbox}.
 */
export class CodeInterpreter {
  private constructor(
    readonly sandbox: Sandbox,
    readonly codes: Codes,
  ) {}

  static async create(sandbox: Sandbox, opts: CodeInterpreterCreateOptions = {}): Promise<CodeInterpreter> {
    const interpreterBaseUrl = sandbox.getEndpointUrl(JUPYTER_PORT);
    const adapterFactory = opts.adapterFactory ?? createDefaultAdapterFactory();
    const codes = adapterFactory.createCodes({
      sandbox,
      interpreterBaseUrl,
      retryPolicy: opts.retryPolicy ?? sandbox.executionRetryPolicyOverride,
    });

    return new CodeInterpreter(sandbox, codes);
  }

  get id() {
    return this.sandbox.id;
  }

  get commands() {
    return this.sandbox.commands;
  }
}
