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

export { CodeInterpreter } from "./interpreter.js";
export type { CodeInterpreterCreateOptions } from "./interpreter.js";

export type { AdapterFactory, CreateCodesStackOptions } from "./factory/adapterFactory.js";
export { DefaultAdapterFactory, createDefaultAdapterFactory } from "./factory/defaultAdapterFactory.js";
export { CodesAdapter } from "./adapters/codesAdapter.js";
export type { CodesAdapterOptions } from "./adapters/codesAdapter.js";

export type { CodeContext, RunCodeRequest } from "./models.js";
export { DEFAULT_LANGUAGE, JUPYTER_PORT, SupportedLanguage } from "./models.js";

export type { Codes, RunCodeOptions } from "./services/codes.js";

export type {
  Execution,
  ExecutionComplete,
  ExecutionError,
  ExecutionHandlers,
  ExecutionInit,
  ExecutionResult,
  OutputMessage,
} from "@agent-sandbox/sandbox";
