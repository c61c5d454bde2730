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

export {
  CommandExitException,
  ExecutionInterruptedException,
  InvalidArgumentException,
  RetryExhaustedException,
  SandboxApiException,
  SandboxConfigurationException,
  SandboxError,
  SandboxException,
  SandboxInternalException,
  SandboxNotFoundException,
  SandboxPausingException,
} from "./core/exceptions.js";
export type { SandboxErrorCode } from "./core/exceptions.js";

export {
  EXECUTION_RETRY_POLICY,
  PAUSING_RETRY_POLICY,
  executeWithRetry,
  isExecutionRetryable,
  isSandboxPausingError,
  retryPolicy,
} from "./core/retry.js";
export type { RetryOptions, RetryPolicy } from "./core/retry.js";

export {
  PublicEndpointResolver,
  SelfHostedEndpointResolver,
  createEndpointResolver,
} from "./core/endpoints.js";
export type {
  ConnectionProtocol,
  DeploymentMode,
  EndpointResolver,
  EndpointResolverOptions,
} from "./core/endpoints.js";

export { createConsoleLogger, silentLogger } from "./core/logger.js";
export type { Logger } from "./core/logger.js";

export type { AdapterFactory } from "./factory/adapterFactory.js";
export { DefaultAdapterFactory, createDefaultAdapterFactory } from "./factory/defaultAdapterFactory.js";

export { ConnectionConfig, readSandboxEnv } from "./config/connection.js";
export type { ConnectionConfigOptions, SandboxEnv } from "./config/connection.js";

export type {
  ConnectSandboxRequest,
  CreateSandboxRequest,
  ListSandboxesParams,
  ListSandboxesResponse,
  SandboxId,
  SandboxInfo,
  SandboxQuery,
  SandboxState,
} from "./models/sandboxes.js";

export type { Sandboxes } from "./services/sandboxes.js";

export { SandboxManager } from "./manager.js";
export type { SandboxFilter, SandboxListQuery, SandboxManagerOptions } from "./manager.js";
export { SandboxPaginator } from "./paginator.js";

export type {
  BackgroundOutput,
  CommandExecution,
  RunCommandOpts,
  RunCommandRequest,
  ServerStreamEvent,
} from "./models/execd.js";
export { COMMAND_EXEC_ERROR_NAME, serverStreamEventSchema } from "./models/execd.js";
export type { ExecdCommands } from "./services/execdCommands.js";
export type { FileData, ReadFileOpts, WriteEntry, WriteFileOpts } from "./models/filesystem.js";
export type { SandboxFiles } from "./services/filesystem.js";
export { CommandHandle } from "./commandHandle.js";
export type { CommandHandleOptions } from "./commandHandle.js";

export type {
  Execution,
  ExecutionComplete,
  ExecutionError,
  ExecutionHandlers,
  ExecutionInit,
  ExecutionResult,
  OutputMessage,
} from "./models/execution.js";
export { createEmptyExecution } from "./models/execution.js";
export { ExecutionEventDispatcher } from "./models/executionEventDispatcher.js";

export {
  DEFAULT_EXECD_PORT,
  DEFAULT_GATEWAY_PREFIX,
  DEFAULT_LIST_LIMIT,
  DEFAULT_REQUEST_TIMEOUT_SECONDS,
  DEFAULT_TEMPLATE,
  DEFAULT_TIMEOUT_SECONDS,
} from "./core/constants.js";

export type {
  SandboxBaseOptions,
  SandboxConnectOptions,
  SandboxCreateOptions,
  SandboxListOptions,
} from "./sandbox.js";
export { Sandbox } from "./sandbox.js";
