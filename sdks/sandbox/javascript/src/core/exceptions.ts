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

import type { Execution } from "../models/execution.js";

export type SandboxErrorCode =
  | "INTERNAL_UNKNOWN_ERROR"
  | "CONFIGURATION_ERROR"
  | "NOT_FOUND"
  | "SANDBOX_PAUSING"
  | "RETRY_EXHAUSTED"
  | "COMMAND_EXIT"
  | "EXECUTION_INTERRUPTED"
  | "INVALID_ARGUMENT"
  | "UNEXPECTED_RESPONSE"
  // Allow server-defined codes as well.
  | (string & {});

/**
 * Structured error payload carried by {@link SandboxException}.
 *
 * - `code`: stable programmatic identifier
 * - `message`: optional human-readable message
 */
export class SandboxError {
  static readonly INTERNAL_UNKNOWN_ERROR: SandboxErrorCode = "INTERNAL_UNKNOWN_ERROR";
  static readonly CONFIGURATION_ERROR: SandboxErrorCode = "CONFIGURATION_ERROR";
  static readonly NOT_FOUND: SandboxErrorCode = "NOT_FOUND";
  static readonly SANDBOX_PAUSING: SandboxErrorCode = "SANDBOX_PAUSING";
  static readonly RETRY_EXHAUSTED: SandboxErrorCode = "RETRY_EXHAUSTED";
  static readonly COMMAND_EXIT: SandboxErrorCode = "COMMAND_EXIT";
  static readonly EXECUTION_INTERRUPTED: SandboxErrorCode = "EXECUTION_INTERRUPTED";
  static readonly INVALID_ARGUMENT: SandboxErrorCode = "INVALID_ARGUMENT";
  static readonly UNEXPECTED_RESPONSE: SandboxErrorCode = "UNEXPECTED_RESPONSE";

  constructor(
    readonly code: SandboxErrorCode,
    readonly message?: string,
  ) {}
}

interface SandboxExceptionOpts {
  message?: string;
  cause?: unknown;
  error?: SandboxError;
}

/**
 * Base exception class for all SDK errors.
 *
 * All errors thrown by this SDK are subclasses of {@link SandboxException}.
 */
export class SandboxException extends Error {
  readonly name: string = "SandboxException";
  readonly error: SandboxError;
  readonly cause?: unknown;
  /**
   * Number of attempts made before this error propagated.
   * Only set when the failing call went through the retry executor and was retried at least once.
   */
  attempts?: number;

  constructor(opts: SandboxExceptionOpts = {}) {
    super(opts.message);
    this.cause = opts.cause;
    this.error = opts.error ?? new SandboxError(SandboxError.INTERNAL_UNKNOWN_ERROR);
  }
}

type SandboxApiExceptionOpts = SandboxExceptionOpts & {
  statusCode?: number;
  requestId?: string;
  rawBody?: unknown;
};

export class SandboxApiException extends SandboxException {
  readonly name: string = "SandboxApiException";
  readonly statusCode?: number;
  readonly requestId?: string;
  readonly rawBody?: unknown;

  constructor(opts: SandboxApiExceptionOpts) {
    super({
      message: opts.message,
      cause: opts.cause,
      error: opts.error ?? new SandboxError(SandboxError.UNEXPECTED_RESPONSE, opts.message),
    });
    this.statusCode = opts.statusCode;
    this.requestId = opts.requestId;
    this.rawBody = opts.rawBody;
  }
}

/**
 * The sandbox id is unknown to the server, or the sandbox was already reaped by its timeout.
 */
export class SandboxNotFoundException extends SandboxApiException {
  readonly name: string = "SandboxNotFoundException";

  constructor(opts: Omit<SandboxApiExceptionOpts, "error">) {
    super({
      ...opts,
      statusCode: opts.statusCode ?? 404,
      error: new SandboxError(SandboxError.NOT_FOUND, opts.message),
    });
  }
}

/**
 * The sandbox is between running and paused. The transition resolves on its own.
 */
export class SandboxPausingException extends SandboxApiException {
  readonly name: string = "SandboxPausingException";

  constructor(opts: Omit<SandboxApiExceptionOpts, "error">) {
    super({
      ...opts,
      error: new SandboxError(SandboxError.SANDBOX_PAUSING, opts.message),
    });
  }
}

export class SandboxInternalException extends SandboxException {
  readonly name: string = "SandboxInternalException";

  constructor(opts: { message?: string; cause?: unknown }) {
    super({
      message: opts.message,
      cause: opts.cause,
      error: new SandboxError(SandboxError.INTERNAL_UNKNOWN_ERROR, opts.message),
    });
  }
}

/**
 * A required endpoint or credential setting is missing or malformed.
 */
export class SandboxConfigurationException extends SandboxException {
  readonly name: string = "SandboxConfigurationException";

  constructor(opts: { message?: string; cause?: unknown }) {
    super({
      message: opts.message,
      cause: opts.cause,
      error: new SandboxError(SandboxError.CONFIGURATION_ERROR, opts.message),
    });
  }
}

export class InvalidArgumentException extends SandboxException {
  readonly name: string = "InvalidArgumentException";

  constructor(opts: { message?: string; cause?: unknown }) {
    super({
      message: opts.message,
      cause: opts.cause,
      error: new SandboxError(SandboxError.INVALID_ARGUMENT, opts.message),
    });
  }
}

/**
 * Every attempt of a retried operation failed with a retryable error.
 *
 * `lastError` (also exposed as `cause`) is the error raised by the final attempt.
 */
export class RetryExhaustedException extends SandboxException {
  readonly name: string = "RetryExhaustedException";
  readonly lastError: unknown;

  constructor(opts: { message?: string; attempts: number; lastError: unknown }) {
    super({
      message: opts.message,
      cause: opts.lastError,
      error: new SandboxError(SandboxError.RETRY_EXHAUSTED, opts.message),
    });
    this.attempts = opts.attempts;
    this.lastError = opts.lastError;
  }
}

/**
 * A command ran to completion but exited with a non-zero status.
 *
 * This is a result of the command, not a transport failure.
 */
export class CommandExitException extends SandboxException {
  readonly name: string = "CommandExitException";
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly execution: Execution;

  constructor(opts: { exitCode: number; execution: Execution; message?: string }) {
    const stdout = opts.execution.logs.stdout.map((m) => m.text).join("");
    const stderr = opts.execution.logs.stderr.map((m) => m.text).join("");
    const message = opts.message ?? `Command exited with code ${opts.exitCode}`;
    super({
      message,
      error: new SandboxError(SandboxError.COMMAND_EXIT, message),
    });
    this.exitCode = opts.exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
    this.execution = opts.execution;
  }
}

/**
 * The output stream broke after fragments were already delivered to handlers.
 * Not retried, since a retry would deliver the same fragments twice.
 */
export class ExecutionInterruptedException extends SandboxException {
  readonly name: string = "ExecutionInterruptedException";
  readonly execution: Execution;

  constructor(opts: { message?: string; cause?: unknown; execution: Execution }) {
    super({
      message: opts.message,
      cause: opts.cause,
      error: new SandboxError(SandboxError.EXECUTION_INTERRUPTED, opts.message),
    });
    this.execution = opts.execution;
  }
}
