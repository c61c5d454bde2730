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

import { z } from "zod";

import { REQUEST_ID_HEADER, SANDBOX_PAUSING_MESSAGE } from "../core/constants.js";
import {
  SandboxApiException,
  SandboxError,
  SandboxNotFoundException,
  SandboxPausingException,
} from "../core/exceptions.js";
import type { ApiResult } from "./httpClient.js";

const errorBodySchema = z
  .object({
    code: z.union([z.string(), z.number()]).optional(),
    message: z.string().optional(),
  })
  .passthrough();

/**
 * Build the SDK exception for a non-2xx response.
 *
 * 404 maps to {@link SandboxNotFoundException}; a "sandbox is pausing" message maps to
 * {@link SandboxPausingException}; everything else is a {@link SandboxApiException}
 * carrying the raw response payload.
 */
export function toApiException(
  result: { error?: unknown; response: Response },
  fallbackMessage: string,
): SandboxApiException {
  const requestId = result.response.headers.get(REQUEST_ID_HEADER) ?? undefined;
  const statusCode = result.response.status;
  const rawBody = result.error;

  const parsed = errorBodySchema.safeParse(rawBody);
  const body = parsed.success ? parsed.data : undefined;
  const serverMessage = body?.message ?? (typeof rawBody === "string" && rawBody ? rawBody : undefined);
  const message = serverMessage
    ? `${fallbackMessage}: ${serverMessage}`
    : `${fallbackMessage} (status=${statusCode})`;

  if (statusCode === 404) {
    return new SandboxNotFoundException({ message, statusCode, requestId, rawBody });
  }
  if (serverMessage?.includes(SANDBOX_PAUSING_MESSAGE)) {
    return new SandboxPausingException({ message, statusCode, requestId, rawBody });
  }
  const code = body?.code;
  // Numeric codes mirror the HTTP status; only string codes are stable identifiers.
  const error = typeof code === "string" && code
    ? new SandboxError(code, serverMessage ?? message)
    : new SandboxError(SandboxError.UNEXPECTED_RESPONSE, serverMessage ?? message);
  return new SandboxApiException({ message, statusCode, requestId, error, rawBody });
}

export function throwOnApiError(result: ApiResult, fallbackMessage: string): void {
  if (result.response.ok) return;
  throw toApiException(result, fallbackMessage);
}
