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

import { SandboxApiException, SandboxError } from "../core/exceptions.js";
import type { SandboxInfo } from "../models/sandboxes.js";

// Control-plane wire schemas. Unknown fields pass through; optional fields tolerate null.

const isoDate = z
  .string()
  .transform((v, ctx) => {
    const d = new Date(v);
    if (Number.isNaN(d.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${v}` });
      return z.NEVER;
    }
    return d;
  });

const optionalString = z.string().nullish().transform((v) => v || undefined);
const optionalNumber = z.number().nullish().transform((v) => v ?? undefined);

export const apiSandboxSchema = z
  .object({
    sandboxID: z.string().min(1),
    templateID: z.string().nullish().transform((v) => v ?? ""),
    clientID: optionalString,
    alias: optionalString,
    domain: optionalString,
    state: z.string().nullish().transform((v) => v || "running"),
    metadata: z.record(z.string()).nullish().transform((v) => v ?? {}),
    startedAt: z.union([isoDate, z.literal(""), z.null()]).optional(),
    endAt: z.union([isoDate, z.literal(""), z.null()]).optional(),
    envdVersion: optionalString,
    envdAccessToken: optionalString,
    cpuCount: optionalNumber,
    memoryMB: optionalNumber,
  })
  .passthrough();

export type ApiSandbox = z.infer<typeof apiSandboxSchema>;

export const apiSandboxListSchema = z.array(apiSandboxSchema);

function optionalDate(v: Date | "" | null | undefined): Date | undefined {
  return v instanceof Date ? v : undefined;
}

export function toSandboxInfo(raw: ApiSandbox): SandboxInfo {
  return {
    sandboxId: raw.sandboxID,
    templateId: raw.templateID,
    metadata: raw.metadata,
    state: raw.state,
    startedAt: optionalDate(raw.startedAt),
    endAt: optionalDate(raw.endAt),
    domain: raw.domain,
    alias: raw.alias,
    clientId: raw.clientID,
    cpuCount: raw.cpuCount,
    memoryMB: raw.memoryMB,
    envdVersion: raw.envdVersion,
    envdAccessToken: raw.envdAccessToken,
  };
}

/**
 * Validate a 2xx body. A shape mismatch is an unexpected response, reported with the raw payload.
 */
export function parseResponse<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  response: Response,
  what: string,
): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const message = `${what} failed: unexpected response shape (${parsed.error.issues[0]?.message ?? "invalid"})`;
    throw new SandboxApiException({
      message,
      statusCode: response.status,
      error: new SandboxError(SandboxError.UNEXPECTED_RESPONSE, message),
      rawBody: data,
      cause: parsed.error,
    });
  }
  return parsed.data;
}
