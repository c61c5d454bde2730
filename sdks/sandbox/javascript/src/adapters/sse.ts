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

import type { ZodType, ZodTypeDef } from "zod";

import { toApiException } from "./apiError.js";

function tryParseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

function stripDataPrefix(line: string): string {
  return line.startsWith("data:") ? line.slice("data:".length).trim() : line;
}

/**
 * Parses an SSE-like stream that may be either:
 * - standard SSE frames (`data: {...}\n\n`)
 * - newline-delimited JSON (one JSON object per line)
 *
 * Lines that are not JSON, or do not match `schema`, are skipped.
 * A non-2xx response is raised before any event is yielded.
 */
export async function* parseJsonEventStream<T>(
  res: Response,
  schema: ZodType<T, ZodTypeDef, unknown>,
  opts?: { fallbackErrorMessage?: string },
): AsyncIterable<T> {
  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw toApiException(
      { error: tryParseJson(text) ?? text, response: res },
      opts?.fallbackErrorMessage ?? "Stream request failed",
    );
  }

  if (!res.body) {
    return;
  }

  const parseLine = (raw: string): T | undefined => {
    const line = raw.trim();
    if (!line) return undefined;
    if (line.startsWith(":")) return undefined;
    if (line.startsWith("event:") || line.startsWith("id:") || line.startsWith("retry:")) return undefined;
    const jsonLine = stripDataPrefix(line);
    if (!jsonLine) return undefined;
    const parsed = schema.safeParse(tryParseJson(jsonLine));
    return parsed.success ? parsed.data : undefined;
  };

  const reader = res.body.getReader();
  const decoder = new TextDecoder("utf-8");
  let buf = "";
  let drained = false;

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        drained = true;
        break;
      }

      buf += decoder.decode(value, { stream: true });
      let idx: number;

      while ((idx = buf.indexOf("\n")) >= 0) {
        const rawLine = buf.slice(0, idx);
        buf = buf.slice(idx + 1);
        const ev = parseLine(rawLine);
        if (ev !== undefined) yield ev;
      }
    }

    // Flush any buffered UTF-8 bytes from the decoder, then the last unterminated line.
    buf += decoder.decode();
    const last = parseLine(buf);
    if (last !== undefined) yield last;
  } finally {
    // Early exit (consumer stopped, abort, handler error): close the connection.
    if (!drained) await reader.cancel().catch(() => undefined);
    reader.releaseLock();
  }
}
