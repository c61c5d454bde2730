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

import { InvalidArgumentException } from "../core/exceptions.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { FileData, FileMetadata, ReadFileOpts, WriteEntry, WriteFileOpts } from "../models/filesystem.js";
import type { SandboxFiles } from "../services/filesystem.js";
import { toApiException } from "./apiError.js";
import { readBody, type HttpClient } from "./httpClient.js";

function basename(p: string): string {
  const parts = p.split("/").filter(Boolean);
  return parts[parts.length - 1] ?? "file";
}

function toUploadBlob(data: FileData): Blob {
  if (typeof data === "string") return new Blob([data], { type: "text/plain; charset=utf-8" });
  if (data instanceof Blob) return data.type ? data : new Blob([data], { type: "application/octet-stream" });
  if (data instanceof ArrayBuffer) return new Blob([data], { type: "application/octet-stream" });
  // Copy into a buffer the Blob owns; the caller may reuse theirs.
  return new Blob([Uint8Array.from(data)], { type: "application/octet-stream" });
}

function requirePath(path: string): void {
  if (!path.trim()) {
    throw new InvalidArgumentException({ message: "File path cannot be empty" });
  }
}

export interface FilesystemAdapterOptions {
  /**
   * Fetch used for uploads and downloads, whose bodies are not JSON.
   */
  fetch?: typeof fetch;
  /**
   * Headers for every data-plane request (API key, access token, ...).
   */
  headers?: Record<string, string>;
  logger?: Logger;
}

/**
 * Filesystem adapter behind `sandbox.files`.
 *
 * Uploads are `multipart/form-data` with a JSON `metadata` part and a `file` part;
 * downloads return the raw bytes.
 */
export class FilesystemAdapter implements SandboxFiles {
  private readonly fetch: typeof fetch;
  private readonly logger: Logger;

  constructor(
    private readonly client: HttpClient,
    private readonly opts: FilesystemAdapterOptions = {},
  ) {
    this.fetch = opts.fetch ?? fetch;
    this.logger = opts.logger ?? silentLogger;
  }

  async read(path: string, opts?: ReadFileOpts): Promise<string> {
    const bytes = await this.readBytes(path, { signal: opts?.signal });
    return new TextDecoder(opts?.encoding ?? "utf-8").decode(bytes);
  }

  async readBytes(path: string, opts?: Pick<ReadFileOpts, "signal">): Promise<Uint8Array> {
    requirePath(path);
    const response = await this.fetch(this.client.url("/files/download", { query: { path } }), {
      method: "GET",
      headers: { ...(this.opts.headers ?? {}) },
      signal: opts?.signal,
    });
    if (!response.ok) {
      throw toApiException({ error: (await readBody(response)) ?? {}, response }, "Read file failed");
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  async write(path: string, data: FileData, opts?: WriteFileOpts): Promise<void> {
    requirePath(path);
    await this.upload({ path, mode: opts?.mode, owner: opts?.owner, group: opts?.group }, data);
  }

  async writeFiles(entries: WriteEntry[]): Promise<void> {
    for (const e of entries) requirePath(e.path);
    for (const e of entries) {
      await this.upload({ path: e.path, mode: e.mode, owner: e.owner, group: e.group }, e.data);
    }
  }

  private async upload(meta: FileMetadata, data: FileData): Promise<void> {
    const form = new FormData();
    form.append("metadata", new Blob([JSON.stringify(meta)], { type: "application/json" }), "metadata");
    form.append("file", toUploadBlob(data), basename(meta.path));

    const response = await this.fetch(this.client.url("/files/upload"), {
      method: "POST",
      headers: { ...(this.opts.headers ?? {}) },
      body: form,
    });
    if (!response.ok) {
      throw toApiException({ error: (await readBody(response)) ?? {}, response }, "Write file failed");
    }
    this.logger.debug(`Wrote ${meta.path}`);
  }
}
