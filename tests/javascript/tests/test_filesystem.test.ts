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

import { beforeEach, describe, expect, test } from "vitest";

import {
  InvalidArgumentException,
  Sandbox,
  SandboxApiException,
  SandboxNotFoundException,
  SandboxPausingException,
  type ConnectionConfig,
} from "@agent-sandbox/sandbox";

import type { FakeSandboxService } from "./support/fakeSandboxService.js";
import { TEST_API_KEY, useFakeService } from "./support/harness.js";

let service: FakeSandboxService;
let connectionConfig: ConnectionConfig;

beforeEach(() => {
  ({ service, connectionConfig } = useFakeService());
});

describe("write and read", () => {
  test("a written text file reads back unchanged", async () => {
    const sandbox = await Sandbox.create({ connectionConfig });
    const content = "Why did the sandbox cross the gateway?\nTo reach port 49983. ✓\n";

    await sandbox.files.write("/home/user/my-file", content);
    const read = await sandbox.files.read("/home/user/my-file");

    expect(read).toBe(content);
    const [upload] = service.requestsTo("POST", "/files/upload");
    expect(upload?.url.href).toBe("https://sandbox.test/gateway/sbx-001/49983/files/upload");
    expect(upload?.headers.get("x-api-key")).toBe(TEST_API_KEY);
    expect(upload?.body).toEqual({
      metadata: { path: "/home/user/my-file" },
      fileName: "my-file",
      contentType: "text/plain; charset=utf-8",
    });
    const [download] = service.requestsTo("GET", "/files/download");
    expect(download?.url.searchParams.get("path")).toBe("/home/user/my-file");
  });

  test("writeFiles uploads every entry in order", async () => {
    const sandbox = await Sandbox.create({ connectionConfig });

    await sandbox.files.writeFiles([
      { path: "/path/to/a", data: "file a content" },
      { path: "/path/to/b", data: "file b content" },
    ]);

    expect(await sandbox.files.read("/path/to/a")).toBe("file a content");
    expect(await sandbox.files.read("/path/to/b")).toBe("file b content");
    expect(service.requestsTo("POST", "/files/upload").map((r) => r.body)).toEqual([
      { metadata: { path: "/path/to/a" }, fileName: "a", contentType: "text/plain; charset=utf-8" },
      { metadata: { path: "/path/to/b" }, fileName: "b", contentType: "text/plain; charset=utf-8" },
    ]);
  });

  test("binary content and permissions are uploaded as given", async () => {
    const sandbox = await Sandbox.create({ connectionConfig });
    const bytes = new Uint8Array([0, 255, 10, 128]);

    await sandbox.files.write("/tmp/blob.bin", bytes, { mode: 644, owner: "user" });
    bytes[0] = 7;

    expect(await sandbox.files.readBytes("/tmp/blob.bin")).toEqual(new Uint8Array([0, 255, 10, 128]));
    const stored = service.sandboxes.get(sandbox.id)?.files.get("/tmp/blob.bin");
    expect(stored?.mode).toBe(644);
    expect(stored?.owner).toBe("user");
    expect(stored?.group).toBeUndefined();
    expect(service.requestsTo("POST", "/files/upload")[0]?.body).toEqual({
      metadata: { path: "/tmp/blob.bin", mode: 644, owner: "user" },
      fileName: "blob.bin",
      contentType: "application/octet-stream",
    });
  });

  test("writing again overwrites the file", async () => {
    const sandbox = await Sandbox.create({ connectionConfig });

    await sandbox.files.write("/tmp/notes.txt", "first");
    await sandbox.files.write("/tmp/notes.txt", new Blob(["second"]));

    expect(await sandbox.files.read("/tmp/notes.txt")).toBe("second");
  });

  test("sends the access token of a secure sandbox", async () => {
    const sandbox = await Sandbox.create({ connectionConfig, secure: true });

    await sandbox.files.write("/tmp/x", "x");
    await sandbox.files.read("/tmp/x");

    expect(service.requestsTo("POST", "/files/upload")[0]?.headers.get("x-access-token")).toBe("test-access-token");
    expect(service.requestsTo("GET", "/files/download")[0]?.headers.get("x-access-token")).toBe("test-access-token");
  });
});

describe("failures", () => {
  test("reading a missing file reports the server's not-found", async () => {
    const sandbox = await Sandbox.create({ connectionConfig });

    const err = await sandbox.files.read("/nope").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SandboxNotFoundException);
    if (!(err instanceof SandboxNotFoundException)) return;
    expect(err.statusCode).toBe(404);
    expect(err.message).toBe("Read file failed: file not found");
  });

  test("a failed upload carries the server message", async () => {
    const sandbox = await Sandbox.create({ connectionConfig });
    service.failNextRequest("POST", "/files/upload", 507, { code: "DISK_FULL", message: "no space left" });

    const err = await sandbox.files.write("/tmp/big", "x").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SandboxApiException);
    if (!(err instanceof SandboxApiException)) return;
    expect(err.statusCode).toBe(507);
    expect(err.message).toBe("Write file failed: no space left");
    expect(err.error.code).toBe("DISK_FULL");
  });

  test("writeFiles stops at the first failed upload", async () => {
    const sandbox = await Sandbox.create({ connectionConfig });
    service.failNextRequest("POST", "/files/upload", 500, { code: 500, message: "disk error" });

    await expect(
      sandbox.files.writeFiles([
        { path: "/a", data: "a" },
        { path: "/b", data: "b" },
      ]),
    ).rejects.toThrow("Write file failed: disk error");

    expect(service.requestsTo("POST", "/files/upload")).toHaveLength(1);
    expect(service.sandboxes.get(sandbox.id)?.files.size).toBe(0);
  });

  test("blank paths are rejected before any request", async () => {
    const sandbox = await Sandbox.create({ connectionConfig });

    await expect(sandbox.files.read(" ")).rejects.toBeInstanceOf(InvalidArgumentException);
    await expect(sandbox.files.write("", "x")).rejects.toThrow("File path cannot be empty");
    await expect(
      sandbox.files.writeFiles([
        { path: "/ok", data: "fine" },
        { path: "  ", data: "bad" },
      ]),
    ).rejects.toBeInstanceOf(InvalidArgumentException);
    expect(service.requestsTo("POST", "/files/upload")).toHaveLength(0);
    expect(service.requestsTo("GET", "/files/download")).toHaveLength(0);
  });

  test("a paused sandbox answers with the pausing error", async () => {
    const sandbox = await Sandbox.create({ connectionConfig });
    await sandbox.pause();

    await expect(sandbox.files.read("/tmp/x")).rejects.toBeInstanceOf(SandboxPausingException);
  });
});
