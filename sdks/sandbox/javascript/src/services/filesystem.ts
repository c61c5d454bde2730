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

import type { FileData, ReadFileOpts, WriteEntry, WriteFileOpts } from "../models/filesystem.js";

/**
 * File access inside the sandbox, served by the execd daemon.
 */
export interface SandboxFiles {
  /**
   * Read a file as text.
   */
  read(path: string, opts?: ReadFileOpts): Promise<string>;
  readBytes(path: string, opts?: Pick<ReadFileOpts, "signal">): Promise<Uint8Array>;

  /**
   * Create or overwrite one file. Missing parent directories are created by the server.
   */
  write(path: string, data: FileData, opts?: WriteFileOpts): Promise<void>;
  /**
   * Upload several files, one request per entry, in order. Stops at the first failure.
   */
  writeFiles(entries: WriteEntry[]): Promise<void>;
}
