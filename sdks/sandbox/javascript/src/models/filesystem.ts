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

/**
 * Domain models for `sandbox.files`.
 */

/**
 * File content accepted by uploads. Strings are sent as UTF-8.
 */
export type FileData = string | Uint8Array | ArrayBuffer | Blob;

export interface WriteFileOpts {
  /**
   * Octal permission bits as a decimal literal, e.g. `644`.
   */
  mode?: number;
  owner?: string;
  group?: string;
}

export interface WriteEntry extends WriteFileOpts {
  path: string;
  data: FileData;
}

export interface ReadFileOpts {
  /**
   * Text decoding of `read`. Defaults to `utf-8`.
   */
  encoding?: string;
  signal?: AbortSignal;
}

/**
 * Upload metadata part sent with `POST /files/upload`.
 */
export interface FileMetadata {
  path: string;
  mode?: number;
  owner?: string;
  group?: string;
}
