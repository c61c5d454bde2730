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
 * Port of the code interpreter service inside a sandbox.
 */
export const JUPYTER_PORT = 49999;

export const SupportedLanguage = {
  PYTHON: "python",
  JAVASCRIPT: "javascript",
  TYPESCRIPT: "typescript",
  R: "r",
  JAVA: "java",
  BASH: "bash",
} as const;

export type SupportedLanguage = (typeof SupportedLanguage)[keyof typeof SupportedLanguage];

export const DEFAULT_LANGUAGE: SupportedLanguage = SupportedLanguage.PYTHON;

/**
 * A stateful interpreter session. Variables defined by one run are visible to later runs in the same context.
 */
export interface CodeContext {
  /**
   * Absent for the language's default context.
   */
  id?: string;
  language: SupportedLanguage | (string & {});
}

export interface RunCodeRequest {
  code: string;
  context: CodeContext;
}
