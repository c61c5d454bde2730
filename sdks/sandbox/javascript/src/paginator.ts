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

import type { ListSandboxesResponse, SandboxInfo } from "./models/sandboxes.js";

/**
 * Lazy cursor over the pages of a sandbox listing.
 *
 * Nothing is fetched until {@link nextItems} (or iteration) is called. A paginator is single-use;
 * call `list()` again to start over. Stopping early yields only the pages read so far.
 */
export class SandboxPaginator implements AsyncIterable<SandboxInfo> {
  private cursor?: string;
  private exhausted = false;

  constructor(private readonly fetchPage: (nextToken?: string) => Promise<ListSandboxesResponse>) {}

  get hasNext(): boolean {
    return !this.exhausted;
  }

  /**
   * Token of the page {@link nextItems} will fetch; undefined before the first page.
   */
  get nextToken(): string | undefined {
    return this.cursor;
  }

  /**
   * Fetch the next page. Returns an empty array once the listing is exhausted.
   */
  async nextItems(): Promise<SandboxInfo[]> {
    if (this.exhausted) return [];
    const page = await this.fetchPage(this.cursor);
    this.cursor = page.nextToken;
    if (!page.nextToken) this.exhausted = true;
    return page.items;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<SandboxInfo> {
    while (this.hasNext) {
      for (const item of await this.nextItems()) yield item;
    }
  }

  async toArray(): Promise<SandboxInfo[]> {
    const out: SandboxInfo[] = [];
    for await (const item of this) out.push(item);
    return out;
  }
}
