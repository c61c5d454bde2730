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

import { SandboxConfigurationException } from "./exceptions.js";

export type ConnectionProtocol = "http" | "https";

export type DeploymentMode = "self-hosted" | "public";

/**
 * Maps configuration to the URLs the SDK talks to. Pure: no I/O.
 *
 * - control plane: create/list/info/pause/connect/kill
 * - data plane: one exposed port of one running sandbox
 */
export interface EndpointResolver {
  readonly mode: DeploymentMode;
  readonly secure: boolean;
  readonly protocol: ConnectionProtocol;
  /**
   * Whether HTTP clients should verify the server certificate.
   */
  readonly verifyTls: boolean;

  getApiUrl(): string;
  getHost(sandboxId: string, port: number): string;
  getSandboxUrl(sandboxId: string, port: number): string;
}

export interface EndpointResolverOptions {
  mode?: DeploymentMode;
  domain?: string;
  secure?: boolean;
  gatewayPrefix?: string;
}

function stripSlashes(s: string): string {
  return s.replace(/^\/+|\/+$/g, "");
}

function requireValue(name: string, value: string | undefined): string {
  const v = value?.trim();
  if (!v) {
    throw new SandboxConfigurationException({ message: `Missing required configuration: ${name}` });
  }
  return v;
}

function normalizeDomain(domain: string): string {
  // A scheme in the domain is ignored; transport security comes from `secure`.
  return stripSlashes(domain.replace(/^https?:\/\//, ""));
}

abstract class BaseEndpointResolver implements EndpointResolver {
  abstract readonly mode: DeploymentMode;
  readonly protocol: ConnectionProtocol;
  readonly domain: string;

  constructor(domain: string | undefined, readonly secure: boolean) {
    this.domain = normalizeDomain(requireValue("domain", domain));
    this.protocol = secure ? "https" : "http";
  }

  get verifyTls(): boolean {
    return this.secure;
  }

  abstract getApiUrl(): string;
  abstract getHost(sandboxId: string, port: number): string;

  getSandboxUrl(sandboxId: string, port: number): string {
    return `${this.protocol}://${this.getHost(sandboxId, port)}`;
  }
}

/**
 * A self-hosted gateway that serves both planes under one domain and a routing prefix:
 *
 * - `{scheme}://{domain}/{prefix}/api`
 * - `{domain}/{prefix}/{sandboxId}/{port}`
 */
export class SelfHostedEndpointResolver extends BaseEndpointResolver {
  readonly mode = "self-hosted";
  readonly gatewayPrefix: string;

  constructor(opts: { domain?: string; secure?: boolean; gatewayPrefix?: string }) {
    super(opts.domain, opts.secure ?? true);
    this.gatewayPrefix = stripSlashes(requireValue("gatewayPrefix", opts.gatewayPrefix));
  }

  getApiUrl(): string {
    return `${this.protocol}://${this.domain}/${this.gatewayPrefix}/api`;
  }

  getHost(sandboxId: string, port: number): string {
    return `${this.domain}/${this.gatewayPrefix}/${sandboxId}/${port}`;
  }
}

/**
 * The vendor's public service: API under `api.{domain}`, sandboxes under `{port}-{sandboxId}.{domain}`.
 */
export class PublicEndpointResolver extends BaseEndpointResolver {
  readonly mode = "public";

  constructor(opts: { domain?: string; secure?: boolean }) {
    super(opts.domain, opts.secure ?? true);
  }

  getApiUrl(): string {
    return `${this.protocol}://api.${this.domain}`;
  }

  getHost(sandboxId: string, port: number): string {
    return `${port}-${sandboxId}.${this.domain}`;
  }
}

export function createEndpointResolver(opts: EndpointResolverOptions): EndpointResolver {
  switch (opts.mode ?? "self-hosted") {
    case "public":
      return new PublicEndpointResolver(opts);
    case "self-hosted":
      return new SelfHostedEndpointResolver(opts);
  }
}
