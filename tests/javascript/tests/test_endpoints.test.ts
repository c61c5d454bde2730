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

import { describe, expect, test } from "vitest";

import {
  PublicEndpointResolver,
  SandboxConfigurationException,
  SelfHostedEndpointResolver,
  createEndpointResolver,
} from "@agent-sandbox/sandbox";

describe("self-hosted gateway", () => {
  test("routes the api and sandbox ports under the gateway prefix", () => {
    const r = new SelfHostedEndpointResolver({ domain: "sandbox.example.com", gatewayPrefix: "gateway" });

    expect(r.protocol).toBe("https");
    expect(r.verifyTls).toBe(true);
    expect(r.getApiUrl()).toBe("https://sandbox.example.com/gateway/api");
    expect(r.getHost("sbx-1", 49983)).toBe("sandbox.example.com/gateway/sbx-1/49983");
    expect(r.getSandboxUrl("sbx-1", 49983)).toBe("https://sandbox.example.com/gateway/sbx-1/49983");
  });

  test("insecure mode uses http and disables certificate verification", () => {
    const r = new SelfHostedEndpointResolver({ domain: "10.0.0.7:8080", gatewayPrefix: "edge", secure: false });

    expect(r.protocol).toBe("http");
    expect(r.verifyTls).toBe(false);
    expect(r.getApiUrl()).toBe("http://10.0.0.7:8080/edge/api");
    expect(r.getSandboxUrl("abc", 49999)).toBe("http://10.0.0.7:8080/edge/abc/49999");
  });

  test("ignores a scheme and stray slashes in the configured values", () => {
    const r = new SelfHostedEndpointResolver({ domain: "http://sandbox.example.com/", gatewayPrefix: "/edge/" });

    expect(r.getApiUrl()).toBe("https://sandbox.example.com/edge/api");
  });

  test("a missing domain or prefix is a configuration error", () => {
    expect(() => new SelfHostedEndpointResolver({ gatewayPrefix: "gateway" })).toThrow(SandboxConfigurationException);
    expect(() => new SelfHostedEndpointResolver({ domain: "  ", gatewayPrefix: "gateway" })).toThrow(
      "Missing required configuration: domain",
    );
    expect(() => new SelfHostedEndpointResolver({ domain: "sandbox.example.com" })).toThrow(
      "Missing required configuration: gatewayPrefix",
    );
  });
});

describe("public service", () => {
  test("uses the api subdomain and port-prefixed sandbox hosts", () => {
    const r = new PublicEndpointResolver({ domain: "example.dev" });

    expect(r.getApiUrl()).toBe("https://api.example.dev");
    expect(r.getHost("sbx-1", 49999)).toBe("49999-sbx-1.example.dev");
    expect(r.getSandboxUrl("sbx-1", 49999)).toBe("https://49999-sbx-1.example.dev");
  });
});

describe("createEndpointResolver", () => {
  test("selects the implementation from the deployment mode", () => {
    const selfHosted = createEndpointResolver({ domain: "sandbox.example.com", gatewayPrefix: "gateway" });
    const publicService = createEndpointResolver({ mode: "public", domain: "example.dev" });

    expect(selfHosted).toBeInstanceOf(SelfHostedEndpointResolver);
    expect(selfHosted.mode).toBe("self-hosted");
    expect(publicService).toBeInstanceOf(PublicEndpointResolver);
    expect(publicService.mode).toBe("public");
  });
});
