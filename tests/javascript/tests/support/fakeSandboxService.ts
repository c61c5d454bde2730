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
 * In-process stand-in for the sandbox gateway (control plane + data plane), served through a fake `fetch`.
 *
 * Routing follows the self-hosted layout with the default "gateway" prefix:
 * - control plane: `{scheme}://{domain}/gateway/api/...`
 * - data plane:    `{scheme}://{domain}/gateway/{sandboxId}/{port}/...`
 */

export const FAKE_DOMAIN = "sandbox.test";
export const PAUSING_ERROR_MESSAGE = "sandbox is pausing, please wait a moment and try again";

export type StreamEvent = Record<string, unknown>;

export interface ScriptedRun {
  events: StreamEvent[];
  /**
   * Wire framing of the event stream. Defaults to NDJSON.
   */
  format?: "ndjson" | "sse";
  /**
   * Break the stream with a network error after the events were sent.
   */
  breakAfterEvents?: boolean;
  /**
   * Answer with this status and JSON body instead of a stream.
   */
  status?: number;
  errorBody?: unknown;
}

export interface BackgroundPoll {
  events: StreamEvent[];
  running: boolean;
  exitCode?: number;
}

interface InjectedFailure {
  method: string;
  pathSuffix: string;
  status: number;
  body: unknown;
  headers: Record<string, string>;
}

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
}

interface FakeSandbox {
  sandboxID: string;
  templateID: string;
  metadata: Record<string, string>;
  state: "running" | "pausing" | "paused";
  timeout: number;
  envdAccessToken?: string;
  pausingConnectsLeft: number;
  files: Map<string, StoredFile>;
}

export interface StoredFile {
  content: Uint8Array;
  mode?: number;
  owner?: string;
  group?: string;
}

interface Upload {
  metadata: Record<string, unknown>;
  fileName: string;
  contentType: string;
  content: Uint8Array;
}

async function readUpload(form: FormData): Promise<Upload> {
  const metadata = form.get("metadata");
  const file = form.get("file");
  if (metadata === null || typeof metadata === "string" || file === null || typeof file === "string") {
    throw new TypeError("malformed upload: metadata and file parts are required");
  }
  const parsed: unknown = JSON.parse(await metadata.text());
  return {
    metadata: isRecord(parsed) ? parsed : {},
    fileName: file.name,
    contentType: file.type,
    content: new Uint8Array(await file.arrayBuffer()),
  };
}

interface BackgroundCommand {
  polls: BackgroundPoll[];
  cursor: number;
  killed: boolean;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function stringRecord(v: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(v)) return out;
  for (const [k, value] of Object.entries(v)) {
    if (typeof value === "string") out[k] = value;
  }
  return out;
}

function json(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

function noContent(): Response {
  return new Response(null, { status: 204 });
}

function apiError(status: number, message: string): Response {
  return json(status, { code: status, message });
}

function eventStream(run: ScriptedRun): Response {
  const encoder = new TextEncoder();
  const chunks: Uint8Array[] = [];
  for (const ev of run.events) {
    const line = run.format === "sse" ? `data: ${JSON.stringify(ev)}\n\n` : `${JSON.stringify(ev)}\n`;
    // Split every frame in two so the client has to reassemble lines across reads.
    const mid = Math.floor(line.length / 2);
    chunks.push(encoder.encode(line.slice(0, mid)), encoder.encode(line.slice(mid)));
  }
  let next = 0;
  const stream = new ReadableStream<Uint8Array>(
    {
      pull(controller) {
        const chunk = chunks[next++];
        if (chunk) controller.enqueue(chunk);
        else if (run.breakAfterEvents) controller.error(new TypeError("terminated"));
        else controller.close();
      },
    },
    { highWaterMark: 0 },
  );
  return new Response(stream, {
    status: 200,
    headers: { "content-type": run.format === "sse" ? "text/event-stream" : "application/x-ndjson" },
  });
}

/**
 * Event sequence of a command that printed `stdout` and exited with `exitCode`.
 */
export function commandEvents(opts: { id?: string; stdout?: string[]; stderr?: string[]; exitCode?: number }): StreamEvent[] {
  const events: StreamEvent[] = [{ type: "init", text: opts.id ?? "cmd-fg", timestamp: 1 }];
  for (const text of opts.stdout ?? []) events.push({ type: "stdout", text, timestamp: 2 });
  for (const text of opts.stderr ?? []) events.push({ type: "stderr", text, timestamp: 3 });
  const exitCode = opts.exitCode ?? 0;
  if (exitCode !== 0) {
    events.push({
      type: "error",
      error: { ename: "CommandExecError", evalue: String(exitCode), traceback: [] },
      timestamp: 4,
    });
  }
  events.push({ type: "execution_complete", execution_time: 5, exit_code: exitCode, timestamp: 5 });
  return events;
}

function defaultCommandRun(command: string): ScriptedRun {
  if (command === "false") return { events: commandEvents({ exitCode: 1 }) };
  if (command === "true") return { events: commandEvents({}) };
  const echo = /^echo (.*)$/.exec(command);
  if (echo) return { events: commandEvents({ stdout: [`${echo[1]}\n`] }) };
  return { events: commandEvents({ stderr: [`sh: ${command}: not found\n`], exitCode: 127 }) };
}

function defaultCodeRun(code: string, contextId: string | undefined): ScriptedRun {
  const init: StreamEvent = { type: "init", text: contextId ?? "default-python", timestamp: 1 };
  const done: StreamEvent = { type: "execution_complete", execution_time: 3, timestamp: 9 };
  if (code === "print(1+2)") {
    return { events: [init, { type: "stdout", text: "3\n", timestamp: 2 }, { type: "execution_count", execution_count: 1 }, done] };
  }
  if (code === "1+2") {
    return { events: [init, { type: "result", results: { "text/plain": "3" }, timestamp: 2 }, done] };
  }
  const raised = /^raise (\w+)\("(.*)"\)$/.exec(code);
  if (raised) {
    return {
      events: [
        init,
        { type: "error", error: { ename: raised[1], evalue: raised[2], traceback: [`${raised[1]}: ${raised[2]}`] }, timestamp: 2 },
      ],
    };
  }
  return { events: [init, done] };
}

export class FakeSandboxService {
  readonly requests: RecordedRequest[] = [];
  readonly sandboxes = new Map<string, FakeSandbox>();
  /**
   * Number of connect calls that observe a pause in progress before the sandbox settles as paused.
   */
  pausingConnects = 0;
  /**
   * Issue an access token to every sandbox created with `secure: true`.
   */
  accessToken = "test-access-token";

  private readonly failures: InjectedFailure[] = [];
  private readonly commandRuns: ScriptedRun[] = [];
  private readonly codeRuns: ScriptedRun[] = [];
  private readonly backgroundScripts: BackgroundPoll[][] = [];
  private readonly commands = new Map<string, BackgroundCommand>();
  private readonly contexts = new Map<string, string>();
  private sandboxSeq = 0;
  private commandSeq = 0;
  private contextSeq = 0;

  /**
   * `fetch` replacement; install it with `vi.stubGlobal("fetch", service.fetch)`.
   */
  readonly fetch = async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const method = (init?.method ?? "GET").toUpperCase();
    const upload = init?.body instanceof FormData ? await readUpload(init.body) : undefined;
    const body = upload
      ? { metadata: upload.metadata, fileName: upload.fileName, contentType: upload.contentType }
      : typeof init?.body === "string" && init.body
        ? JSON.parse(init.body)
        : undefined;
    this.requests.push({ method, url, headers: new Headers(init?.headers), body });

    const failureIdx = this.failures.findIndex((f) => f.method === method && url.pathname.endsWith(f.pathSuffix));
    const failure = this.failures[failureIdx];
    if (failure) {
      this.failures.splice(failureIdx, 1);
      return json(failure.status, failure.body, failure.headers);
    }

    const segments = url.pathname.split("/").filter(Boolean);
    if (url.host !== FAKE_DOMAIN || segments[0] !== "gateway") {
      throw new TypeError(`fetch failed: unexpected host ${url.href}`);
    }
    if (segments[1] === "api") {
      return this.controlPlane(method, segments.slice(2), url.searchParams, body);
    }
    const sandboxId = segments[1] ?? "";
    const port = Number(segments[2]);
    return this.dataPlane(method, sandboxId, port, segments.slice(3), url.searchParams, body, upload);
  };

  /**
   * Answer the next matching request with `status` and `body` instead of routing it.
   */
  failNextRequest(method: string, pathSuffix: string, status: number, body: unknown, headers: Record<string, string> = {}): void {
    this.failures.push({ method, pathSuffix, status, body, headers });
  }

  /**
   * Queue the next foreground `POST /command` response. Unqueued commands use built-in behavior.
   */
  queueCommandRun(run: ScriptedRun): void {
    this.commandRuns.push(run);
  }

  queueCodeRun(run: ScriptedRun): void {
    this.codeRuns.push(run);
  }

  /**
   * Queue the polls the next background command will answer, in order.
   */
  queueBackgroundCommand(polls: BackgroundPoll[]): void {
    this.backgroundScripts.push(polls);
  }

  /**
   * Add a sandbox directly, bypassing `POST /sandboxes`.
   */
  seed(opts: { templateID?: string; metadata?: Record<string, string>; state?: FakeSandbox["state"] } = {}): string {
    const sandboxID = `sbx-${String(++this.sandboxSeq).padStart(3, "0")}`;
    this.sandboxes.set(sandboxID, {
      sandboxID,
      templateID: opts.templateID ?? "code-interpreter",
      metadata: opts.metadata ?? {},
      state: opts.state ?? "running",
      timeout: 300,
      pausingConnectsLeft: 0,
      files: new Map(),
    });
    return sandboxID;
  }

  requestsTo(method: string, pathSuffix: string): RecordedRequest[] {
    return this.requests.filter((r) => r.method === method && r.url.pathname.endsWith(pathSuffix));
  }

  private toJson(sbx: FakeSandbox): Record<string, unknown> {
    return {
      sandboxID: sbx.sandboxID,
      templateID: sbx.templateID,
      clientID: "client-1",
      alias: sbx.templateID,
      domain: FAKE_DOMAIN,
      metadata: sbx.metadata,
      state: sbx.state,
      startedAt: "2026-01-01T00:00:00.000Z",
      endAt: "2026-01-01T00:05:00.000Z",
      envdVersion: "0.1.0",
      envdAccessToken: sbx.envdAccessToken ?? null,
      cpuCount: 2,
      memoryMB: 512,
    };
  }

  private notFound(sandboxId: string): Response {
    return apiError(404, `sandbox "${sandboxId}" doesn't exist or you don't have access to it`);
  }

  private controlPlane(method: string, path: string[], query: URLSearchParams, body: unknown): Response {
    const [collection, id, action] = path;

    if (method === "POST" && collection === "sandboxes" && !id) {
      const req = isRecord(body) ? body : {};
      const sandboxID = this.seed({
        templateID: typeof req.templateID === "string" ? req.templateID : "",
        metadata: stringRecord(req.metadata),
      });
      const sbx = this.sandboxes.get(sandboxID);
      if (!sbx) return apiError(500, "internal error");
      if (typeof req.timeout === "number") sbx.timeout = req.timeout;
      if (req.secure === true) sbx.envdAccessToken = this.accessToken;
      return json(201, this.toJson(sbx));
    }

    if (method === "GET" && collection === "v2" && id === "sandboxes") {
      return this.list(query);
    }

    if (collection !== "sandboxes" || !id) return apiError(404, "route not found");
    const sbx = this.sandboxes.get(id);
    if (!sbx) return this.notFound(id);

    if (method === "GET" && !action) return json(200, this.toJson(sbx));
    if (method === "DELETE" && !action) {
      this.sandboxes.delete(id);
      return noContent();
    }
    if (method === "POST" && action === "pause") {
      if (sbx.state !== "running") return apiError(409, `sandbox "${id}" is not running`);
      sbx.pausingConnectsLeft = this.pausingConnects;
      sbx.state = this.pausingConnects > 0 ? "pausing" : "paused";
      return noContent();
    }
    if (method === "POST" && action === "connect") {
      if (sbx.state === "pausing") {
        sbx.pausingConnectsLeft -= 1;
        if (sbx.pausingConnectsLeft <= 0) sbx.state = "paused";
        return apiError(409, PAUSING_ERROR_MESSAGE);
      }
      const resumed = sbx.state === "paused";
      sbx.state = "running";
      if (isRecord(body) && typeof body.timeout === "number") sbx.timeout = body.timeout;
      return json(resumed ? 201 : 200, this.toJson(sbx));
    }
    if (method === "POST" && action === "timeout") {
      if (isRecord(body) && typeof body.timeout === "number") sbx.timeout = body.timeout;
      return noContent();
    }
    return apiError(404, "route not found");
  }

  private list(query: URLSearchParams): Response {
    const states = query.get("state")?.split(",").filter(Boolean);
    const metadataFilter = new URLSearchParams(query.get("metadata") ?? "");
    const limit = Number(query.get("limit") ?? "100");
    const offset = Number(query.get("nextToken") ?? "0");

    const matching = [...this.sandboxes.values()].filter((sbx) => {
      if (states && !states.includes(sbx.state)) return false;
      for (const [k, v] of metadataFilter) {
        if (sbx.metadata[k] !== v) return false;
      }
      return true;
    });
    const page = matching.slice(offset, offset + limit);
    const headers: Record<string, string> = {};
    if (offset + limit < matching.length) headers["x-next-token"] = String(offset + limit);
    return json(200, page.map((sbx) => this.toJson(sbx)), headers);
  }

  private dataPlane(
    method: string,
    sandboxId: string,
    port: number,
    path: string[],
    query: URLSearchParams,
    body: unknown,
    upload?: Upload,
  ): Response {
    const sbx = this.sandboxes.get(sandboxId);
    if (!sbx) return this.notFound(sandboxId);
    if (sbx.state !== "running") return apiError(502, PAUSING_ERROR_MESSAGE);
    const req = isRecord(body) ? body : {};

    if (port === 49983) {
      if (method === "POST" && path.join("/") === "command") {
        const command = typeof req.command === "string" ? req.command : "";
        if (req.background === true) {
          const id = `cmd-${++this.commandSeq}`;
          this.commands.set(id, { polls: this.backgroundScripts.shift() ?? [], cursor: 0, killed: false });
          return eventStream({ events: [{ type: "init", text: id, timestamp: 1 }] });
        }
        const run = this.commandRuns.shift() ?? defaultCommandRun(command);
        return run.status ? json(run.status, run.errorBody ?? {}) : eventStream(run);
      }
      if (method === "GET" && path[0] === "command" && path[2] === "output") {
        const cmd = this.commands.get(path[1] ?? "");
        if (!cmd) return apiError(404, "command not found");
        if (cmd.killed) return json(200, { events: [], cursor: cmd.cursor, running: false, exitCode: 137 });
        const poll = cmd.polls.shift() ?? { events: [], running: false, exitCode: 0 };
        cmd.cursor += poll.events.length;
        return json(200, { events: poll.events, cursor: cmd.cursor, running: poll.running, exitCode: poll.exitCode ?? null });
      }
      if (method === "POST" && path.join("/") === "files/upload") {
        const target = upload?.metadata.path;
        if (!upload || typeof target !== "string") return apiError(400, "metadata.path is required");
        const { mode, owner, group } = upload.metadata;
        sbx.files.set(target, {
          content: upload.content,
          mode: typeof mode === "number" ? mode : undefined,
          owner: typeof owner === "string" ? owner : undefined,
          group: typeof group === "string" ? group : undefined,
        });
        return noContent();
      }
      if (method === "GET" && path.join("/") === "files/download") {
        const file = sbx.files.get(query.get("path") ?? "");
        if (!file) return apiError(404, "file not found");
        return new Response(file.content.slice(), { status: 200, headers: { "content-type": "application/octet-stream" } });
      }
      if (method === "DELETE" && path.join("/") === "command") {
        const cmd = this.commands.get(query.get("id") ?? "");
        if (!cmd || cmd.killed) return apiError(404, "command not found");
        cmd.killed = true;
        return noContent();
      }
    }

    if (port === 49999) {
      const route = path.join("/");
      if (method === "POST" && route === "code/context") {
        const id = `ctx-${++this.contextSeq}`;
        const language = typeof req.language === "string" ? req.language : "python";
        this.contexts.set(id, language);
        return json(200, { id, language });
      }
      if (method === "GET" && route === "code/contexts") {
        const language = query.get("language");
        const items = [...this.contexts.entries()]
          .filter(([, lang]) => !language || lang === language)
          .map(([id, lang]) => ({ id, language: lang }));
        return json(200, items);
      }
      if (method === "GET" && path[0] === "code" && path[1] === "contexts" && path[2]) {
        const language = this.contexts.get(path[2]);
        if (!language) return apiError(404, "context not found");
        return json(200, { id: path[2], language });
      }
      if (method === "DELETE" && path[0] === "code" && path[1] === "contexts" && path[2]) {
        if (!this.contexts.delete(path[2])) return apiError(404, "context not found");
        return noContent();
      }
      if (method === "DELETE" && route === "code/contexts") {
        const language = query.get("language");
        for (const [id, lang] of this.contexts) {
          if (lang === language) this.contexts.delete(id);
        }
        return noContent();
      }
      if (method === "DELETE" && route === "code") {
        if (!this.contexts.has(query.get("id") ?? "")) return apiError(404, "context not found");
        return noContent();
      }
      if (method === "POST" && route === "code") {
        const code = typeof req.code === "string" ? req.code : "";
        const context = isRecord(req.context) ? req.context : {};
        const contextId = typeof context.id === "string" ? context.id : undefined;
        const run = this.codeRuns.shift() ?? defaultCodeRun(code, contextId);
        return run.status ? json(run.status, run.errorBody ?? {}) : eventStream(run);
      }
    }

    return apiError(404, "route not found");
  }
}
