import { afterEach, describe, expect, it, vi } from "vitest";
import { PassThrough } from "node:stream";
import pino from "pino";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolResultSchema,
  ToolListChangedNotificationSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { SessionRelay, mirrorCapabilities } from "./SessionRelay.js";
import { BackendUnavailableError } from "./errors.js";
import { BLOCKED_META_KEY } from "./types.js";
import { createServerPolicy } from "../config/PolicyLoader.js";
import type { ServerPolicyInit } from "../config/types.js";
import { FixedEffectClassifier } from "../plugins/classifier/FixedEffectClassifier.js";
import {
  BACKEND_TOOL_EFFECTS,
  createBackendDouble,
  type BackendDouble,
} from "../test-support/backend-double.js";

const FS_IO_POLICY: ServerPolicyInit = {
  name: "mock",
  command: "mock-backend",
  allow: ["FS", "IO"],
};

class FailingTransport implements Transport {
  onclose?: Transport["onclose"];
  onerror?: Transport["onerror"];
  onmessage?: Transport["onmessage"];
  closeCalls = 0;

  start(): Promise<void> {
    return Promise.reject(new Error("spawn missing-mcp-server ENOENT"));
  }

  async send(): Promise<void> {}

  async close(): Promise<void> {
    this.closeCalls += 1;
    this.onclose?.();
  }
}

interface Harness {
  relay: SessionRelay;
  caller: Client;
  backend: BackendDouble;
}

const relays: SessionRelay[] = [];

async function startHarness(
  policy: ServerPolicyInit = FS_IO_POLICY,
  backendOptions: { pageSize?: number } = {},
): Promise<Harness> {
  const backend = createBackendDouble(backendOptions);
  const [backendClientSide, backendServerSide] =
    InMemoryTransport.createLinkedPair();
  const [callerClientSide, callerServerSide] =
    InMemoryTransport.createLinkedPair();
  await backend.server.connect(backendServerSide);

  const relay = new SessionRelay({
    policy: createServerPolicy(policy),
    classifier: new FixedEffectClassifier(BACKEND_TOOL_EFFECTS),
    transports: { backend: backendClientSide, caller: callerServerSide },
    relayInfo: { name: "effect-gate-test", version: "0.0.0-test" },
  });
  relays.push(relay);
  await relay.start();

  const caller = new Client({ name: "test-caller", version: "1.0.0" });
  await caller.connect(callerClientSide);
  return { relay, caller, backend };
}

function callTool(
  caller: Client,
  name: string,
  args: Record<string, unknown> = {},
): Promise<CallToolResult> {
  return caller.request(
    { method: "tools/call", params: { name, arguments: args } },
    CallToolResultSchema,
  );
}

function texts(result: CallToolResult): string[] {
  return result.content.flatMap((c) => (c.type === "text" ? [c.text] : []));
}

afterEach(async () => {
  await Promise.all(relays.map((r) => r.close()));
  relays.length = 0;
});

describe("SessionRelay", () => {
  it("reaches Serving after the backend handshake", async () => {
    const { relay, caller } = await startHarness();

    expect(relay.getState()).toBe("Serving");
    expect(caller.getServerVersion()).toEqual({
      name: "effect-gate-test",
      version: "0.0.0-test",
    });
    expect(caller.getInstructions()).toBe("Mock backend for relay tests");
  });

  it("lists only tools whose effects the policy allows", async () => {
    const { caller } = await startHarness();

    const { tools } = await caller.listTools();

    expect(tools.map((t) => t.name)).toEqual(["read_file", "log_message"]);
    expect(tools[0].description).toBe("Read a file from disk");
  });

  it("fetches every page of the backend catalog", async () => {
    const { caller, backend } = await startHarness(FS_IO_POLICY, {
      pageSize: 1,
    });

    const result = await caller.listTools();

    expect(result.tools.map((t) => t.name)).toEqual(["read_file", "log_message"]);
    expect(result.nextCursor).toBeUndefined();
    expect(backend.listRequests()).toBe(3);
  });

  it("replaces the allowed-name cache on every listing", async () => {
    const { relay, caller } = await startHarness();

    expect(relay.getCatalogSnapshot()).toBeNull();
    await caller.listTools();
    await caller.listTools();

    const snapshot = relay.getCatalogSnapshot();
    expect(snapshot?.generation).toBe(2);
    expect([...(snapshot?.allowedNames ?? [])]).toEqual([
      "read_file",
      "log_message",
    ]);
  });

  it("blocks a call outside the policy without contacting the backend", async () => {
    const { caller, backend } = await startHarness();
    await caller.listTools();

    const result = await callTool(caller, "http_get", {
      url: "https://example.com",
    });

    expect(result.isError).toBe(true);
    expect(texts(result)).toEqual([
      "Tool 'http_get' is blocked by firewall policy: its effects NET are not allowed (allowed: FS, IO).",
    ]);
    expect(result._meta?.[BLOCKED_META_KEY]).toMatchObject({
      action: "TOOL_BLOCKED",
      tool: "http_get",
      effects: ["NET"],
      disallowedEffects: ["NET"],
      allowedEffects: ["FS", "IO"],
    });
    expect(backend.toolCalls).toEqual([]);
  });

  it("keeps serving after a blocked call", async () => {
    const { caller, backend } = await startHarness();
    await caller.listTools();

    await callTool(caller, "http_get", { url: "https://example.com" });
    const allowed = await callTool(caller, "read_file", { path: "/tmp/a.txt" });

    expect(allowed.isError).not.toBe(true);
    expect(texts(allowed)).toEqual(['read_file ok: {"path":"/tmp/a.txt"}']);
    expect(backend.toolCalls).toEqual(["read_file"]);
  });

  it("forwards allowed calls and returns the backend result unmodified", async () => {
    const { caller, backend } = await startHarness();
    await caller.listTools();

    const result = await callTool(caller, "log_message", { message: "hi" });

    expect(result.content).toEqual([
      { type: "text", text: 'log_message ok: {"message":"hi"}' },
    ]);
    expect(backend.toolCalls).toEqual(["log_message"]);
  });

  it("lists once lazily when a call arrives before any listing", async () => {
    const { relay, caller, backend } = await startHarness();

    const result = await callTool(caller, "http_get", {
      url: "https://example.com",
    });

    expect(result.isError).toBe(true);
    expect(backend.listRequests()).toBe(1);
    expect(backend.toolCalls).toEqual([]);
    expect(relay.getCatalogSnapshot()?.generation).toBe(1);
  });

  it("shares one lazy listing between concurrent early calls", async () => {
    const { caller, backend } = await startHarness();

    const [first, second] = await Promise.all([
      callTool(caller, "read_file", { path: "/tmp/a.txt" }),
      callTool(caller, "log_message", { message: "hi" }),
    ]);

    expect(first.isError).not.toBe(true);
    expect(second.isError).not.toBe(true);
    expect(backend.listRequests()).toBe(1);
    expect([...backend.toolCalls].sort()).toEqual(["log_message", "read_file"]);
  });

  it("blocks tools the backend never listed", async () => {
    const { caller } = await startHarness();
    await caller.listTools();

    const result = await callTool(caller, "delete_everything");

    expect(texts(result)).toEqual([
      "Tool 'delete_everything' is blocked by firewall policy: it is not in the allowed tool catalog.",
    ]);
  });

  it("applies tool overrides from the policy", async () => {
    const { caller } = await startHarness({
      ...FS_IO_POLICY,
      toolOverrides: { read_file: ["FS", "NET"], http_get: ["IO"] },
    });

    const { tools } = await caller.listTools();

    expect(tools.map((t) => t.name)).toEqual(["http_get", "log_message"]);
  });

  it("passes backend errors for forwarded calls through to the caller", async () => {
    const { caller } = await startHarness();
    await caller.listTools();

    await expect(
      callTool(caller, "read_file", { path: "/missing" }),
    ).rejects.toThrow("no such file: /missing");
  });

  it("forwards resources and prompts without filtering", async () => {
    const { caller } = await startHarness({
      name: "mock",
      command: "mock-backend",
      deny: ["FS", "IO", "NET", "PROC", "TIME", "RAND", "PURE"],
    });

    const resources = await caller.listResources();
    const templates = await caller.listResourceTemplates();
    const read = await caller.readResource({ uri: "file:///notes.txt" });
    const prompts = await caller.listPrompts();
    const prompt = await caller.getPrompt({
      name: "greet",
      arguments: { name: "Ada" },
    });

    expect(resources.resources).toEqual([
      { uri: "file:///notes.txt", name: "notes" },
    ]);
    expect(templates.resourceTemplates).toEqual([
      { uriTemplate: "file:///{name}", name: "any-file" },
    ]);
    expect(read.contents).toEqual([
      { uri: "file:///notes.txt", text: "hello notes" },
    ]);
    expect(prompts.prompts).toEqual([
      { name: "greet", description: "Greets someone" },
    ]);
    expect(prompt.messages).toEqual([
      { role: "user", content: { type: "text", text: "Hello Ada" } },
    ]);
  });

  it("relays tool list change notifications to the caller", async () => {
    const { caller, backend } = await startHarness();
    const notified = new Promise<void>((resolve) => {
      caller.setNotificationHandler(ToolListChangedNotificationSchema, () => {
        resolve();
      });
    });

    await backend.server.sendToolListChanged();

    await expect(notified).resolves.toBeUndefined();
  });

  it("closes the backend when the caller disconnects", async () => {
    const { relay, caller, backend } = await startHarness();
    const backendClosed = vi.fn();
    backend.server.onclose = backendClosed;

    await caller.close();
    await relay.closed;

    expect(relay.getState()).toBe("Closed");
    expect(backendClosed).toHaveBeenCalled();
  });

  it("closes the caller session when the backend goes away", async () => {
    const { relay, caller, backend } = await startHarness();
    const callerClosed = vi.fn();
    caller.onclose = callerClosed;

    await backend.server.close();
    await relay.closed;

    expect(relay.getState()).toBe("Closed");
    expect(callerClosed).toHaveBeenCalled();
  });

  it("tears down once when closing a transport re-enters close()", async () => {
    const lines: string[] = [];
    const log = pino(
      { level: "info" },
      {
        write: (line: string) => {
          lines.push(line);
        },
      },
    );
    const backend = createBackendDouble();
    const [backendClientSide, backendServerSide] =
      InMemoryTransport.createLinkedPair();
    await backend.server.connect(backendServerSide);
    const backendClosed = vi.fn();
    backend.server.onclose = backendClosed;
    const relay = new SessionRelay({
      policy: createServerPolicy(FS_IO_POLICY),
      classifier: new FixedEffectClassifier(BACKEND_TOOL_EFFECTS),
      transports: {
        backend: backendClientSide,
        caller: new StdioServerTransport(new PassThrough(), new PassThrough()),
      },
      logger: log,
    });
    relays.push(relay);
    await relay.start();

    await relay.close();
    await relay.closed;

    expect(relay.getState()).toBe("Closed");
    expect(backendClosed).toHaveBeenCalledTimes(1);
    expect(
      lines.filter((line) => line.includes('"msg":"Relay closed"')),
    ).toHaveLength(1);
    expect(
      lines.filter((line) => line.includes("Session ended; closing relay")),
    ).toHaveLength(0);
  });

  it("close() is idempotent", async () => {
    const { relay } = await startHarness();

    const first = relay.close();
    const second = relay.close();
    await Promise.all([first, second]);

    expect(first).toBe(second);
    expect(relay.getState()).toBe("Closed");
  });

  it("fails with BackendUnavailableError and cleans up both sides when launch fails", async () => {
    const backendTransport = new FailingTransport();
    const [callerClientSide, callerServerSide] =
      InMemoryTransport.createLinkedPair();
    const callerClosed = vi.fn();
    callerClientSide.onclose = callerClosed;
    const relay = new SessionRelay({
      policy: createServerPolicy(FS_IO_POLICY),
      classifier: new FixedEffectClassifier(BACKEND_TOOL_EFFECTS),
      transports: { backend: backendTransport, caller: callerServerSide },
    });
    relays.push(relay);

    const started = relay.start();

    await expect(started).rejects.toBeInstanceOf(BackendUnavailableError);
    await expect(started).rejects.toThrow(
      "Backend 'mock' could not be started: spawn missing-mcp-server ENOENT",
    );
    expect(relay.getState()).toBe("Closed");
    expect(backendTransport.closeCalls).toBeGreaterThan(0);
    expect(callerClosed).toHaveBeenCalled();
  });

  it("refuses to start twice", async () => {
    const { relay } = await startHarness();

    await expect(relay.start()).rejects.toThrow(
      "SessionRelay.start() called in state Serving",
    );
  });
});

describe("mirrorCapabilities", () => {
  it("advertises only what the backend offers", () => {
    expect(mirrorCapabilities({ tools: {} })).toEqual({
      tools: { listChanged: false },
    });
  });

  it("carries listChanged flags and drops resource subscriptions", () => {
    expect(
      mirrorCapabilities({
        tools: { listChanged: true },
        resources: { subscribe: true, listChanged: true },
        prompts: {},
        logging: {},
      }),
    ).toEqual({
      tools: { listChanged: true },
      resources: { listChanged: true },
      prompts: { listChanged: false },
    });
  });

  it("returns no capabilities for an unknown backend", () => {
    expect(mirrorCapabilities(undefined)).toEqual({});
  });
});
