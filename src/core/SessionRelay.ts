import { v7 as uuidv7 } from "uuid";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  CallToolResultSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  PromptListChangedNotificationSchema,
  ReadResourceRequestSchema,
  ResourceListChangedNotificationSchema,
  ToolListChangedNotificationSchema,
  type CallToolRequest,
  type CallToolResult,
  type ServerCapabilities,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type { ServerPolicy } from "../config/types.js";
import type { EffectClassifierInterface } from "../interfaces/EffectClassifierInterface.js";
import { KeywordEffectClassifier } from "../plugins/classifier/KeywordEffectClassifier.js";
import {
  createBackendTransport,
  createCallerTransport,
} from "./transports/index.js";
import { AllowedNameCache, type CatalogSnapshot } from "./AllowedNameCache.js";
import { buildAllowedTools, buildBlockedResult, isAllowed } from "./ToolGate.js";
import { BackendUnavailableError } from "./errors.js";
import type { RelayState, RelayTransports, SessionRelayConfig } from "./types.js";
import { getPackageVersion } from "../version.js";
import { logger, type Logger } from "../logger.js";

const TRANSITIONS: Record<RelayState, readonly RelayState[]> = {
  Disconnected: ["ConnectingBackend", "Closed"],
  ConnectingBackend: ["BackendReady", "Closed"],
  BackendReady: ["Serving", "Closed"],
  Serving: ["Closed"],
  Closed: [],
};

/**
 * Capabilities to advertise to the caller: the backend's tools, resources and prompts,
 * with their listChanged flags. Resource subscriptions are not relayed.
 */
export function mirrorCapabilities(
  backend: ServerCapabilities | undefined,
): ServerCapabilities {
  const capabilities: ServerCapabilities = {};
  if (backend?.tools) {
    capabilities.tools = { listChanged: backend.tools.listChanged === true };
  }
  if (backend?.resources) {
    capabilities.resources = {
      listChanged: backend.resources.listChanged === true,
    };
  }
  if (backend?.prompts) {
    capabilities.prompts = { listChanged: backend.prompts.listChanged === true };
  }
  return capabilities;
}

/**
 * Bridges one caller-facing MCP session and one backend MCP session.
 *
 * Tool listings are filtered through the Tool Gate and every listing replaces the
 * allowed-name cache; tool calls are checked against the cache (populated lazily by a
 * single listing if the caller calls before it lists). Resources and prompts are
 * forwarded verbatim. When either session ends, both are torn down together.
 */
export class SessionRelay {
  private readonly policy: ServerPolicy;
  private readonly classifier: EffectClassifierInterface;
  private readonly relayInfo: { name: string; version: string };
  private readonly log: Logger;
  private readonly configuredTransports?: RelayTransports;

  private readonly cache = new AllowedNameCache();
  private state: RelayState = "Disconnected";
  private transports: RelayTransports | null = null;
  private backend: Client | null = null;
  private server: Server | null = null;
  /** Shared by concurrent calls that arrive before the first listing. */
  private lazyListing: Promise<CatalogSnapshot> | null = null;
  private closing: Promise<void> | null = null;
  private resolveClosed: () => void = () => {};

  /** Resolves once the relay reaches Closed, whichever side ended first. */
  readonly closed: Promise<void>;

  constructor(config: SessionRelayConfig) {
    this.policy = config.policy;
    this.classifier = config.classifier ?? new KeywordEffectClassifier();
    this.relayInfo = config.relayInfo ?? {
      name: "effect-gate",
      version: getPackageVersion(),
    };
    this.configuredTransports = config.transports;
    this.log = (config.logger ?? logger).child({
      server: config.policy.name,
      sessionId: uuidv7(),
    });
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  getState(): RelayState {
    return this.state;
  }

  /** Latest catalog snapshot used for call gating; null before the first listing. */
  getCatalogSnapshot(): CatalogSnapshot | null {
    return this.cache.snapshot();
  }

  /**
   * Connect the backend (launch + handshake), then start serving the caller.
   * Resolves once Serving. On any failure both sides are closed before rejecting;
   * backend failures reject with BackendUnavailableError.
   */
  async start(): Promise<void> {
    if (this.state !== "Disconnected") {
      throw new Error(`SessionRelay.start() called in state ${this.state}`);
    }
    const transports = this.configuredTransports ?? {
      backend: createBackendTransport(this.policy),
      caller: createCallerTransport(),
    };
    this.transports = transports;

    this.transition("ConnectingBackend");
    this.log.info(
      { command: this.policy.command, args: this.policy.args },
      "Connecting to backend",
    );
    const backend = new Client(this.relayInfo, { capabilities: {} });
    backend.onclose = () => this.onSessionEnded("backend");
    backend.onerror = (err) => {
      this.log.warn({ err }, "Backend session error");
    };
    try {
      await backend.connect(transports.backend);
    } catch (err) {
      await this.close();
      const detail = err instanceof Error ? err.message : String(err);
      throw new BackendUnavailableError(
        `Backend '${this.policy.name}' could not be started: ${detail}`,
        { cause: err },
      );
    }
    if (this.isClosed()) {
      throw new BackendUnavailableError(
        `Backend '${this.policy.name}' closed during startup`,
      );
    }
    this.backend = backend;
    this.transition("BackendReady");
    this.log.info(
      { backend: backend.getServerVersion() },
      "Backend initialized",
    );

    const capabilities = mirrorCapabilities(backend.getServerCapabilities());
    const server = new Server(this.relayInfo, {
      capabilities,
      instructions: backend.getInstructions(),
    });
    server.onclose = () => this.onSessionEnded("caller");
    server.onerror = (err) => {
      this.log.warn({ err }, "Caller session error");
    };
    this.registerHandlers(server, backend, capabilities);
    this.relayListChanged(backend, server, capabilities);

    try {
      await server.connect(transports.caller);
    } catch (err) {
      await this.close();
      throw err;
    }
    this.server = server;
    if (this.isClosed()) return;
    this.transition("Serving");
    this.log.info(
      { capabilities: Object.keys(capabilities) },
      "Firewall relay serving",
    );
  }

  /**
   * Close both sessions (and with the backend session, the backend process).
   * Idempotent; every call resolves once teardown has finished.
   */
  close(): Promise<void> {
    if (this.closing) return this.closing;
    // Closing a transport may fire onclose synchronously, re-entering here before
    // shutdown() has returned; state is already Closed by then.
    if (this.isClosed()) return this.closed;
    this.closing = this.shutdown();
    return this.closing;
  }

  private isClosed(): boolean {
    return this.state === "Closed";
  }

  private transition(next: RelayState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid relay transition ${this.state} → ${next}`);
    }
    this.log.debug({ from: this.state, to: next }, "Relay state");
    this.state = next;
  }

  private onSessionEnded(side: "backend" | "caller"): void {
    if (!this.closing && !this.isClosed()) {
      this.log.info({ side }, "Session ended; closing relay");
    }
    void this.close();
  }

  private async shutdown(): Promise<void> {
    const previous = this.state;
    this.transition("Closed");
    const caller = this.server ?? this.transports?.caller;
    const backend = this.backend ?? this.transports?.backend;
    const results = await Promise.allSettled([caller?.close(), backend?.close()]);
    for (const result of results) {
      if (result.status === "rejected") {
        this.log.warn({ err: result.reason }, "Error while closing session");
      }
    }
    this.log.info({ previousState: previous }, "Relay closed");
    this.resolveClosed();
  }

  /**
   * Request handlers by operation kind. Only tools/list and tools/call go through the
   * gate; resources and prompts are passed through unfiltered.
   */
  private registerHandlers(
    server: Server,
    backend: Client,
    capabilities: ServerCapabilities,
  ): void {
    if (capabilities.tools) {
      server.setRequestHandler(ListToolsRequestSchema, async () => {
        const { tools } = await this.refreshCatalog(backend);
        return { tools };
      });
      server.setRequestHandler(CallToolRequestSchema, async (request) =>
        this.callTool(backend, request.params),
      );
    }

    if (capabilities.resources) {
      server.setRequestHandler(ListResourcesRequestSchema, async (request) => {
        const result = await backend.listResources(request.params);
        this.log.info(
          { count: result.resources.length },
          "Forwarding resources (not filtered)",
        );
        return result;
      });
      server.setRequestHandler(
        ListResourceTemplatesRequestSchema,
        async (request) => backend.listResourceTemplates(request.params),
      );
      server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
        this.log.info(
          { uri: request.params.uri },
          "Forwarding read_resource (not filtered)",
        );
        return backend.readResource(request.params);
      });
    }

    if (capabilities.prompts) {
      server.setRequestHandler(ListPromptsRequestSchema, async (request) => {
        const result = await backend.listPrompts(request.params);
        this.log.info(
          { count: result.prompts.length },
          "Forwarding prompts (not filtered)",
        );
        return result;
      });
      server.setRequestHandler(GetPromptRequestSchema, async (request) => {
        this.log.info(
          { prompt: request.params.name },
          "Forwarding get_prompt (not filtered)",
        );
        return backend.getPrompt(request.params);
      });
    }
  }

  /** Pass backend list_changed notifications on to the caller. */
  private relayListChanged(
    backend: Client,
    server: Server,
    capabilities: ServerCapabilities,
  ): void {
    if (capabilities.tools?.listChanged) {
      backend.setNotificationHandler(ToolListChangedNotificationSchema, async () => {
        this.log.debug("Backend tool list changed");
        await server.sendToolListChanged();
      });
    }
    if (capabilities.resources?.listChanged) {
      backend.setNotificationHandler(
        ResourceListChangedNotificationSchema,
        async () => server.sendResourceListChanged(),
      );
    }
    if (capabilities.prompts?.listChanged) {
      backend.setNotificationHandler(
        PromptListChangedNotificationSchema,
        async () => server.sendPromptListChanged(),
      );
    }
  }

  /** Full backend catalog, following pagination cursors. */
  private async fetchBackendCatalog(backend: Client): Promise<Tool[]> {
    const tools: Tool[] = [];
    const seen = new Set<string>();
    let cursor: string | undefined;
    do {
      const page = await backend.listTools(cursor ? { cursor } : undefined);
      tools.push(...page.tools);
      cursor = page.nextCursor;
      if (cursor !== undefined && seen.has(cursor)) {
        this.log.warn({ cursor }, "Backend repeated a tools/list cursor");
        break;
      }
      if (cursor !== undefined) seen.add(cursor);
    } while (cursor !== undefined);
    return tools;
  }

  /** Fetch, classify and filter the catalog, then replace the cache in one step. */
  private async refreshCatalog(
    backend: Client,
  ): Promise<{ tools: Tool[]; snapshot: CatalogSnapshot }> {
    const catalog = await this.fetchBackendCatalog(backend);
    const result = buildAllowedTools(
      catalog,
      this.policy,
      this.classifier,
      this.log,
    );
    const snapshot = this.cache.replace(result);
    this.log.debug(
      { generation: snapshot.generation, allowed: [...snapshot.allowedNames] },
      "Allowed tool names refreshed",
    );
    return { tools: result.tools, snapshot };
  }

  private async ensureCatalog(backend: Client): Promise<CatalogSnapshot> {
    const current = this.cache.snapshot();
    if (current) return current;
    if (!this.lazyListing) {
      this.log.debug("Tool call before any listing; listing backend tools");
      this.lazyListing = this.refreshCatalog(backend)
        .then(({ snapshot }) => snapshot)
        .finally(() => {
          this.lazyListing = null;
        });
    }
    return this.lazyListing;
  }

  private async callTool(
    backend: Client,
    params: CallToolRequest["params"],
  ): Promise<CallToolResult> {
    const snapshot = await this.ensureCatalog(backend);
    const { name } = params;
    if (!isAllowed(name, snapshot.allowedNames)) {
      const effects = snapshot.effects.get(name);
      this.log.warn(
        { toolName: name, effects, generation: snapshot.generation },
        "Blocked tool call",
      );
      return buildBlockedResult(name, {
        effects,
        effectiveAllowed: snapshot.effectiveAllowed,
      });
    }
    this.log.debug({ toolName: name }, "Forwarding tool call");
    return backend.request({ method: "tools/call", params }, CallToolResultSchema);
  }
}
