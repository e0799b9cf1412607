import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { ServerPolicy } from "../config/types.js";
import type { EffectClassifierInterface } from "../interfaces/EffectClassifierInterface.js";
import type { Logger } from "../logger.js";

/**
 * Relay lifecycle. Closed is terminal and reachable from every state; the other
 * transitions only go forward.
 */
export type RelayState =
  | "Disconnected"
  | "ConnectingBackend"
  | "BackendReady"
  | "Serving"
  | "Closed";

export interface RelayTransports {
  /** Session to the wrapped backend MCP server (the relay is its client). */
  backend: Transport;
  /** Session to the caller (the relay is its server). */
  caller: Transport;
}

export interface SessionRelayConfig {
  /** Policy snapshot; never reloaded during the relay's lifetime. */
  policy: ServerPolicy;
  /** Effect classifier. Default: KeywordEffectClassifier. */
  classifier?: EffectClassifierInterface;
  /**
   * Transports to use instead of launching the backend over stdio and serving the
   * caller on this process's stdio. Tests pass in-memory pairs here.
   */
  transports?: RelayTransports;
  /** Name and version the relay reports to both peers. */
  relayInfo?: { name: string; version: string };
  /** Parent logger; the relay binds server name and session id onto it. */
  logger?: Logger;
}

/**
 * Action names for result._meta["effect-gate"].action. A blocked call is returned as a
 * tool result with isError set, not as a JSON-RPC error, so the caller's session and
 * the model driving it both see a readable reason.
 */
export const GateAction = {
  TOOL_BLOCKED: "TOOL_BLOCKED",
} as const;

export type GateActionName = (typeof GateAction)[keyof typeof GateAction];

/** Metadata attached to a blocked tool result under `_meta["effect-gate"]`. */
export interface BlockedCallMeta {
  action: GateActionName;
  tool: string;
  /** Labels the classifier assigned at the last listing; absent for unknown tools. */
  effects?: string[];
  /** Labels outside the effective allowed set. */
  disallowedEffects?: string[];
  allowedEffects: string[];
  timestamp: string;
}

export const BLOCKED_META_KEY = "effect-gate";
