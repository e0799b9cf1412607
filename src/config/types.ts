import type { EffectLabel } from "../interfaces/EffectTypes.js";

/**
 * Server entry as written in the policy file (`servers.<name>`).
 *
 * ```yaml
 * servers:
 *   filesystem:
 *     command: npx
 *     args: ["@modelcontextprotocol/server-filesystem", "/tmp"]
 *     allow: [FS, IO]
 *     deny: [NET]
 *     tool_overrides:
 *       special_tool: [FS, NET]
 * ```
 */
export interface ServerPolicyEntry {
  /** Command that launches the backend MCP server over stdio. */
  command: string;
  args?: string[];
  /** Merged over the SDK's default child environment; entries here win. */
  env?: Record<string, string>;
  /** Effects permitted. Empty or missing means every effect in the vocabulary. */
  allow?: string[];
  /** Effects refused. Always wins over allow. */
  deny?: string[];
  /** Tool name → effect labels, replacing inference for that tool. */
  tool_overrides?: Record<string, string[]>;
}

/** Policy file shape. */
export interface PolicyDocument {
  servers: Record<string, ServerPolicyEntry>;
}

/**
 * Validated policy for one backend server. Frozen once loaded; a relay keeps the same
 * snapshot for its whole lifetime.
 */
export interface ServerPolicy {
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
  readonly allow: ReadonlySet<EffectLabel>;
  readonly deny: ReadonlySet<EffectLabel>;
  readonly toolOverrides: ReadonlyMap<string, readonly EffectLabel[]>;
}

/** Input accepted by createServerPolicy; mirrors ServerPolicy with plain collections. */
export interface ServerPolicyInit {
  name: string;
  command: string;
  args?: readonly string[];
  env?: Record<string, string>;
  allow?: Iterable<EffectLabel>;
  deny?: Iterable<EffectLabel>;
  toolOverrides?: Record<string, readonly EffectLabel[]>;
}
