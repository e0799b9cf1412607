import type { EffectLabel } from "./EffectTypes.js";

/**
 * Tool definition as seen by a classifier: the fields of an MCP tool that carry
 * evidence about what it does.
 */
export interface ToolDefinition {
  name: string;
  description?: string;
  inputSchema?: unknown;
}

/** Per-tool effect assignments that replace inference for the named tools. */
export type ToolOverrides = ReadonlyMap<string, readonly EffectLabel[]>;

/**
 * Result of a classification run, keyed by tool name. Labels are plain strings: a
 * defective classifier can emit labels outside the vocabulary, and the gate has to be
 * able to see (and reject) them.
 */
export type EffectsByName = ReadonlyMap<string, readonly string[]>;

/**
 * Maps tool definitions to effect labels.
 * Implementations must return an entry for every tool, must give overridden tools their
 * override list verbatim, and must be deterministic for identical input.
 */
export interface EffectClassifierInterface {
  readonly name: string;

  classify(
    tools: readonly ToolDefinition[],
    overrides?: ToolOverrides,
  ): EffectsByName;
}
