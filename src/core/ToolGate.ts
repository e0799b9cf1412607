import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { ServerPolicy } from "../config/types.js";
import { computeEffectiveAllowed } from "../config/PolicyLoader.js";
import type {
  EffectClassifierInterface,
  EffectsByName,
  ToolDefinition,
} from "../interfaces/EffectClassifierInterface.js";
import { isEffectLabel, type EffectLabel } from "../interfaces/EffectTypes.js";
import {
  BLOCKED_META_KEY,
  GateAction,
  type BlockedCallMeta,
} from "./types.js";
import { logger, type Logger } from "../logger.js";

export interface ToolGateResult<T extends ToolDefinition> {
  /** Retained tools, the same objects as in the catalog, in catalog order. */
  tools: T[];
  allowedNames: ReadonlySet<string>;
  /** Effect labels per catalog tool, as assigned by the classifier. */
  effects: EffectsByName;
  effectiveAllowed: ReadonlySet<EffectLabel>;
}

/**
 * Labels that keep a tool out of the catalog. A label outside the vocabulary is never in
 * an allowed set, so a classifier defect blocks the tool.
 */
export function disallowedEffects(
  effects: readonly string[],
  effectiveAllowed: ReadonlySet<EffectLabel>,
): string[] {
  return effects.filter(
    (label) => !(isEffectLabel(label) && effectiveAllowed.has(label)),
  );
}

/**
 * Classify the backend catalog and keep the tools whose effects all fall within the
 * policy's effective allowed set. Tools with no effects are always kept; tools the
 * classifier returned nothing for are dropped.
 */
export function buildAllowedTools<T extends ToolDefinition>(
  catalog: readonly T[],
  policy: ServerPolicy,
  classifier: EffectClassifierInterface,
  log: Logger = logger,
): ToolGateResult<T> {
  const effectiveAllowed = computeEffectiveAllowed(policy);
  log.debug(
    { allowedEffects: [...effectiveAllowed] },
    "Effective allowed effects",
  );

  const classified = classifier.classify(catalog, policy.toolOverrides);
  const effects = new Map<string, readonly string[]>();
  const tools: T[] = [];
  const allowedNames = new Set<string>();

  for (const tool of catalog) {
    const assigned = classified.get(tool.name);
    if (assigned === undefined) {
      log.warn(
        { toolName: tool.name, classifier: classifier.name },
        "Classifier returned no effects for tool; excluding it",
      );
      continue;
    }
    effects.set(tool.name, [...assigned]);
    log.debug({ toolName: tool.name, effects: assigned }, "Tool effects");

    if (disallowedEffects(assigned, effectiveAllowed).length === 0) {
      tools.push(tool);
      allowedNames.add(tool.name);
    }
  }

  log.info(
    {
      total: catalog.length,
      retained: tools.length,
      allowedEffects: [...effectiveAllowed],
    },
    `Filtered ${catalog.length} → ${tools.length} tools`,
  );

  return { tools, allowedNames, effects, effectiveAllowed };
}

export function isAllowed(
  name: string,
  allowedNames: ReadonlySet<string>,
): boolean {
  return allowedNames.has(name);
}

/**
 * Tool result returned in place of a blocked call. Marked isError so the caller sees a
 * failed call, with a reason the model can act on.
 */
export function buildBlockedResult(
  toolName: string,
  context: {
    effects?: readonly string[];
    effectiveAllowed: ReadonlySet<EffectLabel>;
  },
): CallToolResult {
  const allowedEffects = [...context.effectiveAllowed];
  const disallowed = context.effects
    ? disallowedEffects(context.effects, context.effectiveAllowed)
    : undefined;
  const reason =
    disallowed && disallowed.length > 0
      ? `its effects ${disallowed.join(", ")} are not allowed (allowed: ${allowedEffects.join(", ") || "none"})`
      : "it is not in the allowed tool catalog";

  const meta: BlockedCallMeta = {
    action: GateAction.TOOL_BLOCKED,
    tool: toolName,
    ...(context.effects && { effects: [...context.effects] }),
    ...(disallowed && { disallowedEffects: disallowed }),
    allowedEffects,
    timestamp: new Date().toISOString(),
  };

  return {
    content: [
      {
        type: "text",
        text: `Tool '${toolName}' is blocked by firewall policy: ${reason}.`,
      },
    ],
    isError: true,
    _meta: { [BLOCKED_META_KEY]: meta },
  };
}
