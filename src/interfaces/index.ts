export { EFFECT_LABELS, isEffectLabel } from "./EffectTypes.js";
export type { EffectLabel } from "./EffectTypes.js";
export type {
  EffectClassifierInterface,
  EffectsByName,
  ToolDefinition,
  ToolOverrides,
} from "./EffectClassifierInterface.js";
