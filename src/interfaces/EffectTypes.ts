/**
 * Closed vocabulary of effect labels. A label names a category of side effect a tool
 * may produce; policies allow or deny labels, never tool names.
 */
export const EFFECT_LABELS = [
  "FS",
  "IO",
  "NET",
  "PROC",
  "TIME",
  "RAND",
  "PURE",
] as const;

export type EffectLabel = (typeof EFFECT_LABELS)[number];

const LABEL_SET: ReadonlySet<string> = new Set(EFFECT_LABELS);

export function isEffectLabel(value: unknown): value is EffectLabel {
  return typeof value === "string" && LABEL_SET.has(value);
}
