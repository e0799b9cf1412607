import type {
  EffectClassifierInterface,
  EffectsByName,
  ToolDefinition,
  ToolOverrides,
} from "../../interfaces/EffectClassifierInterface.js";

/**
 * Answers from a fixed table instead of inferring. Tools missing from the table get no
 * effects. Overrides still win, so it conforms to the same contract as real
 * classifiers; used as a test double and for catalogs whose effects are known upfront.
 */
export class FixedEffectClassifier implements EffectClassifierInterface {
  readonly name = "fixed";

  private readonly table: ReadonlyMap<string, readonly string[]>;

  constructor(table: Record<string, readonly string[]>) {
    this.table = new Map(Object.entries(table));
  }

  classify(
    tools: readonly ToolDefinition[],
    overrides?: ToolOverrides,
  ): EffectsByName {
    const result = new Map<string, readonly string[]>();
    for (const tool of tools) {
      const effects =
        overrides?.get(tool.name) ?? this.table.get(tool.name) ?? [];
      result.set(tool.name, [...effects]);
    }
    return result;
  }
}
