import { createRequire } from "node:module";
import { z } from "zod";
import type {
  EffectClassifierInterface,
  EffectsByName,
  ToolDefinition,
  ToolOverrides,
} from "../../interfaces/EffectClassifierInterface.js";
import {
  EFFECT_LABELS,
  isEffectLabel,
  type EffectLabel,
} from "../../interfaces/EffectTypes.js";

/** Effect label → words that indicate it. */
export type KeywordTable = Readonly<Record<string, readonly string[]>>;

const keywordTableSchema = z.record(z.string(), z.array(z.string()));

let defaultKeywords: KeywordTable | null = null;

/** Built-in keyword table, read once from effect-keywords.json beside this module. */
export function loadDefaultKeywords(): KeywordTable {
  if (!defaultKeywords) {
    const require = createRequire(import.meta.url);
    defaultKeywords = keywordTableSchema.parse(require("./effect-keywords.json"));
  }
  return defaultKeywords;
}

/**
 * Split identifiers and prose into lowercase words: `read_file`, `readFile`,
 * `HTTPGet` and "Read a file" all tokenize the way a reader would.
 */
export function tokenize(text: string): string[] {
  return text
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length > 0);
}

function schemaPropertyNames(inputSchema: unknown): string[] {
  if (typeof inputSchema !== "object" || inputSchema === null) return [];
  const properties: unknown = Reflect.get(inputSchema, "properties");
  if (typeof properties !== "object" || properties === null) return [];
  return Object.keys(properties);
}

/**
 * Infers effects from the words in a tool's name, description and input property
 * names. A tool with no matching word is classified as having no effects.
 */
export class KeywordEffectClassifier implements EffectClassifierInterface {
  readonly name = "keyword";

  private readonly labelsByWord = new Map<string, Set<EffectLabel>>();

  constructor(keywords: KeywordTable = loadDefaultKeywords()) {
    for (const [label, words] of Object.entries(keywords)) {
      if (!isEffectLabel(label)) {
        throw new Error(
          `Keyword table has unknown effect label "${label}". Valid effects: ${EFFECT_LABELS.join(", ")}`,
        );
      }
      for (const word of words) {
        const key = word.toLowerCase();
        const labels = this.labelsByWord.get(key) ?? new Set<EffectLabel>();
        labels.add(label);
        this.labelsByWord.set(key, labels);
      }
    }
  }

  classify(
    tools: readonly ToolDefinition[],
    overrides?: ToolOverrides,
  ): EffectsByName {
    const result = new Map<string, readonly string[]>();
    for (const tool of tools) {
      const override = overrides?.get(tool.name);
      result.set(tool.name, override ? [...override] : this.infer(tool));
    }
    return result;
  }

  private infer(tool: ToolDefinition): EffectLabel[] {
    const words = [
      ...tokenize(tool.name),
      ...tokenize(tool.description ?? ""),
      ...schemaPropertyNames(tool.inputSchema).flatMap(tokenize),
    ];
    const found = new Set<EffectLabel>();
    for (const word of words) {
      for (const label of this.labelsByWord.get(word) ?? []) found.add(label);
    }
    return EFFECT_LABELS.filter((l) => found.has(l));
  }
}
