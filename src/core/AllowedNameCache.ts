import type { EffectsByName } from "../interfaces/EffectClassifierInterface.js";
import type { EffectLabel } from "../interfaces/EffectTypes.js";

/** One listing's outcome, as seen by call gating. Immutable once published. */
export interface CatalogSnapshot {
  /** Increases by one on every replace; 1 for the first listing. */
  readonly generation: number;
  readonly refreshedAt: string;
  readonly allowedNames: ReadonlySet<string>;
  readonly effects: EffectsByName;
  readonly effectiveAllowed: ReadonlySet<EffectLabel>;
}

/**
 * Names the relay currently lets through, owned by a single relay instance.
 *
 * Writers build a complete snapshot and publish it with one assignment, so a reader
 * never sees half of a refresh. The latest completed listing wins; nothing is merged.
 */
export class AllowedNameCache {
  private current: CatalogSnapshot | null = null;
  private generationCounter = 0;

  /** Latest snapshot, or null when no listing has completed yet. */
  snapshot(): CatalogSnapshot | null {
    return this.current;
  }

  get generation(): number {
    return this.generationCounter;
  }

  replace(result: {
    allowedNames: ReadonlySet<string>;
    effects: EffectsByName;
    effectiveAllowed: ReadonlySet<EffectLabel>;
  }): CatalogSnapshot {
    this.generationCounter += 1;
    const next: CatalogSnapshot = Object.freeze({
      generation: this.generationCounter,
      refreshedAt: new Date().toISOString(),
      allowedNames: new Set(result.allowedNames),
      effects: new Map(result.effects),
      effectiveAllowed: new Set(result.effectiveAllowed),
    });
    this.current = next;
    return next;
  }

  has(name: string): boolean {
    return this.current?.allowedNames.has(name) ?? false;
  }
}
