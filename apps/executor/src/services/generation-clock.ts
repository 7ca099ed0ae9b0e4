/**
 * Generation Clock - Issues control-loop generations for one session
 *
 * A new generation is minted only when the approved target set changes:
 * different side:level keys, sizes or reduce-only flags, or any price moving
 * beyond tolerance of the targets the current generation was minted with.
 */

import type { PriceStr, QuoteSpec } from "@perp-mm/core";
import { diffBps, toDecimal } from "@perp-mm/core";

export function quoteKey(quote: Pick<QuoteSpec, "side" | "level">): string {
  return `${quote.side}:${String(quote.level)}`;
}

export class GenerationClock {
  private generation = 0;
  private baseline: ReadonlyMap<string, QuoteSpec> = new Map();

  current(): number {
    return this.generation;
  }

  /**
   * Return the generation the targets belong to, minting a new one when they changed
   */
  advance(targets: readonly QuoteSpec[], midPx: PriceStr | undefined, toleranceBps: string): number {
    if (this.generation === 0 || this.changed(targets, midPx, toleranceBps)) {
      this.generation++;
      this.baseline = new Map(targets.map(q => [quoteKey(q), q]));
    }
    return this.generation;
  }

  /**
   * Targets re-stamped with the current generation
   */
  stamp(targets: readonly QuoteSpec[]): QuoteSpec[] {
    return targets.map(q => (q.generation === this.generation ? q : Object.freeze({ ...q, generation: this.generation })));
  }

  private changed(targets: readonly QuoteSpec[], midPx: PriceStr | undefined, toleranceBps: string): boolean {
    if (targets.length !== this.baseline.size) return true;

    const tolerance = toDecimal(toleranceBps);
    for (const target of targets) {
      const previous = this.baseline.get(quoteKey(target));
      if (!previous) return true;
      if (previous.size !== target.size) return true;
      if ((previous.reduceOnly ?? false) !== (target.reduceOnly ?? false)) return true;
      if (previous.price === target.price) continue;
      if (midPx === undefined) return true;
      if (diffBps(previous.price, target.price, midPx).gt(tolerance)) return true;
    }
    return false;
  }
}
