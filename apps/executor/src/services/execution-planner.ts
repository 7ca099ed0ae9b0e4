/**
 * Execution Planner - Converts approved targets to execution actions
 *
 * Diff keyed by side:level:
 * - place when a target has no order
 * - cancel orders of a superseded generation, orders whose level has no target
 *   and duplicates on the same key
 * - replace (or amend, when the venue amends atomically) orders whose price
 *   deviates beyond tolerance of mid or whose size differs
 * - always replace orders whose reduce-only flag differs; amends carry price and size only
 *
 * Orders already being cancelled are ignored; they are on their way out.
 */

import type { PriceStr, QuoteSpec, TrackedOrder } from "@perp-mm/core";
import { diffBps, isOpen, isWorking, toDecimal } from "@perp-mm/core";

import { quoteKey } from "./generation-clock";

export type CancelReason =
  | "superseded"
  | "no_target"
  | "duplicate"
  | "price_deviation"
  | "size_change"
  | "reduce_only_change";

/**
 * Execution action types
 */
export type ExecutionAction =
  | { type: "place"; quote: QuoteSpec }
  | { type: "cancel"; clientOrderId: string; reason: CancelReason }
  | { type: "amend"; clientOrderId: string; quote: QuoteSpec };

export interface PlanInput {
  targets: readonly QuoteSpec[];
  orders: readonly TrackedOrder[];
  generation: number;
  midPx: PriceStr | undefined;
  toleranceBps: string;
  supportsAmend: boolean;
}

/**
 * Whether a resting price is still acceptable for a target
 */
export function withinTolerance(
  orderPx: PriceStr,
  targetPx: PriceStr,
  midPx: PriceStr | undefined,
  toleranceBps: string,
): boolean {
  if (orderPx === targetPx) return true;
  if (midPx === undefined) return false;
  return diffBps(orderPx, targetPx, midPx).lte(toDecimal(toleranceBps));
}

/**
 * Plan the actions that move the live order set toward the targets
 */
export function planReconciliation(input: PlanInput): ExecutionAction[] {
  const { targets, orders, generation, midPx, toleranceBps, supportsAmend } = input;

  const targetsByKey = new Map(targets.map(q => [quoteKey(q), q]));
  const covered = new Set<string>();
  const cancels: ExecutionAction[] = [];
  const replacements: ExecutionAction[] = [];

  const candidates = orders.filter(o => isOpen(o.status) && !o.cancelRequested);

  for (const order of candidates) {
    const key = quoteKey(order);
    const target = targetsByKey.get(key);

    const cancelOrReplace = (reason: CancelReason): void => {
      const amendable =
        target !== undefined &&
        order.reduceOnly === (target.reduceOnly ?? false) &&
        supportsAmend &&
        isWorking(order.status) &&
        order.exchangeOrderId !== undefined;
      if (target && amendable && !covered.has(key)) {
        covered.add(key);
        replacements.push({ type: "amend", clientOrderId: order.clientOrderId, quote: target });
        return;
      }
      cancels.push({ type: "cancel", clientOrderId: order.clientOrderId, reason });
    };

    if (order.generation < generation) {
      cancelOrReplace("superseded");
      continue;
    }
    if (!target) {
      cancels.push({ type: "cancel", clientOrderId: order.clientOrderId, reason: "no_target" });
      continue;
    }
    if (covered.has(key)) {
      cancels.push({ type: "cancel", clientOrderId: order.clientOrderId, reason: "duplicate" });
      continue;
    }
    if (order.reduceOnly !== (target.reduceOnly ?? false)) {
      cancelOrReplace("reduce_only_change");
      continue;
    }
    if (order.size !== target.size) {
      cancelOrReplace("size_change");
      continue;
    }
    if (!withinTolerance(order.price, target.price, midPx, toleranceBps)) {
      cancelOrReplace("price_deviation");
      continue;
    }

    covered.add(key);
  }

  const places: ExecutionAction[] = targets
    .filter(q => !covered.has(quoteKey(q)))
    .map((quote): ExecutionAction => ({ type: "place", quote }));

  // Cancels first so exposure shrinks before it grows
  return [...cancels, ...replacements, ...places];
}
