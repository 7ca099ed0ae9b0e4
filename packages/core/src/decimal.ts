/**
 * Fixed-point helpers
 *
 * All price/size arithmetic in the core goes through decimal.js.
 * This module is pure (no I/O, no throw for well-formed decimal strings).
 */

import Decimal from "decimal.js";

import type { PriceStr, SizeStr } from "./types";

export { Decimal };

export const BPS_DENOMINATOR = new Decimal(10_000);

export const ZERO = new Decimal(0);

/**
 * Parse a decimal string, falling back when the input is not a finite number
 */
export function toDecimal(value: string | number | undefined, fallback = "0"): Decimal {
  if (value === undefined) return new Decimal(fallback);
  try {
    const d = new Decimal(value);
    return d.isFinite() ? d : new Decimal(fallback);
  } catch {
    return new Decimal(fallback);
  }
}

/**
 * Clamp to [-bound, bound]
 */
export function clampAbs(value: Decimal, bound: Decimal): Decimal {
  const b = bound.abs();
  return Decimal.max(b.neg(), Decimal.min(b, value));
}

/**
 * Format with exactly the increment's decimal places
 */
export function formatToIncrement(value: Decimal, increment: Decimal): string {
  return value.toFixed(increment.decimalPlaces());
}

/**
 * Round to the nearest multiple of tick, halves away from zero
 */
export function roundToTick(price: Decimal, tickSize: PriceStr): Decimal {
  const tick = toDecimal(tickSize);
  if (tick.lte(0)) return price;
  return price.div(tick).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).mul(tick);
}

/**
 * Round down to a multiple of tick
 */
export function floorToTick(price: Decimal, tickSize: PriceStr): Decimal {
  const tick = toDecimal(tickSize);
  if (tick.lte(0)) return price;
  return price.div(tick).floor().mul(tick);
}

/**
 * Round up to a multiple of tick
 */
export function ceilToTick(price: Decimal, tickSize: PriceStr): Decimal {
  const tick = toDecimal(tickSize);
  if (tick.lte(0)) return price;
  return price.div(tick).ceil().mul(tick);
}

/**
 * Truncate a size toward zero to a multiple of lot. Never rounds up.
 */
export function truncateToLot(size: Decimal, lotSize: SizeStr): Decimal {
  const lot = toDecimal(lotSize);
  if (lot.lte(0)) return size;
  return size.div(lot).toDecimalPlaces(0, Decimal.ROUND_DOWN).mul(lot);
}

/**
 * Format a price on the venue's tick grid
 */
export function formatPrice(price: Decimal, tickSize: PriceStr): PriceStr {
  return formatToIncrement(price, toDecimal(tickSize));
}

/**
 * Format a size on the venue's lot grid
 */
export function formatSize(size: Decimal, lotSize: SizeStr): SizeStr {
  return formatToIncrement(size, toDecimal(lotSize));
}

/**
 * Absolute difference of two prices in bps of a reference
 */
export function diffBps(a: PriceStr, b: PriceStr, reference: PriceStr): Decimal {
  const ref = toDecimal(reference);
  if (ref.isZero()) return new Decimal(Infinity);
  return toDecimal(a).minus(toDecimal(b)).abs().div(ref).mul(BPS_DENOMINATOR);
}
