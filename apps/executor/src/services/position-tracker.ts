/**
 * Position Tracker - In-memory position and PnL of one market
 *
 * - Signed inventory and average entry price
 * - Realized PnL net of fees
 * - Mark-to-mid equity for the drawdown check
 */

import type { Ms, PriceStr, Side, SizeStr } from "@perp-mm/core";
import { Decimal, toDecimal, ZERO } from "@perp-mm/core";

export interface PositionFill {
  side: Side;
  size: SizeStr;
  price: PriceStr;
  fee?: string;
  tsMs: Ms;
}

export interface FillApplication {
  inventoryAfter: SizeStr;
  /** Closing PnL of this fill minus its fee */
  realizedPnlDelta: string;
  realizedPnl: string;
  /** The fill reduced an existing position */
  reducing: boolean;
}

export interface PositionSummary {
  inventory: SizeStr;
  averageEntryPx: PriceStr;
  realizedPnl: string;
  fees: string;
  lastLossAtMs?: Ms;
}

export class PositionTracker {
  private inventory: Decimal = ZERO;
  private averageEntry: Decimal = ZERO;
  private realizedPnl: Decimal = ZERO;
  private fees: Decimal = ZERO;
  private lastLossAtMs?: Ms;

  /**
   * Apply one fill
   */
  applyFill(fill: PositionFill): FillApplication {
    const size = toDecimal(fill.size);
    const price = toDecimal(fill.price);
    const fee = toDecimal(fill.fee);
    const signed = fill.side === "buy" ? size : size.neg();

    let closingPnl = ZERO;
    const reducing = !this.inventory.isZero() && this.inventory.isPositive() !== signed.isPositive();

    if (!reducing) {
      const absInventory = this.inventory.abs();
      const total = absInventory.plus(size);
      this.averageEntry = total.isZero() ? ZERO : this.averageEntry.mul(absInventory).plus(price.mul(size)).div(total);
    } else {
      const closed = Decimal.min(this.inventory.abs(), size);
      const direction = this.inventory.isPositive() ? 1 : -1;
      closingPnl = price.minus(this.averageEntry).mul(closed).mul(direction);

      // Flipped through zero: the remainder opens at the fill price
      if (size.gt(closed)) this.averageEntry = price;
    }

    this.inventory = this.inventory.plus(signed);
    if (this.inventory.isZero()) this.averageEntry = ZERO;

    const delta = closingPnl.minus(fee);
    this.realizedPnl = this.realizedPnl.plus(delta);
    this.fees = this.fees.plus(fee);
    if (reducing && delta.isNegative()) this.lastLossAtMs = fill.tsMs;

    return {
      inventoryAfter: this.inventory.toFixed(),
      realizedPnlDelta: delta.toFixed(),
      realizedPnl: this.realizedPnl.toFixed(),
      reducing,
    };
  }

  getInventory(): SizeStr {
    return this.inventory.toFixed();
  }

  getLastLossAtMs(): Ms | undefined {
    return this.lastLossAtMs;
  }

  /**
   * Starting equity + realized PnL + unrealized PnL at mid
   */
  equity(startingEquity: string, midPx: PriceStr | undefined): string {
    const unrealized =
      midPx === undefined || this.inventory.isZero() ?
        ZERO
      : toDecimal(midPx).minus(this.averageEntry).mul(this.inventory);
    return toDecimal(startingEquity).plus(this.realizedPnl).plus(unrealized).toFixed();
  }

  summary(): PositionSummary {
    return {
      inventory: this.inventory.toFixed(),
      averageEntryPx: this.averageEntry.toFixed(),
      realizedPnl: this.realizedPnl.toFixed(),
      fees: this.fees.toFixed(),
      lastLossAtMs: this.lastLossAtMs,
    };
  }
}
