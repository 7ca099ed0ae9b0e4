/**
 * Quote Calculator Unit Tests
 */

import { describe, expect, test } from "vitest";

import { toDecimal } from "../src/decimal";
import { createEmptyMarketState } from "../src/market-state";
import {
  calculateFundingSkewBps,
  calculateInventorySkewBps,
  calculateLevelPrices,
  calculateTotalSkewBps,
  generateQuotes,
  QUOTE_STRATEGIES,
} from "../src/quote-calculator";
import type { QuoteInput } from "../src/types";
import { createDefaultConfig, createDefaultVenue, createMarketState } from "./fixtures";

const createInput = (overrides: Partial<QuoteInput> = {}): QuoteInput => ({
  nowMs: 1500,
  state: createMarketState(),
  config: createDefaultConfig(),
  venue: createDefaultVenue(),
  generation: 7,
  ...overrides,
});

describe("calculateInventorySkewBps", () => {
  test("should scale linearly with inventory", () => {
    expect(calculateInventorySkewBps("0.5", createDefaultConfig()).toString()).toBe("10");
    expect(calculateInventorySkewBps("-0.25", createDefaultConfig()).toString()).toBe("-5");
  });

  test("should clamp to max skew", () => {
    expect(calculateInventorySkewBps("2", createDefaultConfig()).toString()).toBe("20");
    expect(calculateInventorySkewBps("-3", createDefaultConfig()).toString()).toBe("-20");
  });

  test("should return 0 when max inventory is 0", () => {
    expect(calculateInventorySkewBps("1", createDefaultConfig({ maxInventory: "0" })).toString()).toBe("0");
  });
});

describe("calculateFundingSkewBps", () => {
  test("should multiply rate by coefficient", () => {
    expect(calculateFundingSkewBps("0.001", createDefaultConfig()).toString()).toBe("10");
    expect(calculateFundingSkewBps("-0.0005", createDefaultConfig()).toString()).toBe("-5");
  });

  test("should ignore rates below the threshold", () => {
    const config = createDefaultConfig({ fundingThreshold: "0.0005" });
    expect(calculateFundingSkewBps("0.0001", config).toString()).toBe("0");
    expect(calculateFundingSkewBps("0.001", config).toString()).toBe("10");
  });

  test("should clamp to max skew", () => {
    expect(calculateFundingSkewBps("0.01", createDefaultConfig()).toString()).toBe("20");
  });
});

describe("calculateTotalSkewBps", () => {
  test("should clamp the sum of components", () => {
    const state = createMarketState({ inventory: "1", fundingRate: "0.001" });
    expect(calculateTotalSkewBps(state, createDefaultConfig()).toString()).toBe("20");
  });

  test("should let opposite components cancel", () => {
    const state = createMarketState({ inventory: "0.5", fundingRate: "-0.001" });
    expect(calculateTotalSkewBps(state, createDefaultConfig()).toString()).toBe("0");
  });
});

describe("calculateLevelPrices", () => {
  test("should place level 0 at half the base spread with zero skew", () => {
    const result = calculateLevelPrices("50000", toDecimal("0"), 0, createDefaultConfig(), createDefaultVenue());

    expect(result).toEqual({ bidPx: "49975.0", askPx: "50025.0" });
  });

  test("should widen deeper levels by the level step", () => {
    const result = calculateLevelPrices("50000", toDecimal("0"), 1, createDefaultConfig(), createDefaultVenue());

    expect(result).toEqual({ bidPx: "49950.0", askPx: "50050.0" });
  });

  test("should floor an offset at zero instead of crossing mid", () => {
    // ask offset = 5 - 10 = -5 → 0
    const result = calculateLevelPrices("50000", toDecimal("10"), 0, createDefaultConfig(), createDefaultVenue());

    expect(result).toEqual({ bidPx: "49925.0", askPx: "50000.0" });
  });

  test("should round half-up to the tick grid", () => {
    // bid = 99.999975 → 100.0, ask = 100.100025 → 100.1
    const result = calculateLevelPrices("100.05", toDecimal("0"), 0, createDefaultConfig(), createDefaultVenue());

    expect(result).toEqual({ bidPx: "100.0", askPx: "100.1" });
  });

  test("should pull a rounded bid back below mid", () => {
    // 100.06 rounds up to 100.1 > mid → floor to 100.0
    const config = createDefaultConfig({ baseSpreadBps: "0" });
    const result = calculateLevelPrices("100.06", toDecimal("0"), 0, config, createDefaultVenue());

    expect(result).toEqual({ bidPx: "100.0", askPx: "100.1" });
  });

  test("should pull a rounded ask back above mid", () => {
    // 100.04 rounds down to 100.0 < mid → ceil to 100.1
    const config = createDefaultConfig({ baseSpreadBps: "0" });
    const result = calculateLevelPrices("100.04", toDecimal("0"), 0, config, createDefaultVenue());

    expect(result).toEqual({ bidPx: "100.0", askPx: "100.1" });
  });

  test("should step the bid down one tick when both land on mid", () => {
    const config = createDefaultConfig({ baseSpreadBps: "0" });
    const result = calculateLevelPrices("100", toDecimal("0"), 0, config, createDefaultVenue());

    expect(result).toEqual({ bidPx: "99.9", askPx: "100.0" });
  });
});

describe("generateQuotes", () => {
  test("should quote symmetrically at half the base spread when flat with zero funding", () => {
    const quotes = generateQuotes(createInput());

    expect(quotes).toEqual([
      { side: "buy", level: 0, price: "49975.0", size: "0.100", generation: 7 },
      { side: "sell", level: 0, price: "50025.0", size: "0.100", generation: 7 },
    ]);
  });

  test("should emit each level bid then ask in ascending order", () => {
    const quotes = generateQuotes(createInput({ config: createDefaultConfig({ levels: 2 }) }));

    expect(quotes.map(q => `${q.side}:${String(q.level)}:${q.price}`)).toEqual([
      "buy:0:49975.0",
      "sell:0:50025.0",
      "buy:1:49950.0",
      "sell:1:50050.0",
    ]);
  });

  test("should shift both quotes down when long", () => {
    const quotes = generateQuotes(createInput({ state: createMarketState({ inventory: "0.5" }) }));

    expect(quotes.map(q => q.price)).toEqual(["49925.0", "50000.0"]);
  });

  test("should shift both quotes up when funding is negative", () => {
    // funding skew = -0.0005 * 10000 = -5 bps
    const quotes = generateQuotes(createInput({ state: createMarketState({ fundingRate: "-0.0005" }) }));

    expect(quotes.map(q => q.price)).toEqual(["50000.0", "50050.0"]);
  });

  test("should truncate size to lot", () => {
    const quotes = generateQuotes(createInput({ config: createDefaultConfig({ orderSize: "0.1234" }) }));

    expect(quotes.map(q => q.size)).toEqual(["0.123", "0.123"]);
  });

  test("should omit quotes whose size truncates to zero", () => {
    const quotes = generateQuotes(createInput({ config: createDefaultConfig({ orderSize: "0.0004" }) }));

    expect(quotes).toEqual([]);
  });

  test("should return no quotes without a book", () => {
    expect(generateQuotes(createInput({ state: createEmptyMarketState("BTC-PERP") }))).toEqual([]);
  });

  test("should return no quotes when market data is stale", () => {
    expect(generateQuotes(createInput({ nowMs: 3001 }))).toEqual([]);
    expect(generateQuotes(createInput({ nowMs: 3000 }))).toHaveLength(2);
  });

  test("should freeze emitted quotes", () => {
    const [first] = generateQuotes(createInput());

    expect(Object.isFrozen(first)).toBe(true);
  });

  test("should keep bid <= mid <= ask on every level across books and inventories", () => {
    const books: Array<[string, string]> = [
      ["100.0", "100.1"],
      ["99.9", "100.2"],
      ["50000", "50000"],
      ["1.2", "1.3"],
      ["2500.3", "2500.9"],
    ];
    const inventories = ["-5", "-0.9", "0", "0.33", "1", "10"];
    const fundingRates = ["-0.01", "0", "0.0007"];

    for (const [bid, ask] of books) {
      for (const inventory of inventories) {
        for (const fundingRate of fundingRates) {
          const state = createMarketState({ bid, ask, inventory, fundingRate });
          const quotes = generateQuotes(
            createInput({ state, config: createDefaultConfig({ levels: 3, baseSpreadBps: "2" }) }),
          );
          const mid = toDecimal(state.midPx);

          for (let level = 0; level < 3; level++) {
            const bidQuote = quotes.find(q => q.side === "buy" && q.level === level);
            const askQuote = quotes.find(q => q.side === "sell" && q.level === level);
            expect(askQuote).toBeDefined();
            if (bidQuote && askQuote) {
              expect(toDecimal(bidQuote.price).lte(mid)).toBe(true);
              expect(toDecimal(askQuote.price).gte(mid)).toBe(true);
              expect(toDecimal(bidQuote.price).lt(toDecimal(askQuote.price))).toBe(true);
            }
          }
        }
      }
    }
  });
});

describe("QUOTE_STRATEGIES", () => {
  test("skewed ladder applies inventory skew", () => {
    const input = createInput({ state: createMarketState({ inventory: "0.5" }) });

    expect(QUOTE_STRATEGIES["skewed-ladder"].computeQuotes(input).map(q => q.price)).toEqual(["49925.0", "50000.0"]);
  });

  test("symmetric ladder ignores inventory and funding", () => {
    const input = createInput({ state: createMarketState({ inventory: "0.5", fundingRate: "0.001" }) });

    expect(QUOTE_STRATEGIES["symmetric-ladder"].computeQuotes(input).map(q => q.price)).toEqual([
      "49975.0",
      "50025.0",
    ]);
  });
});
