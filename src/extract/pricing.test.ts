import { describe, expect, it } from "vitest";
import { PricingError } from "../errors";
import { computeCostUsd, costMultiplier, resolvePrice } from "./pricing";

describe("resolvePrice", () => {
  it("matches exact ids case-insensitively", () => {
    expect(resolvePrice("GPT-4o").id).toBe("gpt-4o");
  });

  it("strips a dated suffix", () => {
    expect(resolvePrice("gpt-5-2025-08-07").id).toBe("gpt-5");
    expect(resolvePrice("gpt-4.1-mini-2025-04-14").id).toBe("gpt-4.1-mini");
  });

  it("falls back to the longest family prefix", () => {
    expect(resolvePrice("gpt-5-mini-preview").id).toBe("gpt-5-mini");
    expect(resolvePrice("gpt-4o-audio-preview").id).toBe("gpt-4o");
  });

  it("throws for unknown families", () => {
    expect(() => resolvePrice("text-davinci-003")).toThrow(PricingError);
  });
});

describe("costMultiplier", () => {
  it("halves flex and batch, doubles priority and scale", () => {
    expect(costMultiplier("sync")).toBe(1);
    expect(costMultiplier("sync", "flex")).toBe(0.5);
    expect(costMultiplier("batch")).toBe(0.5);
    expect(costMultiplier("batch", "priority")).toBe(0.5);
    expect(costMultiplier("sync", "priority")).toBe(2);
    expect(costMultiplier("background", "scale")).toBe(2);
    expect(costMultiplier("sync", "default")).toBe(1);
  });
});

describe("computeCostUsd", () => {
  it("bills cached input at the cached rate", () => {
    const cost = computeCostUsd("gpt-5", { input: 1_000_000, cachedInput: 200_000, output: 100_000 }, "sync");
    expect(cost).toBe(2.025);
  });

  it("applies the tier multiplier", () => {
    expect(computeCostUsd("gpt-4o-mini", { input: 10_000, cachedInput: 0, output: 2_000 }, "sync", "flex")).toBe(
      0.00135,
    );
    expect(computeCostUsd("gpt-4.1", { input: 1_000, cachedInput: 0, output: 1_000 }, "sync", "priority")).toBe(0.02);
  });

  it("rounds to six decimals", () => {
    expect(computeCostUsd("gpt-5-nano", { input: 1, cachedInput: 0, output: 0 }, "sync")).toBe(0);
  });

  it("never counts more cached tokens than input tokens", () => {
    expect(computeCostUsd("gpt-5", { input: 1_000, cachedInput: 5_000, output: 0 }, "sync")).toBe(0.000125);
  });
});
