import { describe, expect, test } from "vitest";
import { blendRisk, classifyRiskTier } from "./blender";
import { RISK_POLICY, type RiskPolicy } from "./policy";

describe("blendRisk", () => {
  test("averages when the rule score is higher", () => {
    expect(blendRisk(0.2, 0.6)).toBe((0.2 + 0.6) / 2);
    expect(blendRisk(0, 1)).toBe(0.5);
  });

  test("keeps the classifier value when it is higher", () => {
    expect(blendRisk(0.7, 0.3)).toBe(0.7);
  });

  test("keeps the classifier value on a tie", () => {
    expect(blendRisk(0.45, 0.45)).toBe(0.45);
  });

  test("a zero rule score leaves the classifier value unchanged", () => {
    expect(blendRisk(0.123, 0)).toBe(0.123);
  });

  test("rejects values outside [0, 1]", () => {
    expect(() => blendRisk(-0.1, 0.5)).toThrow(RangeError);
    expect(() => blendRisk(0.5, 1.2)).toThrow(RangeError);
    expect(() => blendRisk(Number.NaN, 0.5)).toThrow(RangeError);
  });
});

describe("classifyRiskTier", () => {
  test("lower bounds belong to the upper tier", () => {
    expect(classifyRiskTier(0.3)).toBe("moderate");
    expect(classifyRiskTier(0.6)).toBe("high");
  });

  test("values just below a bound stay in the lower tier", () => {
    expect(classifyRiskTier(0.2999999)).toBe("low");
    expect(classifyRiskTier(0.5999999)).toBe("moderate");
  });

  test("covers both ends of [0, 1]", () => {
    expect(classifyRiskTier(0)).toBe("low");
    expect(classifyRiskTier(1)).toBe("high");
  });

  test("reads cut-offs from the given policy", () => {
    const policy: RiskPolicy = { ...RISK_POLICY, tiers: { moderate: 0.2, high: 0.5 } };
    expect(classifyRiskTier(0.25, policy)).toBe("moderate");
    expect(classifyRiskTier(0.5, policy)).toBe("high");
  });

  test("rejects values outside [0, 1]", () => {
    expect(() => classifyRiskTier(1.01)).toThrow(RangeError);
  });
});
