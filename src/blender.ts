import { RISK_POLICY, type RiskPolicy } from "./policy";
import type { RiskTier } from "./types";

function assertProbability(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`${name} must be a probability in [0, 1], got ${value}`);
  }
}

/**
 * Combines the classifier and rule probabilities.
 *
 * The rule score can only raise the estimate: when it is higher than the
 * classifier's, the two are averaged; otherwise the classifier's value is
 * returned untouched. Do not make this symmetric.
 */
export function blendRisk(mlProbability: number, ruleProbability: number): number {
  assertProbability("mlProbability", mlProbability);
  assertProbability("ruleProbability", ruleProbability);

  if (ruleProbability > mlProbability) {
    return (mlProbability + ruleProbability) / 2;
  }
  return mlProbability;
}

/**
 * Maps a final probability to its tier.
 *
 * Intervals are closed-open: with the default policy 0.30 is moderate and
 * 0.60 is high.
 */
export function classifyRiskTier(
  probability: number,
  policy: RiskPolicy = RISK_POLICY
): RiskTier {
  assertProbability("probability", probability);

  if (probability >= policy.tiers.high) return "high";
  if (probability >= policy.tiers.moderate) return "moderate";
  return "low";
}
