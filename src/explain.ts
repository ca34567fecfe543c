import { RISK_POLICY, type RiskPolicy } from "./policy";
import type { RiskFactor, TriggeredFactor } from "./types";

/**
 * Orders triggered factors by descending weight.
 *
 * Equal weights fall back to the policy's priority list (heart disease,
 * hypertension, age, smoking, diabetes, obesity), so the order is the same on
 * every run.
 */
function sortFactors(
  triggered: readonly TriggeredFactor[],
  policy: RiskPolicy
): TriggeredFactor[] {
  const rank = (f: TriggeredFactor): number => {
    const idx = policy.factorPriority.indexOf(f.id);
    return idx === -1 ? policy.factorPriority.length : idx;
  };

  return [...triggered].sort((a, b) => {
    if (a.weight !== b.weight) return b.weight - a.weight;
    return rank(a) - rank(b);
  });
}

/**
 * Builds the factor list and recommendations for a result.
 *
 * Works only from the triggered set the rule scorer produced; thresholds are
 * never checked again here.
 *
 * Recommendations:
 * - one per triggered modifiable factor (those with a recommendation text),
 *   in factor order
 * - the generic recommendation when nothing triggered
 */
export function explainRisk(
  triggered: readonly TriggeredFactor[],
  policy: RiskPolicy = RISK_POLICY
): { factors: RiskFactor[]; recommendations: string[] } {
  const ordered = sortFactors(triggered, policy);

  const factors = ordered.map((f) =>
    Object.freeze({
      id: f.id,
      name: f.name,
      weight: f.weight,
      explanation: policy.texts[f.id].explanation,
    })
  );

  if (ordered.length === 0) {
    return { factors, recommendations: [policy.genericRecommendation] };
  }

  const recommendations: string[] = [];
  for (const f of ordered) {
    const text = policy.texts[f.id].recommendation;
    if (text && !recommendations.includes(text)) recommendations.push(text);
  }

  return { factors, recommendations };
}
