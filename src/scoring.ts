import { RISK_POLICY, type AgeBand, type BmiBand, type RiskPolicy } from "./policy";
import type { RawAssessmentInput, RuleScore, TriggeredFactor } from "./types";

/**
 * Clips a value into [min, max].
 *
 * Kept as an explicit step so a rule sum above 1 is never passed on as-is.
 */
export function clip(value: number, min = 0, max = 1): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Picks the age band for an age.
 *
 * Bands are checked highest first, so a 78-year-old gets only the 75+ band,
 * never the 65-74 or 55-64 band on top of it.
 */
export function matchAgeBand(
  age: number,
  policy: RiskPolicy = RISK_POLICY
): AgeBand | null {
  for (const band of policy.ageBands) {
    if (age >= band.minAge) return band;
  }
  return null;
}

/**
 * Picks the BMI band for a BMI value.
 *
 * Unknown BMI (`null`) matches no band. Like age, only the highest matching
 * band applies.
 */
export function matchBmiBand(
  bmi: number | null,
  policy: RiskPolicy = RISK_POLICY
): BmiBand | null {
  if (bmi === null) return null;
  for (const band of policy.bmiBands) {
    if (bmi >= band.minBmi) return band;
  }
  return null;
}

/**
 * Bonus for several risk factors at once.
 *
 * Depends only on how many distinct factors triggered, not on their weights.
 */
export function compoundingBonus(
  triggeredCount: number,
  policy: RiskPolicy = RISK_POLICY
): number {
  for (const rule of policy.compoundingBonus) {
    if (triggeredCount >= rule.minFactors) return rule.bonus;
  }
  return 0;
}

/**
 * Lists the rule-table conditions met by an input, in table order.
 */
export function findTriggeredFactors(
  input: RawAssessmentInput,
  policy: RiskPolicy = RISK_POLICY
): TriggeredFactor[] {
  const triggered: TriggeredFactor[] = [];

  const ageBand = matchAgeBand(input.age, policy);
  if (ageBand) {
    triggered.push({ id: "age", name: ageBand.name, weight: ageBand.weight });
  }

  if (input.heartDisease) {
    triggered.push({ id: "heart_disease", ...policy.heartDisease });
  }

  if (input.hypertension) {
    triggered.push({ id: "hypertension", ...policy.hypertension });
  }

  if (input.avgGlucoseLevel >= policy.diabetes.minGlucose) {
    triggered.push({
      id: "diabetes",
      name: policy.diabetes.name,
      weight: policy.diabetes.weight,
    });
  }

  if (input.smokingStatus === "current") {
    triggered.push({ id: "smoking", ...policy.currentSmoker });
  }

  const bmiBand = matchBmiBand(input.bmi, policy);
  if (bmiBand) {
    triggered.push({ id: bmiBand.id, name: bmiBand.name, weight: bmiBand.weight });
  }

  return triggered;
}

/**
 * Computes the rule-based risk score (P_rule).
 *
 * P_rule = clip(sum of triggered weights + compounding bonus, 0, 1). The
 * triggered set is returned alongside so explanations are built from exactly
 * what was scored.
 */
export function scoreRules(
  input: RawAssessmentInput,
  policy: RiskPolicy = RISK_POLICY
): RuleScore {
  const triggered = findTriggeredFactors(input, policy);
  const weightSum = triggered.reduce((sum, f) => sum + f.weight, 0);
  const bonus = compoundingBonus(triggered.length, policy);

  return {
    triggered,
    weightSum,
    compoundingBonus: bonus,
    probability: clip(weightSum + bonus),
  };
}
