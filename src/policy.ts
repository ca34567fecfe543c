import type { FactorId } from "./types";

export type AgeBand = {
  minAge: number;
  weight: number;
  name: string;
};

export type BmiBand = {
  id: Extract<FactorId, "obesity" | "overweight">;
  minBmi: number;
  weight: number;
  name: string;
};

export type FactorText = {
  explanation: string;
  /** Present only for modifiable factors. */
  recommendation?: string;
};

/**
 * The rule table and tier cut-offs, as one versioned structure.
 *
 * Scoring, explanations and tier mapping all read from this object. Any change
 * to a weight, threshold or text must bump `version`, since the rule score
 * overrides the classifier whenever it is higher.
 */
export type RiskPolicy = {
  version: string;
  /** Highest band first; only the first matching band applies. */
  ageBands: readonly AgeBand[];
  /** Highest band first; only the first matching band applies. */
  bmiBands: readonly BmiBand[];
  heartDisease: { weight: number; name: string };
  hypertension: { weight: number; name: string };
  currentSmoker: { weight: number; name: string };
  diabetes: { weight: number; name: string; minGlucose: number };
  /** Most factors first; the first rule whose `minFactors` is met applies. */
  compoundingBonus: readonly { minFactors: number; bonus: number }[];
  tiers: { moderate: number; high: number };
  /** Tie-break order for factors of equal weight. */
  factorPriority: readonly FactorId[];
  texts: Record<FactorId, FactorText>;
  genericRecommendation: string;
};

export const RISK_POLICY = {
  version: "2025.1",
  ageBands: [
    { minAge: 75, weight: 0.35, name: "Age 75 or older" },
    { minAge: 65, weight: 0.25, name: "Age 65-74" },
    { minAge: 55, weight: 0.15, name: "Age 55-64" },
  ],
  bmiBands: [
    { id: "obesity", minBmi: 35, weight: 0.15, name: "Obesity (BMI 35+)" },
    { id: "overweight", minBmi: 30, weight: 0.1, name: "High BMI (30-34.9)" },
  ],
  heartDisease: { weight: 0.3, name: "Heart disease" },
  hypertension: { weight: 0.25, name: "Hypertension" },
  currentSmoker: { weight: 0.2, name: "Current smoker" },
  diabetes: { weight: 0.15, name: "Elevated glucose", minGlucose: 126 },
  compoundingBonus: [
    { minFactors: 3, bonus: 0.1 },
    { minFactors: 2, bonus: 0.05 },
  ],
  tiers: { moderate: 0.3, high: 0.6 },
  factorPriority: [
    "heart_disease",
    "hypertension",
    "age",
    "smoking",
    "diabetes",
    "obesity",
    "overweight",
  ],
  texts: {
    age: {
      explanation:
        "Stroke risk roughly doubles with each decade after 55.",
    },
    heart_disease: {
      explanation:
        "Heart disease, including atrial fibrillation, raises the chance of clots reaching the brain.",
    },
    hypertension: {
      explanation:
        "High blood pressure is the leading modifiable cause of stroke.",
    },
    diabetes: {
      explanation:
        "Average glucose of 126 mg/dL or more suggests diabetes, which damages blood vessels over time.",
      recommendation:
        "Ask your doctor about an HbA1c test and keep blood glucose under control through diet, activity and any prescribed treatment.",
    },
    smoking: {
      explanation:
        "Smoking narrows arteries and makes blood more likely to clot.",
      recommendation:
        "Stop smoking. Cessation programmes and nicotine replacement substantially improve success rates.",
    },
    obesity: {
      explanation:
        "A BMI of 35 or more is linked to high blood pressure, diabetes and heart disease.",
      recommendation:
        "Work with a clinician on a weight-loss plan combining regular activity and a balanced diet.",
    },
    overweight: {
      explanation:
        "A BMI between 30 and 35 adds strain on the heart and blood vessels.",
      recommendation:
        "Aim for gradual weight loss through at least 150 minutes of moderate activity a week and a balanced diet.",
    },
  },
  genericRecommendation:
    "Keep up a healthy lifestyle and routine check-ups of blood pressure, glucose and cholesterol.",
} as const satisfies RiskPolicy;
