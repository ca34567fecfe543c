import type {
  FeatureScaler,
  NormalizedFeatureVector,
  RawAssessmentInput,
  StrokePredictor,
} from "../types";

/**
 * A 30-year-old with no risk factors: every rule stays silent.
 */
export const HEALTHY_INPUT: RawAssessmentInput = {
  gender: "female",
  age: 30,
  hypertension: false,
  heartDisease: false,
  everMarried: false,
  workType: "private",
  residenceType: "urban",
  avgGlucoseLevel: 85,
  bmi: 22,
  smokingStatus: "never",
};

/**
 * Six triggered factors: 75+, heart disease, hypertension, glucose 150,
 * BMI 32 and current smoking.
 */
export const HIGH_RISK_INPUT: RawAssessmentInput = {
  gender: "male",
  age: 75,
  hypertension: true,
  heartDisease: true,
  everMarried: true,
  workType: "private",
  residenceType: "urban",
  avgGlucoseLevel: 150,
  bmi: 32,
  smokingStatus: "current",
};

export function withInput(
  overrides: Partial<RawAssessmentInput>,
  base: RawAssessmentInput = HEALTHY_INPUT
): RawAssessmentInput {
  return { ...base, ...overrides };
}

/**
 * Predictor returning a fixed probability and recording every vector it saw.
 */
export function stubPredictor(
  probability: number,
  calls: NormalizedFeatureVector[] = []
): StrokePredictor {
  return {
    version: "stub-model",
    inputLength: 10,
    predictProbability(features) {
      calls.push(features);
      return probability;
    },
  };
}

/**
 * Scaler that passes values through unchanged.
 */
export const identityScaler: FeatureScaler = {
  version: "stub-scaler",
  features: ["age", "avg_glucose_level", "bmi"],
  transform: (values) => [...values],
};
