import { InvalidCategoryError, ModelUnavailableError } from "./errors";
import type {
  FeatureScaler,
  NormalizedFeatureVector,
  RawAssessmentInput,
} from "./types";

/**
 * Feature encoding shared by training and inference.
 *
 * The classifier only ever sees vectors built from this table. Codes, order
 * and the BMI imputation value must match what the model was trained on;
 * any change needs a new `version` and a retrained artifact.
 */
export const FEATURE_ENCODING = {
  version: "1",
  featureOrder: [
    "gender",
    "age",
    "hypertension",
    "heart_disease",
    "ever_married",
    "work_type",
    "residence_type",
    "avg_glucose_level",
    "bmi",
    "smoking_status",
  ],
  continuous: ["age", "avg_glucose_level", "bmi"],
  categories: {
    gender: { female: 0, male: 1, other: 2 },
    work_type: {
      government: 0,
      private: 1,
      "self-employed": 2,
      child: 3,
      "never-worked": 4,
    },
    residence_type: { rural: 0, urban: 1 },
    smoking_status: { unknown: 0, former: 1, never: 2, current: 3 },
  },
  /** Training population mean, used when BMI is unknown. */
  bmiImputation: 28.9,
} as const;

export type CategoricalField = keyof typeof FEATURE_ENCODING.categories;

export const FEATURE_COUNT = FEATURE_ENCODING.featureOrder.length;

/**
 * Looks up the code of a category value.
 *
 * Throws `InvalidCategoryError` for anything outside the table; there is no
 * fallback code.
 */
export function encodeCategory(field: CategoricalField, value: string): number {
  const table: Readonly<Record<string, number>> = FEATURE_ENCODING.categories[field];
  if (!Object.hasOwn(table, value)) throw new InvalidCategoryError(field, value);
  return table[value];
}

function encodeBoolean(value: boolean): number {
  return value ? 1 : 0;
}

/**
 * Builds the classifier's feature vector from an input.
 *
 * The continuous fields go through the scaler together, in the order
 * [age, avg_glucose_level, bmi]; unknown BMI is replaced by the documented
 * imputation value first.
 */
export function normalizeFeatures(
  input: RawAssessmentInput,
  scaler: FeatureScaler
): NormalizedFeatureVector {
  const gender = encodeCategory("gender", input.gender);
  const workType = encodeCategory("work_type", input.workType);
  const residenceType = encodeCategory("residence_type", input.residenceType);
  const smokingStatus = encodeCategory("smoking_status", input.smokingStatus);

  const bmi = input.bmi ?? FEATURE_ENCODING.bmiImputation;
  const scaled = scaler.transform([input.age, input.avgGlucoseLevel, bmi]);
  if (scaled.length !== FEATURE_ENCODING.continuous.length) {
    throw new ModelUnavailableError(
      `scaler returned ${scaled.length} values, expected ${FEATURE_ENCODING.continuous.length}`
    );
  }
  const [age, glucose, scaledBmi] = scaled;

  return Object.freeze([
    gender,
    age,
    encodeBoolean(input.hypertension),
    encodeBoolean(input.heartDisease),
    encodeBoolean(input.everMarried),
    workType,
    residenceType,
    glucose,
    scaledBmi,
    smokingStatus,
  ]);
}
