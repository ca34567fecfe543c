export type Gender = "male" | "female" | "other";

export type WorkType =
  | "private"
  | "self-employed"
  | "government"
  | "child"
  | "never-worked";

export type ResidenceType = "urban" | "rural";

export type SmokingStatus = "never" | "former" | "current" | "unknown";

/**
 * One person's assessment inputs, already parsed into their canonical values.
 *
 * `bmi` is `null` when unknown. That is a distinct state from a measured value
 * and is never read as zero.
 */
export type RawAssessmentInput = {
  gender: Gender;
  age: number;
  hypertension: boolean;
  heartDisease: boolean;
  everMarried: boolean;
  workType: WorkType;
  residenceType: ResidenceType;
  avgGlucoseLevel: number;
  bmi: number | null;
  smokingStatus: SmokingStatus;
};

/**
 * Classifier input, in the fixed feature order of the encoding table.
 */
export type NormalizedFeatureVector = readonly number[];

export type RiskTier = "low" | "moderate" | "high";

export type FactorId =
  | "age"
  | "heart_disease"
  | "hypertension"
  | "diabetes"
  | "smoking"
  | "obesity"
  | "overweight";

/**
 * A rule-table condition that was met for a given input.
 */
export type TriggeredFactor = {
  id: FactorId;
  name: string;
  weight: number;
};

export type RiskFactor = {
  readonly id: FactorId;
  readonly name: string;
  readonly weight: number;
  readonly explanation: string;
};

export type RuleScore = {
  triggered: readonly TriggeredFactor[];
  /** Sum of factor weights before the bonus and clipping. */
  weightSum: number;
  compoundingBonus: number;
  probability: number;
};

export type RangeWarning = {
  readonly field: "age" | "avgGlucoseLevel" | "bmi";
  readonly value: number;
  readonly min: number;
  readonly max: number;
  readonly message: string;
};

export type AssessmentResult = {
  readonly mlProbability: number;
  readonly ruleProbability: number;
  readonly finalProbability: number;
  readonly riskTier: RiskTier;
  readonly compoundingBonus: number;
  readonly factors: readonly RiskFactor[];
  readonly recommendations: readonly string[];
  readonly warnings: readonly RangeWarning[];
  readonly policyVersion: string;
  readonly encodingVersion: string;
  readonly modelVersion: string;
};

export type ContinuousFeature = "age" | "avg_glucose_level" | "bmi";

/**
 * A loaded scaler: standardizes the continuous fields, in the order of
 * `features`.
 */
export interface FeatureScaler {
  readonly version: string;
  readonly features: readonly ContinuousFeature[];
  transform(values: readonly number[]): number[];
}

/**
 * A loaded binary classifier returning P(stroke) for a feature vector.
 */
export interface StrokePredictor {
  readonly version: string;
  readonly inputLength: number;
  predictProbability(features: NormalizedFeatureVector): number;
}
