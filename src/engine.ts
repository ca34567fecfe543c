import { blendRisk, classifyRiskTier } from "./blender";
import { ModelUnavailableError } from "./errors";
import { explainRisk } from "./explain";
import { collectRangeWarnings, parseAssessmentInput } from "./input";
import { FEATURE_COUNT, FEATURE_ENCODING, normalizeFeatures } from "./normalizer";
import { RISK_POLICY, type RiskPolicy } from "./policy";
import { scoreRules } from "./scoring";
import type {
  AssessmentResult,
  FeatureScaler,
  RawAssessmentInput,
  StrokePredictor,
} from "./types";

export type RiskEngineDeps = {
  predictor: StrokePredictor;
  scaler: FeatureScaler;
  policy?: RiskPolicy;
};

export type RiskEngine = {
  readonly modelVersion: string;
  readonly scalerVersion: string;
  readonly policyVersion: string;
  readonly encodingVersion: string;
  assess(input: RawAssessmentInput): AssessmentResult;
  assessPayload(payload: unknown): AssessmentResult;
};

/**
 * Builds the hybrid scoring engine around an already-loaded artifact pair.
 *
 * Artifacts are injected rather than read from module state, so tests can pass
 * a stub predictor. A predictor or scaler that does not fit the encoding table
 * is rejected here, before any request is served.
 *
 * Pipeline per call:
 * 1) Encode and scale the input, ask the classifier for P_ml.
 * 2) Score the rule table for P_rule and the triggered factors.
 * 3) Blend the two and map the result to a tier.
 * 4) Explain from the same triggered factors.
 */
export function createRiskEngine({
  predictor,
  scaler,
  policy = RISK_POLICY,
}: RiskEngineDeps): RiskEngine {
  if (predictor.inputLength !== FEATURE_COUNT) {
    throw new ModelUnavailableError(
      `predictor expects ${predictor.inputLength} features, normalizer produces ${FEATURE_COUNT}`
    );
  }
  const expected = FEATURE_ENCODING.continuous;
  if (
    scaler.features.length !== expected.length ||
    scaler.features.some((f, i) => f !== expected[i])
  ) {
    throw new ModelUnavailableError(
      `scaler features [${scaler.features.join(", ")}] do not match [${expected.join(", ")}]`
    );
  }

  function assess(input: RawAssessmentInput): AssessmentResult {
    // Encoding runs first so an invalid category never reaches the predictor.
    const features = normalizeFeatures(input, scaler);
    const mlProbability = predictor.predictProbability(features);
    if (!Number.isFinite(mlProbability) || mlProbability < 0 || mlProbability > 1) {
      throw new ModelUnavailableError(
        `predictor returned ${mlProbability}, expected a probability in [0, 1]`
      );
    }

    const rule = scoreRules(input, policy);
    const finalProbability = blendRisk(mlProbability, rule.probability);
    const { factors, recommendations } = explainRisk(rule.triggered, policy);

    return Object.freeze({
      mlProbability,
      ruleProbability: rule.probability,
      finalProbability,
      riskTier: classifyRiskTier(finalProbability, policy),
      compoundingBonus: rule.compoundingBonus,
      factors: Object.freeze(factors),
      recommendations: Object.freeze(recommendations),
      warnings: Object.freeze(collectRangeWarnings(input)),
      policyVersion: policy.version,
      encodingVersion: FEATURE_ENCODING.version,
      modelVersion: predictor.version,
    });
  }

  return Object.freeze({
    modelVersion: predictor.version,
    scalerVersion: scaler.version,
    policyVersion: policy.version,
    encodingVersion: FEATURE_ENCODING.version,
    assess,
    assessPayload: (payload: unknown) => assess(parseAssessmentInput(payload)),
  });
}
