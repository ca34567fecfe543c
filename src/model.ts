import { readFileSync } from "node:fs";
import { z } from "zod";
import { ModelUnavailableError } from "./errors";
import { FEATURE_ENCODING } from "./normalizer";
import type {
  ContinuousFeature,
  FeatureScaler,
  NormalizedFeatureVector,
  StrokePredictor,
} from "./types";

const finiteNumber = z.number().finite();

export const ModelArtifactSchema = z.object({
  kind: z.literal("logistic-regression"),
  version: z.string().min(1),
  featureOrder: z.array(z.string()),
  coefficients: z.array(finiteNumber),
  intercept: finiteNumber,
});

export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;

export const ScalerArtifactSchema = z.object({
  kind: z.literal("standard-scaler"),
  version: z.string().min(1),
  features: z.array(z.enum(["age", "avg_glucose_level", "bmi"])),
  mean: z.array(finiteNumber),
  scale: z.array(finiteNumber.positive()),
});

export type ScalerArtifact = z.infer<typeof ScalerArtifactSchema>;

function sameOrder(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

function sigmoid(x: number): number {
  if (x >= 0) return 1 / (1 + Math.exp(-x));
  const e = Math.exp(x);
  return e / (1 + e);
}

/**
 * Logistic-regression classifier restored from its artifact.
 *
 * Coefficients are copied and frozen on construction.
 */
export class LogisticRegressionModel implements StrokePredictor {
  readonly version: string;
  readonly inputLength: number;
  private readonly coefficients: readonly number[];
  private readonly intercept: number;

  constructor(artifact: ModelArtifact) {
    this.version = artifact.version;
    this.coefficients = Object.freeze([...artifact.coefficients]);
    this.intercept = artifact.intercept;
    this.inputLength = this.coefficients.length;
    Object.freeze(this);
  }

  predictProbability(features: NormalizedFeatureVector): number {
    if (features.length !== this.inputLength) {
      throw new RangeError(
        `Expected ${this.inputLength} features, got ${features.length}`
      );
    }

    let logit = this.intercept;
    for (let i = 0; i < features.length; i += 1) {
      logit += this.coefficients[i] * features[i];
    }
    return sigmoid(logit);
  }
}

/**
 * Standard scaler: `(x - mean) / scale` per continuous field.
 */
export class StandardScaler implements FeatureScaler {
  readonly version: string;
  readonly features: readonly ContinuousFeature[];
  private readonly mean: readonly number[];
  private readonly scale: readonly number[];

  constructor(artifact: ScalerArtifact) {
    this.version = artifact.version;
    this.features = Object.freeze([...artifact.features]);
    this.mean = Object.freeze([...artifact.mean]);
    this.scale = Object.freeze([...artifact.scale]);
    Object.freeze(this);
  }

  transform(values: readonly number[]): number[] {
    if (values.length !== this.features.length) {
      throw new RangeError(
        `Expected ${this.features.length} values, got ${values.length}`
      );
    }
    return values.map((v, i) => (v - this.mean[i]) / this.scale[i]);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates a parsed classifier artifact against the encoding table.
 */
export function createPredictor(raw: unknown): LogisticRegressionModel {
  const parsed = ModelArtifactSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ModelUnavailableError(
      `invalid model artifact (${describeIssues(parsed.error)})`
    );
  }

  const artifact = parsed.data;
  if (!sameOrder(artifact.featureOrder, FEATURE_ENCODING.featureOrder)) {
    throw new ModelUnavailableError(
      `model feature order [${artifact.featureOrder.join(", ")}] does not match encoding v${FEATURE_ENCODING.version}`
    );
  }
  if (artifact.coefficients.length !== FEATURE_ENCODING.featureOrder.length) {
    throw new ModelUnavailableError(
      `model expects ${artifact.coefficients.length} features, normalizer produces ${FEATURE_ENCODING.featureOrder.length}`
    );
  }

  return new LogisticRegressionModel(artifact);
}

/**
 * Validates a parsed scaler artifact against the encoding table.
 */
export function createScaler(raw: unknown): StandardScaler {
  const parsed = ScalerArtifactSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ModelUnavailableError(
      `invalid scaler artifact (${describeIssues(parsed.error)})`
    );
  }

  const artifact = parsed.data;
  if (!sameOrder(artifact.features, FEATURE_ENCODING.continuous)) {
    throw new ModelUnavailableError(
      `scaler features [${artifact.features.join(", ")}] do not match [${FEATURE_ENCODING.continuous.join(", ")}]`
    );
  }
  if (
    artifact.mean.length !== artifact.features.length ||
    artifact.scale.length !== artifact.features.length
  ) {
    throw new ModelUnavailableError(
      "scaler mean/scale lengths do not match its feature list"
    );
  }

  return new StandardScaler(artifact);
}

function readJsonFile(path: string, label: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new ModelUnavailableError(`cannot read ${label} at ${path}`, err);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ModelUnavailableError(`${label} at ${path} is not valid JSON`, err);
  }
}

export type ModelArtifacts = {
  predictor: StrokePredictor;
  scaler: FeatureScaler;
};

/**
 * Loads the classifier/scaler pair from disk.
 *
 * Meant to run once at startup: every problem surfaces here as a
 * `ModelUnavailableError` instead of at the first request.
 */
export function loadModelArtifacts(paths: {
  modelPath: string;
  scalerPath: string;
}): ModelArtifacts {
  const predictor = createPredictor(readJsonFile(paths.modelPath, "model artifact"));
  const scaler = createScaler(readJsonFile(paths.scalerPath, "scaler artifact"));
  return Object.freeze({ predictor, scaler });
}
