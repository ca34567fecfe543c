import {
  InvalidCategoryError,
  InvalidNumberError,
  InvalidPayloadError,
  MissingRequiredFieldError,
} from "./errors";
import { FEATURE_ENCODING, type CategoricalField } from "./normalizer";
import type {
  Gender,
  RangeWarning,
  RawAssessmentInput,
  ResidenceType,
  SmokingStatus,
  WorkType,
} from "./types";

type PayloadRecord = Record<string, unknown>;

function isRecord(value: unknown): value is PayloadRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Picks the first present key from a payload.
 *
 * Form posts use snake_case (and `Residence_type`), JSON clients tend to use
 * camelCase, so each field has several accepted keys.
 */
function pickField(payload: PayloadRecord, keys: readonly string[]): unknown {
  for (const k of keys) {
    if (Object.hasOwn(payload, k)) return payload[k];
  }
  return undefined;
}

function isBlank(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    (typeof value === "string" && value.trim() === "")
  );
}

/**
 * Attempts to parse a number from unknown input.
 * - Accepts finite numbers
 * - Accepts numeric strings, with a trailing unit ("32.5 kg/m2" -> 32.5)
 * - Rejects anything else after the number ("7.8e1", "1,5")
 */
export function parseLooseNumber(value: unknown): {
  value: number | null;
  valid: boolean;
} {
  if (typeof value === "number" && Number.isFinite(value))
    return { value, valid: true };
  if (typeof value !== "string") return { value: null, valid: false };

  const s = value.trim();
  if (!s) return { value: null, valid: false };

  const match = s.match(/^(-?\d+(?:\.\d+)?)(?:\s+[A-Za-z/][A-Za-z/\d]*)?$/);
  if (!match) return { value: null, valid: false };

  const n = Number.parseFloat(match[1]);
  if (!Number.isFinite(n)) return { value: null, valid: false };
  return { value: n, valid: true };
}

function normalizeLabel(value: string): string {
  return value.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

/*
 * Labels accepted for each category, keyed by normalized label. Includes the
 * wording used by the intake form ("Govt Job", "Formerly Smoked",
 * "Smokes", ...). Numeric codes are resolved through the encoding table.
 */
const GENDER_LABELS: Readonly<Record<string, Gender>> = {
  male: "male",
  m: "male",
  female: "female",
  f: "female",
  other: "other",
};

const WORK_TYPE_LABELS: Readonly<Record<string, WorkType>> = {
  private: "private",
  "self-employed": "self-employed",
  government: "government",
  govt: "government",
  "govt-job": "government",
  "government-job": "government",
  child: "child",
  children: "child",
  "never-worked": "never-worked",
};

const RESIDENCE_LABELS: Readonly<Record<string, ResidenceType>> = {
  urban: "urban",
  rural: "rural",
};

const SMOKING_LABELS: Readonly<Record<string, SmokingStatus>> = {
  never: "never",
  "never-smoked": "never",
  former: "former",
  "formerly-smoked": "former",
  current: "current",
  smokes: "current",
  "currently-smokes": "current",
  "current-smoker": "current",
  unknown: "unknown",
};

/**
 * Resolves a category value from a label or an encoding-table code.
 *
 * Anything unrecognized is an `InvalidCategoryError`; there is no default.
 */
export function parseCategory<T extends string>(
  field: CategoricalField,
  labels: Readonly<Record<string, T>>,
  value: unknown
): T {
  if (isBlank(value)) throw new MissingRequiredFieldError(field);
  if (typeof value !== "string" && typeof value !== "number") {
    throw new InvalidCategoryError(field, value);
  }

  const label = normalizeLabel(String(value));
  if (Object.hasOwn(labels, label)) return labels[label];

  if (/^\d+$/.test(label)) {
    const code = Number.parseInt(label, 10);
    const table: Readonly<Record<string, number>> = FEATURE_ENCODING.categories[field];
    for (const [name, c] of Object.entries(table)) {
      if (c === code && Object.hasOwn(labels, name)) return labels[name];
    }
  }

  throw new InvalidCategoryError(field, value);
}

const TRUE_LABELS = new Set(["true", "yes", "y", "1"]);
const FALSE_LABELS = new Set(["false", "no", "n", "0"]);

export function parseBooleanField(field: string, value: unknown): boolean {
  if (isBlank(value)) throw new MissingRequiredFieldError(field);
  if (typeof value === "boolean") return value;
  if (typeof value === "number" || typeof value === "string") {
    const label = normalizeLabel(String(value));
    if (TRUE_LABELS.has(label)) return true;
    if (FALSE_LABELS.has(label)) return false;
  }
  throw new InvalidCategoryError(field, value);
}

function parseRequiredNumber(field: string, value: unknown): number {
  if (isBlank(value)) throw new MissingRequiredFieldError(field);
  const parsed = parseLooseNumber(value);
  if (!parsed.valid || parsed.value === null) {
    throw new InvalidNumberError(field, value);
  }
  return parsed.value;
}

const BMI_MISSING_LABELS = new Set(["n/a", "na", "unknown"]);

/**
 * Parses an optional BMI.
 *
 * Absent, `null`, blank and the usual "N/A" markers mean unknown (`null`).
 * Anything else must be a number; it is never turned into 0.
 */
export function parseOptionalBmi(value: unknown): number | null {
  if (isBlank(value)) return null;
  if (typeof value === "string" && BMI_MISSING_LABELS.has(value.trim().toLowerCase())) {
    return null;
  }
  const parsed = parseLooseNumber(value);
  if (!parsed.valid || parsed.value === null) {
    throw new InvalidNumberError("bmi", value);
  }
  return parsed.value;
}

/**
 * Parses an untrusted payload (form post, JSON body, CLI file record) into a
 * `RawAssessmentInput`.
 *
 * Throws:
 * - `MissingRequiredFieldError` when a required field is absent or blank
 * - `InvalidCategoryError` for unknown enum or boolean values
 * - `InvalidNumberError` for non-numeric numbers
 * - `InvalidPayloadError` when the payload is not an object
 */
export function parseAssessmentInput(payload: unknown): RawAssessmentInput {
  if (!isRecord(payload)) {
    throw new InvalidPayloadError(
      payload === null ? "null" : Array.isArray(payload) ? "array" : typeof payload
    );
  }

  const gender = parseCategory(
    "gender",
    GENDER_LABELS,
    pickField(payload, ["gender", "Gender"])
  );
  const age = parseRequiredNumber("age", pickField(payload, ["age", "Age"]));
  const hypertension = parseBooleanField(
    "hypertension",
    pickField(payload, ["hypertension", "Hypertension"])
  );
  const heartDisease = parseBooleanField(
    "heart_disease",
    pickField(payload, ["heart_disease", "heartDisease"])
  );
  const everMarried = parseBooleanField(
    "ever_married",
    pickField(payload, ["ever_married", "everMarried"])
  );
  const workType = parseCategory(
    "work_type",
    WORK_TYPE_LABELS,
    pickField(payload, ["work_type", "workType"])
  );
  const residenceType = parseCategory(
    "residence_type",
    RESIDENCE_LABELS,
    pickField(payload, ["residence_type", "Residence_type", "residenceType"])
  );
  const avgGlucoseLevel = parseRequiredNumber(
    "avg_glucose_level",
    pickField(payload, ["avg_glucose_level", "avgGlucoseLevel"])
  );
  const bmi = parseOptionalBmi(pickField(payload, ["bmi", "BMI"]));
  const smokingStatus = parseCategory(
    "smoking_status",
    SMOKING_LABELS,
    pickField(payload, ["smoking_status", "smokingStatus"])
  );

  return {
    gender,
    age,
    hypertension,
    heartDisease,
    everMarried,
    workType,
    residenceType,
    avgGlucoseLevel,
    bmi,
    smokingStatus,
  };
}

/**
 * Plausible bounds, from the checks the assessment form applies.
 */
export const PLAUSIBLE_RANGES = {
  age: { min: 0, max: 120, label: "Age", unit: "years" },
  avgGlucoseLevel: { min: 50, max: 300, label: "Average glucose", unit: "mg/dL" },
  bmi: { min: 10, max: 50, label: "BMI", unit: "kg/m2" },
} as const;

/**
 * Reports values outside plausible bounds.
 *
 * Values are reported, never clamped; whether to reject is up to the caller.
 */
export function collectRangeWarnings(input: RawAssessmentInput): RangeWarning[] {
  const checks: { field: RangeWarning["field"]; value: number | null }[] = [
    { field: "age", value: input.age },
    { field: "avgGlucoseLevel", value: input.avgGlucoseLevel },
    { field: "bmi", value: input.bmi },
  ];

  const warnings: RangeWarning[] = [];
  for (const { field, value } of checks) {
    if (value === null) continue;
    const range = PLAUSIBLE_RANGES[field];
    if (value < range.min || value > range.max) {
      warnings.push(
        Object.freeze({
          field,
          value,
          min: range.min,
          max: range.max,
          message: `${range.label} ${value} ${range.unit} is outside the plausible range ${range.min}-${range.max}`,
        })
      );
    }
  }
  return warnings;
}
