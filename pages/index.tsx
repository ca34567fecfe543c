import { useState, type FormEvent } from "react";
import type { AssessmentResult } from "../src/types";

type FormState = {
  gender: string;
  age: string;
  hypertension: string;
  heart_disease: string;
  ever_married: string;
  work_type: string;
  residence_type: string;
  avg_glucose_level: string;
  bmi: string;
  smoking_status: string;
};

const INITIAL_FORM: FormState = {
  gender: "female",
  age: "",
  hypertension: "no",
  heart_disease: "no",
  ever_married: "no",
  work_type: "private",
  residence_type: "urban",
  avg_glucose_level: "",
  bmi: "",
  smoking_status: "never",
};

const TIER_COLORS: Record<AssessmentResult["riskTier"], string> = {
  low: "seagreen",
  moderate: "darkorange",
  high: "crimson",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isAssessmentResult(value: unknown): value is AssessmentResult {
  return (
    isRecord(value) &&
    typeof value.finalProbability === "number" &&
    typeof value.riskTier === "string" &&
    Array.isArray(value.factors) &&
    Array.isArray(value.recommendations)
  );
}

function percent(p: number): string {
  return `${(p * 100).toFixed(1)}%`;
}

function SelectField(props: {
  label: string;
  value: string;
  options: [string, string][];
  onChange: (value: string) => void;
}) {
  return (
    <div style={{ marginTop: 12 }}>
      <label>
        {props.label}
        <br />
        <select
          value={props.value}
          onChange={(e) => props.onChange(e.target.value)}
        >
          {props.options.map(([value, text]) => (
            <option key={value} value={value}>
              {text}
            </option>
          ))}
        </select>
      </label>
    </div>
  );
}

function NumberField(props: {
  label: string;
  value: string;
  placeholder?: string;
  onChange: (value: string) => void;
}) {
  return (
    <div style={{ marginTop: 12 }}>
      <label>
        {props.label}
        <br />
        <input
          type="number"
          step="any"
          value={props.value}
          placeholder={props.placeholder}
          onChange={(e) => props.onChange(e.target.value)}
          style={{ width: 160 }}
        />
      </label>
    </div>
  );
}

const YES_NO: [string, string][] = [
  ["no", "No"],
  ["yes", "Yes"],
];

export default function Home() {
  const [form, setForm] = useState<FormState>(INITIAL_FORM);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [result, setResult] = useState<AssessmentResult | null>(null);

  function update(field: keyof FormState) {
    return (value: string) => setForm((f) => ({ ...f, [field]: value }));
  }

  async function submit(event: FormEvent<HTMLFormElement>): Promise<void> {
    event.preventDefault();
    setLoading(true);
    setError(null);
    setResult(null);

    try {
      const res = await fetch("/assess", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(form),
      });

      const body: unknown = await res.json();
      if (!res.ok) {
        const msg =
          isRecord(body) && typeof body.error === "string"
            ? body.error
            : `HTTP ${res.status}`;
        throw new Error(msg);
      }
      if (!isAssessmentResult(body)) throw new Error("Unexpected response");

      setResult(body);
    } catch (e) {
      setError(e instanceof Error ? e.message : "Failed to assess risk");
    } finally {
      setLoading(false);
    }
  }

  return (
    <main>
      <h1>Stroke Risk Assessment</h1>
      <p>
        Screening aid only. This is not a diagnosis; discuss the result with a
        clinician.
      </p>

      <form onSubmit={(e) => void submit(e)}>
        <section>
          <h2>Inputs</h2>

          <SelectField
            label="Gender"
            value={form.gender}
            onChange={update("gender")}
            options={[
              ["female", "Female"],
              ["male", "Male"],
              ["other", "Other"],
            ]}
          />
          <NumberField label="Age (years)" value={form.age} onChange={update("age")} />
          <SelectField
            label="Hypertension"
            value={form.hypertension}
            onChange={update("hypertension")}
            options={YES_NO}
          />
          <SelectField
            label="Heart disease"
            value={form.heart_disease}
            onChange={update("heart_disease")}
            options={YES_NO}
          />
          <SelectField
            label="Ever married"
            value={form.ever_married}
            onChange={update("ever_married")}
            options={YES_NO}
          />
          <SelectField
            label="Work type"
            value={form.work_type}
            onChange={update("work_type")}
            options={[
              ["private", "Private"],
              ["self-employed", "Self-employed"],
              ["government", "Government job"],
              ["child", "Child"],
              ["never-worked", "Never worked"],
            ]}
          />
          <SelectField
            label="Residence"
            value={form.residence_type}
            onChange={update("residence_type")}
            options={[
              ["urban", "Urban"],
              ["rural", "Rural"],
            ]}
          />
          <NumberField
            label="Average glucose (mg/dL)"
            value={form.avg_glucose_level}
            onChange={update("avg_glucose_level")}
          />
          <NumberField
            label="BMI (optional)"
            value={form.bmi}
            placeholder="unknown"
            onChange={update("bmi")}
          />
          <SelectField
            label="Smoking status"
            value={form.smoking_status}
            onChange={update("smoking_status")}
            options={[
              ["never", "Never smoked"],
              ["former", "Formerly smoked"],
              ["current", "Smokes"],
              ["unknown", "Unknown"],
            ]}
          />

          <div style={{ marginTop: 12 }}>
            <button type="submit" disabled={loading}>
              {loading ? "Assessing…" : "Assess risk"}
            </button>
          </div>
        </section>
      </form>

      <section style={{ marginTop: 24 }}>
        <h2>Result</h2>

        {error ? (
          <p style={{ color: "crimson" }}>
            Error: <code>{error}</code>
          </p>
        ) : null}

        {result ? (
          <>
            <p>
              Risk tier:{" "}
              <strong style={{ color: TIER_COLORS[result.riskTier] }}>
                {result.riskTier.toUpperCase()}
              </strong>{" "}
              ({percent(result.finalProbability)})
            </p>
            <ul>
              <li>Model estimate: {percent(result.mlProbability)}</li>
              <li>Clinical rule score: {percent(result.ruleProbability)}</li>
            </ul>

            {result.warnings.length > 0 ? (
              <>
                <h3>Check these values</h3>
                <ul>
                  {result.warnings.map((w) => (
                    <li key={w.field}>{w.message}</li>
                  ))}
                </ul>
              </>
            ) : null}

            <h3>Contributing factors</h3>
            {result.factors.length > 0 ? (
              <ol>
                {result.factors.map((f) => (
                  <li key={f.id}>
                    <strong>{f.name}</strong> (+{f.weight.toFixed(2)}):{" "}
                    {f.explanation}
                  </li>
                ))}
              </ol>
            ) : (
              <p>No rule-based risk factors found.</p>
            )}

            <h3>Recommendations</h3>
            <ul>
              {result.recommendations.map((r) => (
                <li key={r}>{r}</li>
              ))}
            </ul>

            <p>
              <small>
                Model {result.modelVersion}, policy {result.policyVersion},
                encoding v{result.encodingVersion}
              </small>
            </p>
          </>
        ) : error ? null : (
          <p>No assessment yet.</p>
        )}
      </section>
    </main>
  );
}
