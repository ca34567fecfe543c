#!/usr/bin/env tsx
import { readFileSync, writeFileSync } from "node:fs";
import { assessBatch, summarizeOutcomes } from "./batch";
import { loadConfig } from "./config";
import { createRiskEngine } from "./engine";
import { loadModelArtifacts } from "./model";

/**
 * Reads a flag value from argv.
 *
 * Supports both styles:
 * - `--input patients.json`
 * - `--input=patients.json`
 *
 * Returns `null` if the flag is not present or has no value.
 */
function getArgValue(flag: string): string | null {
  const idx = process.argv.findIndex(
    (a) => a === flag || a.startsWith(`${flag}=`)
  );
  if (idx === -1) return null;
  const a = process.argv[idx];
  if (a.includes("=")) return a.split("=").slice(1).join("=");
  const next = process.argv[idx + 1];
  return next && !next.startsWith("--") ? next : null;
}

/**
 * Reads a positional argument from argv.
 *
 * Used as a fallback when flags are not forwarded.
 * Example: `tsx src/cli.ts patient.json` treats argv[2] as the input file.
 */
function getPositionalArg(index: number): string | null {
  const v = process.argv[index];
  if (!v || v.startsWith("--")) return null;
  return v;
}

/**
 * CLI entrypoint.
 *
 * Pipeline:
 * 1) Load configuration and the model/scaler artifacts (fatal if unusable).
 * 2) Read one record or an array of records from the input file.
 * 3) Assess each record; rejected records are reported, not fatal.
 * 4) Print the full result for a single record, and a tier summary.
 * 5) Optionally write every outcome to `--out`.
 */
export function runCli(): void {
  const inputPath =
    process.env.STROKE_INPUT || getArgValue("--input") || getPositionalArg(2);
  const outPath = getArgValue("--out");

  if (!inputPath) {
    console.error(
      "Missing input file. Pass --input <file.json> (one record or an array)."
    );
    process.exit(1);
  }

  const config = loadConfig();
  const engine = createRiskEngine(loadModelArtifacts(config));

  const parsed: unknown = JSON.parse(readFileSync(inputPath, "utf8"));
  const records: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

  console.log(
    `Assessing ${records.length} record(s) with model ${engine.modelVersion}, policy ${engine.policyVersion} ...`
  );
  const outcomes = assessBatch(engine, records);

  for (const o of outcomes) {
    if ("error" in o) {
      console.warn(`Record ${o.index} rejected: ${o.error.message}`);
      continue;
    }
    for (const w of o.result.warnings) {
      console.warn(`Record ${o.index}: ${w.message}`);
    }
  }

  const [first] = outcomes;
  if (!Array.isArray(parsed) && first && "result" in first) {
    console.log(JSON.stringify(first.result, null, 2));
  }

  const counts = summarizeOutcomes(outcomes);
  console.log(`\nHigh risk: ${counts.high}`);
  console.log(`Moderate risk: ${counts.moderate}`);
  console.log(`Low risk: ${counts.low}`);
  console.log(`Rejected: ${counts.rejected}`);

  if (outPath) {
    writeFileSync(outPath, JSON.stringify(outcomes, null, 2), "utf8");
    console.log(`\nWrote ${outPath}`);
  }
}

/**
 * Execute the CLI when this file is run directly.
 */
try {
  runCli();
} catch (err) {
  console.error("Fatal error:", err);
  process.exit(1);
}
