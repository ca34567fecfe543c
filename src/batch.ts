import type { RiskEngine } from "./engine";
import { toErrorResponse, type ErrorBody } from "./errors";
import type { AssessmentResult, RiskTier } from "./types";

export type BatchOutcome =
  | { index: number; result: AssessmentResult }
  | { index: number; error: { code: string; message: string; field?: string } };

function toOutcomeError(body: ErrorBody): { code: string; message: string; field?: string } {
  const error: { code: string; message: string; field?: string } = {
    code: body.code,
    message: body.error,
  };
  if (body.field) error.field = body.field;
  return error;
}

/**
 * Assesses every record of a batch.
 *
 * A rejected record does not stop the batch; its typed error is kept in place
 * of a result. Errors that are not caller errors (a broken predictor) are
 * rethrown.
 */
export function assessBatch(engine: RiskEngine, records: readonly unknown[]): BatchOutcome[] {
  return records.map((record, index): BatchOutcome => {
    try {
      return { index, result: engine.assessPayload(record) };
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      if (status >= 500) throw err;
      return { index, error: toOutcomeError(body) };
    }
  });
}

/**
 * Counts outcomes per tier, plus rejected records.
 */
export function summarizeOutcomes(
  outcomes: readonly BatchOutcome[]
): Record<RiskTier | "rejected", number> {
  const counts = { low: 0, moderate: 0, high: 0, rejected: 0 };
  for (const o of outcomes) {
    if ("result" in o) counts[o.result.riskTier] += 1;
    else counts.rejected += 1;
  }
  return counts;
}
