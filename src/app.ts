import express from "express";
import type { RiskEngine } from "./engine";
import { InvalidJsonError, toErrorResponse } from "./errors";

/**
 * Builds the JSON API around a ready engine.
 *
 * Page rendering is left to the caller, which mounts its own catch-all after
 * these routes.
 */
export function createApp(engine: RiskEngine): express.Express {
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // GET /health -> versions of the loaded artifacts and policy
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      modelVersion: engine.modelVersion,
      scalerVersion: engine.scalerVersion,
      policyVersion: engine.policyVersion,
      encodingVersion: engine.encodingVersion,
    });
  });

  // POST /assess -> one assessment from a JSON or form body
  app.post("/assess", (req, res) => {
    try {
      const result = engine.assessPayload(req.body);
      console.log(
        `[assess] tier=${result.riskTier} final=${result.finalProbability.toFixed(3)} factors=${result.factors.length} warnings=${result.warnings.length}`
      );
      res.json(result);
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      if (status >= 500) console.error("[assess] failed:", err);
      else console.warn(`[assess] rejected: ${body.code} ${body.field ?? ""}`.trim());
      res.status(status).json(body);
    }
  });

  // body-parser failures and anything a route passes on
  app.use(
    (err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      const { status, body } = toErrorResponse(
        isBodyParseError(err) ? new InvalidJsonError(err) : err
      );
      if (status >= 500) console.error("[api] failed:", err);
      else console.warn(`[api] rejected: ${body.code}`);
      res.status(status).json(body);
    }
  );

  return app;
}

function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}
