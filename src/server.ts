import next from "next";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createRiskEngine } from "./engine";
import { loadModelArtifacts } from "./model";

/**
 * Server entrypoint.
 *
 * Artifacts are loaded and checked before anything listens: a missing or
 * mismatched model ends the process instead of failing per request.
 */
async function main(): Promise<void> {
  const config = loadConfig();

  const artifacts = loadModelArtifacts(config);
  const engine = createRiskEngine(artifacts);
  console.log(
    `Loaded model ${engine.modelVersion}, scaler ${engine.scalerVersion}, policy ${engine.policyVersion}.`
  );

  const app = next({ dev: config.dev });
  const handle = app.getRequestHandler();
  await app.prepare();

  const server = createApp(engine);

  // Let Next handle everything else
  server.all("*", (req, res) => {
    handle(req, res).catch((err) => {
      console.error("Page handler error:", err);
      res.status(500).end();
    });
  });

  server.listen(config.port, () => {
    console.log(`Server ready on http://localhost:${config.port} (dev=${config.dev})`);
  });
}

main().catch((err) => {
  console.error("Fatal server error:", err);
  process.exit(1);
});
