export const DEFAULT_MODEL_PATH = "models/stroke-model.json";
export const DEFAULT_SCALER_PATH = "models/scaler.json";
export const DEFAULT_PORT = 3000;

export type AppConfig = {
  modelPath: string;
  scalerPath: string;
  port: number;
  dev: boolean;
};

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | null {
  if (!value) return null;
  const v = value.trim();
  return v ? v : null;
}

/**
 * Reads runtime configuration from environment variables.
 *
 * - `STROKE_MODEL_PATH` / `STROKE_SCALER_PATH`: artifact files, resolved from
 *   the working directory
 * - `PORT`: HTTP port for the server
 * - `NODE_ENV`: anything but "production" runs Next.js in dev mode
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const port = Number.parseInt(env.PORT || String(DEFAULT_PORT), 10);

  return {
    modelPath: nonEmpty(env.STROKE_MODEL_PATH) ?? DEFAULT_MODEL_PATH,
    scalerPath: nonEmpty(env.STROKE_SCALER_PATH) ?? DEFAULT_SCALER_PATH,
    port: Number.isFinite(port) && port > 0 ? port : DEFAULT_PORT,
    dev: env.NODE_ENV !== "production",
  };
}
