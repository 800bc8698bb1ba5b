// ─── Validator Configuration ──────────────────────────────────────────────
// Environment-driven settings shared by the API server and the batch runner.
// Command-line flags override these; see batch/runBatchValidation.ts.

export type ValidatorConfig = {
  /** External template file; absent means the embedded template. */
  templatePath: string | null;
  inputDir: string;
  outputDir: string;
  concurrency: number;
  writeDashboard: boolean;

  api: {
    port: number;
    bodyLimit: string;
    timeoutMs: number;
  };
};

export type Env = Readonly<Record<string, string | undefined>>;

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 32;

export const asInt = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n)) return fallback;
  return Math.trunc(n);
};

export const asString = (value: string | undefined, fallback: string): string =>
  (value ?? '').trim() || fallback;

export const asBool = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) return fallback;
  const v = value.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'yes') return true;
  if (v === '0' || v === 'false' || v === 'no') return false;
  return fallback;
};

export const clampConcurrency = (n: number): number =>
  Math.min(MAX_CONCURRENCY, Math.max(MIN_CONCURRENCY, Math.trunc(n)));

export function loadValidatorConfig(env: Env = process.env): ValidatorConfig {
  const templatePath = (env.VALIDATOR_TEMPLATE_PATH ?? '').trim();

  return {
    templatePath: templatePath || null,
    inputDir: asString(env.VALIDATOR_INPUT_DIR, 'input_source'),
    outputDir: asString(env.VALIDATOR_OUTPUT_DIR, 'output'),
    concurrency: clampConcurrency(asInt(env.VALIDATOR_CONCURRENCY, 4)),
    writeDashboard: asBool(env.VALIDATOR_DASHBOARD, false),
    api: {
      port: asInt(env.API_PORT, 3001),
      bodyLimit: asString(env.API_BODY_LIMIT, '10mb'),
      timeoutMs: Math.max(1, asInt(env.API_TIMEOUT_MS, 15000)),
    },
  };
}
