/**
 * Configuration
 *
 * Built once per process from LASSO_* environment variables and passed down
 * explicitly. Unset variables fall back to the schema defaults.
 */

import { type AppConfig, appConfigSchema } from './0_types.js';

function numberFrom(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function listFrom(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(/[+,\s]+/)
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Pick<AppConfig, 'verbose'>> & {
    languages?: string[];
  } = {}
): AppConfig {
  return appConfigSchema.parse({
    captureTimeoutMs: numberFrom(env.LASSO_CAPTURE_TIMEOUT_MS),
    tempRoot: env.LASSO_TMPDIR || undefined,
    verbose: overrides.verbose ?? env.LASSO_VERBOSE === 'true',
    thresholds: {
      noiseFloor: numberFrom(env.LASSO_NOISE_FLOOR),
      minConfidence: numberFrom(env.LASSO_MIN_CONFIDENCE),
    },
    ocr: {
      languages: overrides.languages ?? listFrom(env.LASSO_LANGUAGES),
      timeoutMs: numberFrom(env.LASSO_OCR_TIMEOUT_MS),
    },
    browser: {
      chromePath: env.LASSO_CHROME_PATH || undefined,
      translateTarget: env.LASSO_TRANSLATE_TARGET || undefined,
    },
  });
}
