/**
 * Factory Settings
 *
 * Environment-driven settings for remote directory resolution and timeouts.
 * Each SSM parameter name can be overridden by the environment variable of
 * the same name; the S3 directories can also be given directly.
 */

import { z } from 'zod';
import { FactorySettingsError } from '../errors';

export const DEFAULT_PROVIDER_PATH_PARAMETER = '/LLM_CONFIG/PROVIDER_MODULES_S3_PATH';
export const DEFAULT_MODELS_PATH_PARAMETER = '/LLM_CONFIG/MODELS_CONFIG_S3_PATH';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const settingsSchema = z.object({
  SSM_PROVIDER_PATH_PARAMETER: z.string().min(1).default(DEFAULT_PROVIDER_PATH_PARAMETER),
  SSM_MODELS_PATH_PARAMETER: z.string().min(1).default(DEFAULT_MODELS_PATH_PARAMETER),
  PROVIDER_MODULES_S3_PATH: optionalString,
  MODELS_CONFIG_S3_PATH: optionalString,
  REMOTE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  AWS_REGION: optionalString,
  LLM_CONFIG_DIR: optionalString,
});

/**
 * Validated factory settings
 */
export interface FactorySettings {
  providerPathParameter: string;
  modelsPathParameter: string;
  providerModulesPath?: string;      // s3:// URI, skips SSM when set
  modelsConfigPath?: string;         // s3:// URI, skips SSM when set
  remoteFetchTimeoutMs: number;
  providerTimeoutMs: number;
  awsRegion?: string;
  configDir?: string;                // Local descriptor directory override
}

/**
 * Read and validate settings from an environment map
 */
export function loadFactorySettings(
  env: Record<string, string | undefined> = process.env,
): FactorySettings {
  const result = settingsSchema.safeParse(env);
  if (!result.success) {
    throw new FactorySettingsError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  return {
    providerPathParameter: parsed.SSM_PROVIDER_PATH_PARAMETER,
    modelsPathParameter: parsed.SSM_MODELS_PATH_PARAMETER,
    providerModulesPath: parsed.PROVIDER_MODULES_S3_PATH,
    modelsConfigPath: parsed.MODELS_CONFIG_S3_PATH,
    remoteFetchTimeoutMs: parsed.REMOTE_FETCH_TIMEOUT_MS,
    providerTimeoutMs: parsed.PROVIDER_TIMEOUT_MS,
    awsRegion: parsed.AWS_REGION,
    configDir: parsed.LLM_CONFIG_DIR,
  };
}
