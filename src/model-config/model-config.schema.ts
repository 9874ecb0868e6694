/**
 * Model Descriptor Schema
 *
 * Parses descriptor YAML and validates it into a ModelConfig.
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigParseError } from '../errors';
import { ModelConfig } from './model-config.types';

const optionalText = z
  .string()
  .min(1)
  .nullish()
  .transform(value => value ?? undefined);

/**
 * Descriptor fields with their defaults; unknown keys pass through
 */
export const modelDescriptorSchema = z
  .object({
    name: z.string().min(1),
    provider: z.string().min(1),
    model_id: z.string().min(1),
    max_tokens: z.number().int().min(1).default(1024),
    temperature: z.number().min(0).max(2).default(0.7),
    input_token_cost_usd_per_million: z.number().min(0).default(0),
    output_token_cost_usd_per_million: z.number().min(0).default(0),
    region_name: optionalText,
    api_key_secret_name: optionalText,
    api_key_env_var: optionalText,
    base_url: z.string().url().nullish().transform(value => value ?? undefined),
    description: optionalText,
  })
  .passthrough();

const KNOWN_KEYS: ReadonlySet<string> = new Set(Object.keys(modelDescriptorSchema.shape));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse descriptor text into a frozen ModelConfig
 *
 * @param modelName - Requested model name, used in error messages
 * @param text - Raw YAML
 * @param source - Where the text came from, used in error messages
 */
export function parseModelDescriptor(modelName: string, text: string, source: string): ModelConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigParseError(
      modelName,
      source,
      [error instanceof Error ? error.message : 'YAML parse failure'],
      error,
    );
  }

  if (!isRecord(document)) {
    throw new ConfigParseError(modelName, source, ['descriptor must be a YAML mapping']);
  }

  const result = modelDescriptorSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigParseError(
      modelName,
      source,
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const descriptor = result.data;
  const extensions: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(descriptor)) {
    if (!KNOWN_KEYS.has(key)) {
      extensions[key] = value;
    }
  }

  return Object.freeze({
    name: descriptor.name,
    provider: descriptor.provider.trim().toLowerCase(),
    modelId: descriptor.model_id,
    maxTokens: descriptor.max_tokens,
    temperature: descriptor.temperature,
    inputTokenCostUsdPerMillion: descriptor.input_token_cost_usd_per_million,
    outputTokenCostUsdPerMillion: descriptor.output_token_cost_usd_per_million,
    regionName: descriptor.region_name,
    apiKeySecretName: descriptor.api_key_secret_name,
    apiKeyEnvVar: descriptor.api_key_env_var,
    baseUrl: descriptor.base_url,
    description: descriptor.description,
    extensions: Object.freeze(extensions),
  });
}
