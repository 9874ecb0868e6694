/**
 * Model Config Types
 *
 * Settings of one model, as read from its `<model_name>.yaml` descriptor.
 */

/**
 * Validated, immutable model settings
 */
export interface ModelConfig {
  readonly name: string;                          // Human-readable name
  readonly provider: string;                      // Registry key, lower-cased
  readonly modelId: string;                       // Provider-side model identifier
  readonly maxTokens: number;                     // Default: 1024
  readonly temperature: number;                   // Default: 0.7
  readonly inputTokenCostUsdPerMillion: number;   // Default: 0
  readonly outputTokenCostUsdPerMillion: number;  // Default: 0
  readonly regionName?: string;
  readonly apiKeySecretName?: string;
  readonly apiKeyEnvVar?: string;
  readonly baseUrl?: string;
  readonly description?: string;
  readonly extensions: Readonly<Record<string, unknown>>;  // Provider-specific keys
}
