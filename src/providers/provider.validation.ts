/**
 * Remote Provider Validation
 *
 * Admits the exports of an evaluated provider module as a ModelProvider.
 * The module must export exactly one object with a callable `createClient`;
 * the clients it builds must expose `complete`, and every result is checked
 * against the unified chat result shape.
 */

import { z } from 'zod';
import { ProviderLoadError } from '../errors';
import { ModelConfig } from '../model-config';
import { ChatClient, ChatRequest, ChatResult, ModelProvider, ProviderError } from './interfaces';

type Callable = (...args: unknown[]) => unknown;

const chatResultSchema = z.object({
  content: z.string(),
  model: z.string().optional(),
  usage: z
    .object({
      inputTokens: z.number().int().nonnegative(),
      outputTokens: z.number().int().nonnegative(),
    })
    .default({ inputTokens: 0, outputTokens: 0 }),
  finishReason: z
    .enum(['end_turn', 'max_tokens', 'stop_sequence', 'tool_use', 'content_filter', 'error'])
    .default('end_turn'),
});

function isCallable(value: unknown): value is Callable {
  return typeof value === 'function';
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function isProviderShaped(value: unknown): value is object {
  return isObject(value) && isCallable(Reflect.get(value, 'createClient'));
}

/**
 * Pick the provider object out of a module's exports.
 * `module.exports = { createClient }` counts as the single export.
 */
function findProviderExport(exported: unknown): object[] {
  if (isProviderShaped(exported)) {
    return [exported];
  }
  if (!isObject(exported)) {
    return [];
  }
  return Object.values(exported).filter(isProviderShaped);
}

/**
 * Turn evaluated module exports into a validated ModelProvider
 *
 * @param key - Registry key the provider is loaded under
 * @param source - Where the module came from, for error messages
 */
export function toModelProvider(key: string, source: string, exported: unknown): ModelProvider {
  const candidates = findProviderExport(exported);
  if (candidates.length === 0) {
    throw new ProviderLoadError(key, source, 'no exported object with a createClient function');
  }
  if (candidates.length > 1) {
    throw new ProviderLoadError(
      key,
      source,
      `expected exactly one provider export, found ${candidates.length}`,
    );
  }

  const candidate = candidates[0];
  const createClient = Reflect.get(candidate, 'createClient');
  if (!isCallable(createClient)) {
    throw new ProviderLoadError(key, source, 'createClient is not a function');
  }
  const displayName = Reflect.get(candidate, 'name');

  return {
    key,
    ...(typeof displayName === 'string' ? { name: displayName } : {}),
    createClient: async (config: ModelConfig): Promise<ChatClient> => {
      const client = await createClient.call(candidate, config);
      return toChatClient(key, source, client);
    },
  };
}

/**
 * Wrap a client built by a remote provider so its results are checked
 */
export function toChatClient(key: string, source: string, client: unknown): ChatClient {
  if (!isObject(client)) {
    throw new ProviderLoadError(key, source, 'createClient did not return an object');
  }
  const complete = Reflect.get(client, 'complete');
  if (!isCallable(complete)) {
    throw new ProviderLoadError(key, source, 'client has no complete function');
  }

  return {
    complete: async (request: ChatRequest): Promise<ChatResult> => {
      const raw = await complete.call(client, request);
      const parsed = chatResultSchema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        throw new ProviderError(
          `Provider '${key}' returned an invalid result: ${issues}`,
          'invalid_response_error',
          key,
        );
      }
      return {
        content: parsed.data.content,
        model: parsed.data.model ?? request.model,
        usage: parsed.data.usage,
        finishReason: parsed.data.finishReason,
      };
    },
  };
}
