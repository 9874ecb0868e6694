/**
 * LLM Model Factory - Main Entry Point
 *
 * Public API of the package. Run directly, it lists the available models
 * or sends one prompt to a model:
 *
 *   node dist/main.js                  # list models
 *   node dist/main.js gpt_4o "Hello"   # invoke gpt_4o
 */

import dotenv from 'dotenv';
import { ModelFactory, createModelFactory } from './factory';
import { createModuleLogger, describeError } from './utils';

const logger = createModuleLogger('main');

/**
 * Run the command-line demo against a factory; returns the exit code
 */
export async function runDemo(factory: ModelFactory, args: string[]): Promise<number> {
  const [modelName, ...promptParts] = args;

  if (!modelName) {
    const models = await factory.listAvailableModels();
    console.log('Available models:');
    models.forEach(name => console.log(`  ${name}`));
    return 0;
  }

  const prompt = promptParts.join(' ').trim();
  if (!prompt) {
    console.error(`Usage: llm-model-factory ${modelName} <prompt>`);
    return 1;
  }

  const model = await factory.getModel(modelName);
  const response = await model.invoke(prompt);

  console.log(response.content);
  logger.info('Invocation complete', {
    model: modelName,
    inputTokens: response.usage.inputTokens,
    outputTokens: response.usage.outputTokens,
    costUsd: response.cost.amount,
    latencyMs: response.latency,
  });
  return 0;
}

if (require.main === module) {
  dotenv.config();

  runDemo(createModelFactory(), process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Demo failed', { error: describeError(error) });
      process.exitCode = 1;
    });
}

// Public API
export {
  getLlm,
  createModelFactory,
  getDefaultModelFactory,
  setDefaultModelFactory,
  ModelFactory,
  CreateModelFactoryOptions,
  GetModelOptions,
  ModelCache,
  InMemoryModelCache,
  CacheEntry,
} from './factory';
export { LlmModel, InvokeOptions, InvokeResponse, CostInfo } from './models';
export {
  ModelConfig,
  ModelConfigLoader,
  getDefaultConfigDir,
  getDefaultConfigs,
} from './model-config';
export {
  ProviderRegistry,
  createProviderRegistry,
  ModelProvider,
  ChatClient,
  ChatRequest,
  ChatResult,
  Message,
  ProviderError,
  ProviderErrorType,
  S3ProviderSourceLoader,
  TempFileModuleEvaluator,
} from './providers';
export { FactorySettings, loadFactorySettings } from './config';
export * from './errors';
