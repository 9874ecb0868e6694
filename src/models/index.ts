/**
 * Models - Barrel Export
 */
export {
  LlmModel,
  LlmModelOptions,
  InvokeOptions,
  InvokeResponse,
  CostInfo,
  DEFAULT_INVOKE_TIMEOUT_MS,
} from './llm-model';
