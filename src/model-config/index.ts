/**
 * Model Config - Barrel Export
 */
export { ModelConfig } from './model-config.types';
export { modelDescriptorSchema, parseModelDescriptor } from './model-config.schema';
export { ModelConfigLoader, ModelConfigLoaderOptions, DESCRIPTOR_EXTENSION } from './model-config.loader';
export { getDefaultConfigDir, getDefaultConfigs } from './default-configs';
