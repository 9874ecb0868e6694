/**
 * Config Module - Barrel Export
 */
export {
  FactorySettings,
  loadFactorySettings,
  DEFAULT_PROVIDER_PATH_PARAMETER,
  DEFAULT_MODELS_PATH_PARAMETER,
} from './settings';
