/**
 * Errors - Barrel Export
 */
export {
  FactoryStage,
  LlmFactoryError,
  ConfigNotFoundError,
  ConfigParseError,
  FactorySettingsError,
  ProviderNotFoundError,
  ProviderLoadError,
  ProviderInitError,
  RemoteFetchError,
  RemoteFetchTimeoutError,
} from './factory-errors';
