/**
 * Factory Settings Tests
 */

import { loadFactorySettings } from '../settings';
import { FactorySettingsError } from '../../errors';

describe('loadFactorySettings', () => {
  it('should apply defaults for an empty environment', () => {
    const settings = loadFactorySettings({});

    expect(settings).toEqual({
      providerPathParameter: '/LLM_CONFIG/PROVIDER_MODULES_S3_PATH',
      modelsPathParameter: '/LLM_CONFIG/MODELS_CONFIG_S3_PATH',
      providerModulesPath: undefined,
      modelsConfigPath: undefined,
      remoteFetchTimeoutMs: 10000,
      providerTimeoutMs: 120000,
      awsRegion: undefined,
      configDir: undefined,
    });
  });

  it('should let environment variables override parameter names', () => {
    const settings = loadFactorySettings({
      SSM_PROVIDER_PATH_PARAMETER: '/custom/providers',
      SSM_MODELS_PATH_PARAMETER: '/custom/models',
    });

    expect(settings.providerPathParameter).toBe('/custom/providers');
    expect(settings.modelsPathParameter).toBe('/custom/models');
  });

  it('should read direct S3 paths and numeric timeouts', () => {
    const settings = loadFactorySettings({
      PROVIDER_MODULES_S3_PATH: 's3://test-bucket/providers',
      MODELS_CONFIG_S3_PATH: ' s3://test-bucket/models ',
      REMOTE_FETCH_TIMEOUT_MS: '2500',
      PROVIDER_TIMEOUT_MS: '30000',
      AWS_REGION: 'eu-west-1',
    });

    expect(settings.providerModulesPath).toBe('s3://test-bucket/providers');
    expect(settings.modelsConfigPath).toBe('s3://test-bucket/models');
    expect(settings.remoteFetchTimeoutMs).toBe(2500);
    expect(settings.providerTimeoutMs).toBe(30000);
    expect(settings.awsRegion).toBe('eu-west-1');
  });

  it('should treat blank optional values as unset', () => {
    const settings = loadFactorySettings({ MODELS_CONFIG_S3_PATH: '   ', LLM_CONFIG_DIR: '' });

    expect(settings.modelsConfigPath).toBeUndefined();
    expect(settings.configDir).toBeUndefined();
  });

  it('should reject invalid timeouts', () => {
    expect(() => loadFactorySettings({ REMOTE_FETCH_TIMEOUT_MS: 'soon' })).toThrow(FactorySettingsError);
    expect(() => loadFactorySettings({ PROVIDER_TIMEOUT_MS: '-5' })).toThrow(FactorySettingsError);
  });
});
