/**
 * Remote Directory Resolution
 *
 * Works out the S3 directories holding provider modules and model
 * descriptors: a direct path from settings wins, otherwise the SSM
 * parameter named in settings is read. Resolved values are memoized.
 */

import { FactorySettings } from '../config';
import { createModuleLogger } from '../utils';
import { ParameterResolver } from './parameter-store';
import { isRemoteUri } from './s3-uri';

const logger = createModuleLogger('remote-paths');

/**
 * Which remote directory to resolve
 */
export type RemoteDirectoryKind = 'providers' | 'models';

type RemotePathSettings = Pick<
  FactorySettings,
  'providerPathParameter' | 'modelsPathParameter' | 'providerModulesPath' | 'modelsConfigPath'
>;

export class RemotePathResolver {
  private readonly resolved: Map<RemoteDirectoryKind, Promise<string | null>> = new Map();

  constructor(
    private readonly settings: RemotePathSettings,
    private readonly parameters: ParameterResolver | null,
  ) {}

  /**
   * Remote directory URI for the kind, or null when none is configured
   */
  resolve(kind: RemoteDirectoryKind): Promise<string | null> {
    const existing = this.resolved.get(kind);
    if (existing) {
      return existing;
    }

    // Failed lookups are retried on the next call
    const pending: Promise<string | null> = this.lookup(kind).catch((error: unknown) => {
      if (this.resolved.get(kind) === pending) {
        this.resolved.delete(kind);
      }
      throw error;
    });
    this.resolved.set(kind, pending);
    return pending;
  }

  /**
   * Forget memoized directories
   */
  reset(): void {
    this.resolved.clear();
  }

  private async lookup(kind: RemoteDirectoryKind): Promise<string | null> {
    const direct = kind === 'providers'
      ? this.settings.providerModulesPath
      : this.settings.modelsConfigPath;
    if (direct) {
      return this.validate(kind, direct, 'settings');
    }

    const parameterName = kind === 'providers'
      ? this.settings.providerPathParameter
      : this.settings.modelsPathParameter;

    if (!this.parameters) {
      logger.info('No parameter store configured, skipping remote directory', { kind });
      return null;
    }

    const value = await this.parameters.getParameter(parameterName);
    if (!value || value.trim() === '') {
      logger.warn('No S3 path configured, skipping remote directory', { kind, parameterName });
      return null;
    }

    return this.validate(kind, value.trim(), parameterName);
  }

  private validate(kind: RemoteDirectoryKind, uri: string, origin: string): string | null {
    if (!isRemoteUri(uri)) {
      logger.warn('Remote directory is not an s3:// URI, ignoring it', { kind, uri, origin });
      return null;
    }
    return uri;
  }
}
