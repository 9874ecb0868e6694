/**
 * Remote Module - Barrel Export
 */
export { ObjectStore, S3ObjectStore, S3ObjectStoreOptions } from './object-store';
export { ParameterResolver, SsmParameterResolver, SsmParameterResolverOptions } from './parameter-store';
export { SecretResolver, SecretsManagerResolver, SecretsManagerResolverOptions } from './secret-store';
export { RemotePathResolver, RemoteDirectoryKind } from './remote-paths';
export { S3Location, isRemoteUri, parseS3Uri, joinRemotePath } from './s3-uri';
export { withFetchTimeout } from './with-timeout';
